export interface ConversationTurn {
  /** Order index, increasing across the whole session. */
  index: number;
  query: string;
  /** Short description of the action taken, e.g. `tool get_casings_for_well {"well_id":"well1"}`. */
  action: string;
  result: string;
}

export type NewConversationTurn = Omit<ConversationTurn, "index">;

export const DEFAULT_MEMORY_SIZE = 5;

/**
 * Sliding window of completed turns, most recent last. Once `limit` is
 * exceeded the oldest turn is evicted.
 */
export class ConversationMemory {
  readonly limit: number;
  private turns: ConversationTurn[] = [];
  private nextIndex = 0;

  constructor(limit: number = DEFAULT_MEMORY_SIZE) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`memory limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  get size(): number {
    return this.turns.length;
  }

  append(turn: NewConversationTurn): ConversationTurn {
    const stored: ConversationTurn = Object.freeze({...turn, index: this.nextIndex++});
    this.turns.push(stored);
    if (this.turns.length > this.limit) {
      this.turns.splice(0, this.turns.length - this.limit);
    }
    return stored;
  }

  /** The last `k` turns in insertion order. */
  recent(k: number = this.limit): readonly ConversationTurn[] {
    if (k <= 0) {
      return [];
    }
    return this.turns.slice(-k);
  }

  all(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  clear(): void {
    this.turns = [];
  }
}
