export interface TurnRecord {
  readonly id: number;
  readonly timestamp: string; // ISO-8601, UTC
  readonly userText: string;
  readonly aiText: string;
}

/**
 * Durable, append-only log of conversation turns. Turns are never updated or
 * deleted once appended.
 */
export interface ConversationStore {
  /** Persists a turn, assigning the next id and the capture timestamp. */
  append(userText: string, aiText: string): Promise<TurnRecord>;

  /** Up to `limit` most recent turns, oldest first. */
  fetchRecent(limit: number): Promise<TurnRecord[]>;

  count(): Promise<number>;

  /** Recent turns and the total, read with no append in between. */
  history(limit: number): Promise<HistoryPage>;
}

export interface HistoryPage {
  turns: TurnRecord[];
  total: number;
}

export const CONVERSATION_STORE = Symbol('CONVERSATION_STORE');

export const DEFAULT_HISTORY_PAGE = 20;
export const MAX_HISTORY_PAGE = 100;
