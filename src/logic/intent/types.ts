export enum Intent {
  ARITHMETIC = 'Arithmetic',
  DATE_QUERY = 'DateQuery',
  TIME_QUERY = 'TimeQuery',
  HISTORY_RECALL = 'HistoryRecall',
  SELF_IDENTIFY = 'SelfIdentify',
  FALLBACK = 'Fallback',
}

export interface IntentRule {
  intent: Intent;
  /** `text` is already trimmed and lower-cased. */
  matches(text: string): boolean;
}

export interface RuleMatch {
  intent: Intent;
  /** Position of the matching rule in the table. */
  index: number;
}

export interface DispatchResult {
  intent: Intent;
  response: string;
}

/** Returns `null` to decline, which passes the message on to the next rule. */
export type IntentHandler = (text: string) => Promise<string | null>;
