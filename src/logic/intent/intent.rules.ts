import { Intent, IntentRule, RuleMatch } from './types';

export const ARITHMETIC_OPERATORS = ['+', '-', '*', '/', '%'];

export const DATE_KEYWORDS = ['date', 'day', 'today', '날짜', '요일'];

export const TIME_KEYWORDS = ['time', '현재 시간', '시각', 'hour', 'minute'];

export const HISTORY_KEYWORDS = ['history', 'memory', 'log', '대화', '내역', '지난', 'remember'];

export const IDENTITY_KEYWORDS = ['who are you', 'what are you', '이름', '정체', 'your difference'];

const containsAny = (text: string, keywords: string[]) => keywords.some(keyword => text.includes(keyword));

// Order is the priority: the first rule whose predicate holds wins.
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: Intent.ARITHMETIC,
    // cheap pre-filter only; the evaluator decides whether it really is arithmetic
    matches: text => /\d/.test(text) && containsAny(text, ARITHMETIC_OPERATORS),
  },
  { intent: Intent.DATE_QUERY, matches: text => containsAny(text, DATE_KEYWORDS) },
  { intent: Intent.TIME_QUERY, matches: text => containsAny(text, TIME_KEYWORDS) },
  { intent: Intent.HISTORY_RECALL, matches: text => containsAny(text, HISTORY_KEYWORDS) },
  { intent: Intent.SELF_IDENTIFY, matches: text => containsAny(text, IDENTITY_KEYWORDS) },
  { intent: Intent.FALLBACK, matches: () => true },
];

export function normalizeMessage(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * First rule at or after `startAt` that matches the normalized message.
 * The terminal fallback rule guarantees a match.
 */
export function matchRule(text: string, startAt = 0, rules: readonly IntentRule[] = INTENT_RULES): RuleMatch {
  const normalized = normalizeMessage(text);
  for (let index = Math.max(0, startAt); index < rules.length; index++) {
    if (rules[index].matches(normalized)) {
      return { intent: rules[index].intent, index };
    }
  }
  return { intent: Intent.FALLBACK, index: rules.length };
}
