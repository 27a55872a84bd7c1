import { TurnRecord } from '../conversation-log/types';

export const EMPTY_MESSAGE_REPLY = 'Please provide a message.';

export const NO_HISTORY_REPLY = 'There is no previous conversation yet.';

export const SELF_DESCRIPTION_REPLY =
  'I am a small open-source AI assistant. Unlike large language models, I run entirely on ' +
  'simple rules without access to external APIs or massive datasets. I can perform arithmetic, ' +
  "tell the date and time, and remember our conversation, but I don't pretend to know everything.";

export const FALLBACK_REPLY =
  "I'm sorry, I don't have enough information to answer that. " +
  "I'm still learning and rely on simple reasoning rather than vast knowledge.";

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Integral values print without a fractional part, including ones beyond the
 * range where `String()` switches to exponent notation. Fractions below 1e-4
 * print in exponent form with at least two exponent digits (`1e-05`).
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return Math.abs(value) < 1e21 ? String(value) : BigInt(value).toString();
  }
  if (Math.abs(value) < 1e-4) {
    return value.toExponential().replace(/e([+-])(\d)$/, (_, sign: string, digit: string) => `e${sign}0${digit}`);
  }
  return String(value);
}

export const arithmeticReply = (value: number) => `The result is ${formatNumber(value)}.`;

export const dateReply = (now: Date) =>
  `Today's date is ${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} (local time).`;

export const timeReply = (now: Date) =>
  `The current time is ${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())} (local time).`;

export function historyReply(turns: TurnRecord[]): string {
  if (turns.length === 0) return NO_HISTORY_REPLY;
  const lines = turns.map(
    (turn, i) => `${i + 1}. You said: '${turn.userText}' | I responded: '${turn.aiText}'`,
  );
  return `Here is our recent conversation history:\n${lines.join('\n')}`;
}
