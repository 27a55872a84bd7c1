import { ParseError, Result, fail, ok } from './types';

export type OperatorSymbol = '+' | '-' | '*' | '/' | '//' | '%' | '**';

export type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'operator'; symbol: OperatorSymbol; position: number }
  | { type: 'lparen'; position: number }
  | { type: 'rparen'; position: number }
  | { type: 'end'; position: number };

const NUMBER_PATTERN = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const NAME_PATTERN = /[\p{L}_][\p{L}\p{N}_]*/uy;

const parseError = (message: string, position: number): ParseError => ({
  kind: 'ParseError',
  message,
  position,
});

/**
 * Splits an arithmetic expression into tokens.
 * Names, quotes, brackets and every other symbol outside the grammar are
 * rejected here, before a tree is ever built.
 */
export function tokenize(source: string): Result<Token[], ParseError> {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    NUMBER_PATTERN.lastIndex = pos;
    const number = NUMBER_PATTERN.exec(source);
    if (number) {
      const value = Number(number[0]);
      if (!Number.isFinite(value)) {
        return fail(parseError(`Numeric literal out of range: ${number[0]}`, pos));
      }
      tokens.push({ type: 'number', value, position: pos });
      pos += number[0].length;
      continue;
    }

    NAME_PATTERN.lastIndex = pos;
    const name = NAME_PATTERN.exec(source);
    if (name) {
      return fail(parseError(`Names are not allowed in expressions: "${name[0]}"`, pos));
    }

    switch (ch) {
      case '+':
      case '-':
      case '%':
        tokens.push({ type: 'operator', symbol: ch, position: pos });
        pos++;
        break;
      case '*':
      case '/':
        if (source[pos + 1] === ch) {
          tokens.push({ type: 'operator', symbol: ch === '*' ? '**' : '//', position: pos });
          pos += 2;
        } else {
          tokens.push({ type: 'operator', symbol: ch, position: pos });
          pos++;
        }
        break;
      case '(':
        tokens.push({ type: 'lparen', position: pos });
        pos++;
        break;
      case ')':
        tokens.push({ type: 'rparen', position: pos });
        pos++;
        break;
      default:
        return fail(parseError(`Unexpected character "${ch}"`, pos));
    }
  }

  tokens.push({ type: 'end', position: source.length });
  return ok(tokens);
}
