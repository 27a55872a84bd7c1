import { OperatorSymbol, Token, tokenize } from './lexer';
import {
  BinaryOperator,
  ExpressionNode,
  MAX_EXPRESSION_LENGTH,
  MAX_NESTING_DEPTH,
  ParseError,
  Result,
  fail,
  ok,
} from './types';

const BINARY_OPERATORS: Record<OperatorSymbol, BinaryOperator> = {
  '+': 'Add',
  '-': 'Sub',
  '*': 'Mul',
  '/': 'Div',
  '//': 'FloorDiv',
  '%': 'Mod',
  '**': 'Pow',
};

class ParseFailure extends Error {
  constructor(readonly detail: ParseError) {
    super(detail.message);
  }
}

/**
 * Recursive-descent parser for:
 *
 *   expression     := multiplicative (("+" | "-") multiplicative)*
 *   multiplicative := unary (("*" | "/" | "//" | "%") unary)*
 *   unary          := ("+" | "-") unary | power
 *   power          := primary ("**" unary)?
 *   primary        := NUMBER | "(" expression ")"
 *
 * `**` is right-associative and binds tighter than a unary sign on its left,
 * so `-2 ** 2` is `-(2 ** 2)` and `2 ** -1` is `2 ** (-1)`.
 */
class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parseAll(): ExpressionNode {
    const node = this.expression();
    const next = this.peek();
    if (next.type !== 'end') {
      this.error('Unexpected input after expression', next.position);
    }
    return node;
  }

  private expression(): ExpressionNode {
    let left = this.multiplicative();
    let symbol = this.operatorAhead('+', '-');
    while (symbol) {
      this.index++;
      left = { kind: 'BinaryOp', op: BINARY_OPERATORS[symbol], left, right: this.multiplicative() };
      symbol = this.operatorAhead('+', '-');
    }
    return left;
  }

  private multiplicative(): ExpressionNode {
    let left = this.unary();
    let symbol = this.operatorAhead('*', '/', '//', '%');
    while (symbol) {
      this.index++;
      left = { kind: 'BinaryOp', op: BINARY_OPERATORS[symbol], left, right: this.unary() };
      symbol = this.operatorAhead('*', '/', '//', '%');
    }
    return left;
  }

  private unary(): ExpressionNode {
    this.depth++;
    if (this.depth > MAX_NESTING_DEPTH) {
      this.error(`Expression is nested deeper than ${MAX_NESTING_DEPTH} levels`, this.peek().position);
    }
    try {
      const sign = this.operatorAhead('+', '-');
      if (sign) {
        this.index++;
        return { kind: 'UnaryOp', op: sign === '-' ? 'Neg' : 'Pos', operand: this.unary() };
      }
      return this.power();
    } finally {
      this.depth--;
    }
  }

  private power(): ExpressionNode {
    const base = this.primary();
    if (this.operatorAhead('**')) {
      this.index++;
      return { kind: 'BinaryOp', op: 'Pow', left: base, right: this.unary() };
    }
    return base;
  }

  private primary(): ExpressionNode {
    const token = this.peek();
    switch (token.type) {
      case 'number':
        this.index++;
        return { kind: 'NumberLiteral', value: token.value };
      case 'lparen': {
        this.index++;
        const inner = this.expression();
        const closing = this.peek();
        if (closing.type !== 'rparen') {
          this.error('Expected ")"', closing.position);
        }
        this.index++;
        return inner;
      }
      case 'end':
        return this.error('Unexpected end of expression', token.position);
      default:
        return this.error('Expected a number or "("', token.position);
    }
  }

  private operatorAhead<S extends OperatorSymbol>(...symbols: S[]): S | undefined {
    const token = this.peek();
    if (token.type !== 'operator') return undefined;
    return symbols.find((symbol) => symbol === token.symbol);
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private error(message: string, position: number): never {
    throw new ParseFailure({ kind: 'ParseError', message, position });
  }
}

/**
 * Parses `source` into an expression tree made only of number literals,
 * unary signs and the seven binary operators.
 */
export function parse(source: string): Result<ExpressionNode, ParseError> {
  if (source.length > MAX_EXPRESSION_LENGTH) {
    const tooLong: ParseError = {
      kind: 'ParseError',
      message: `Expression is longer than ${MAX_EXPRESSION_LENGTH} characters`,
      position: MAX_EXPRESSION_LENGTH,
    };
    return fail(tooLong);
  }

  const lexed = tokenize(source);
  if (!lexed.ok) return lexed;

  try {
    return ok(new Parser(lexed.value).parseAll());
  } catch (err) {
    if (err instanceof ParseFailure) return fail(err.detail);
    throw err;
  }
}
