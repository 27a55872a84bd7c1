export type UnaryOperator = 'Pos' | 'Neg';

export type BinaryOperator = 'Add' | 'Sub' | 'Mul' | 'Div' | 'FloorDiv' | 'Mod' | 'Pow';

export interface NumberLiteral {
  kind: 'NumberLiteral';
  value: number;
}

export interface UnaryOp {
  kind: 'UnaryOp';
  op: UnaryOperator;
  operand: ExpressionNode;
}

export interface BinaryOp {
  kind: 'BinaryOp';
  op: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

// Closed set: nothing else can be built by the parser or walked by the evaluator.
export type ExpressionNode = NumberLiteral | UnaryOp | BinaryOp;

export interface ParseError {
  kind: 'ParseError';
  message: string;
  position: number;
}

export type EvalErrorKind = 'DivisionByZero' | 'UnsupportedExpression';

export interface EvalError {
  kind: EvalErrorKind;
  message: string;
}

export type ExpressionError = ParseError | EvalError;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export const MAX_EXPRESSION_LENGTH = 256;
export const MAX_NESTING_DEPTH = 64;
