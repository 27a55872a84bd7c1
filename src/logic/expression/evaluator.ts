import { BinaryOperator, EvalError, ExpressionNode, Result, fail, ok } from './types';

const divisionByZero = (message: string): EvalError => ({ kind: 'DivisionByZero', message });

const unsupported = (message: string): EvalError => ({ kind: 'UnsupportedExpression', message });

/**
 * Floored quotient and remainder, computed together so that
 * `a == q * b + r` holds for fractional operands too (`1 // 0.1` is 9, not 10).
 * The remainder takes the sign of the divisor.
 */
function floorDivMod(a: number, b: number): [number, number] {
  let mod = a % b;
  let div = (a - mod) / b;
  if (mod !== 0) {
    if ((b < 0) !== (mod < 0)) {
      mod += b;
      div -= 1;
    }
  } else {
    mod = b < 0 ? -0 : 0;
  }

  if (div === 0) return [0 * (a / b), mod];
  let quotient = Math.floor(div);
  if (div - quotient > 0.5) quotient += 1;
  return [quotient, mod];
}

function applyBinary(op: BinaryOperator, a: number, b: number): Result<number, EvalError> {
  switch (op) {
    case 'Add':
      return ok(a + b);
    case 'Sub':
      return ok(a - b);
    case 'Mul':
      return ok(a * b);
    case 'Div':
      if (b === 0) return fail(divisionByZero('division by zero'));
      return ok(a / b);
    case 'FloorDiv':
      if (b === 0) return fail(divisionByZero('integer division by zero'));
      return ok(floorDivMod(a, b)[0]);
    case 'Mod':
      if (b === 0) return fail(divisionByZero('modulo by zero'));
      return ok(floorDivMod(a, b)[1]);
    case 'Pow':
      if (a === 0 && b < 0) return fail(divisionByZero('zero raised to a negative power'));
      return ok(a ** b);
    default: {
      const unknown: never = op;
      return fail(unsupported(`Unsupported operator: ${String(unknown)}`));
    }
  }
}

/**
 * Walks a parsed tree and computes its value. Only the three node kinds of
 * {@link ExpressionNode} are understood; anything else is reported as
 * `UnsupportedExpression`, never executed.
 */
export function evaluate(node: ExpressionNode): Result<number, EvalError> {
  switch (node.kind) {
    case 'NumberLiteral':
      if (typeof node.value !== 'number' || !Number.isFinite(node.value)) {
        return fail(unsupported('Only finite numeric literals are allowed'));
      }
      return ok(node.value);
    case 'UnaryOp': {
      const operand = evaluate(node.operand);
      if (!operand.ok) return operand;
      if (node.op === 'Neg') return ok(-operand.value);
      if (node.op === 'Pos') return operand;
      return fail(unsupported(`Unsupported unary operator: ${String(node.op)}`));
    }
    case 'BinaryOp': {
      const left = evaluate(node.left);
      if (!left.ok) return left;
      const right = evaluate(node.right);
      if (!right.ok) return right;
      const result = applyBinary(node.op, left.value, right.value);
      if (result.ok && !Number.isFinite(result.value)) {
        return fail(unsupported('Result is not a finite real number'));
      }
      return result;
    }
    default: {
      const unknown: never = node;
      return fail(unsupported(`Unsupported expression node: ${JSON.stringify(unknown)}`));
    }
  }
}
