import { parse } from './parser';
import { ExpressionNode } from './types';

const num = (value: number): ExpressionNode => ({ kind: 'NumberLiteral', value });

describe('parse', () => {
  it('parses a number literal', () => {
    expect(parse('42')).toEqual({ ok: true, value: num(42) });
  });

  it('parses decimal and exponent literals', () => {
    expect(parse('3.25')).toEqual({ ok: true, value: num(3.25) });
    expect(parse('.5')).toEqual({ ok: true, value: num(0.5) });
    expect(parse('3.')).toEqual({ ok: true, value: num(3) });
    expect(parse('1e3')).toEqual({ ok: true, value: num(1000) });
  });

  it('gives multiplication precedence over addition', () => {
    expect(parse('1 + 2 * 3')).toEqual({
      ok: true,
      value: {
        kind: 'BinaryOp',
        op: 'Add',
        left: num(1),
        right: { kind: 'BinaryOp', op: 'Mul', left: num(2), right: num(3) },
      },
    });
  });

  it('associates subtraction to the left', () => {
    expect(parse('8 - 3 - 2')).toEqual({
      ok: true,
      value: {
        kind: 'BinaryOp',
        op: 'Sub',
        left: { kind: 'BinaryOp', op: 'Sub', left: num(8), right: num(3) },
        right: num(2),
      },
    });
  });

  it('associates ** to the right', () => {
    expect(parse('2 ** 3 ** 2')).toEqual({
      ok: true,
      value: {
        kind: 'BinaryOp',
        op: 'Pow',
        left: num(2),
        right: { kind: 'BinaryOp', op: 'Pow', left: num(3), right: num(2) },
      },
    });
  });

  it('binds ** tighter than a leading sign', () => {
    expect(parse('-2 ** 2')).toEqual({
      ok: true,
      value: {
        kind: 'UnaryOp',
        op: 'Neg',
        operand: { kind: 'BinaryOp', op: 'Pow', left: num(2), right: num(2) },
      },
    });
  });

  it('accepts a signed exponent', () => {
    expect(parse('2**-1')).toEqual({
      ok: true,
      value: {
        kind: 'BinaryOp',
        op: 'Pow',
        left: num(2),
        right: { kind: 'UnaryOp', op: 'Neg', operand: num(1) },
      },
    });
  });

  it('distinguishes // and % from / and *', () => {
    expect(parse('7 // 2 % 3')).toEqual({
      ok: true,
      value: {
        kind: 'BinaryOp',
        op: 'Mod',
        left: { kind: 'BinaryOp', op: 'FloorDiv', left: num(7), right: num(2) },
        right: num(3),
      },
    });
  });

  it('uses parentheses for grouping', () => {
    expect(parse('(1 + 2) * 3')).toEqual({
      ok: true,
      value: {
        kind: 'BinaryOp',
        op: 'Mul',
        left: { kind: 'BinaryOp', op: 'Add', left: num(1), right: num(2) },
        right: num(3),
      },
    });
  });

  it('reports where a name appears', () => {
    expect(parse('2 + x')).toEqual({
      ok: false,
      error: { kind: 'ParseError', message: 'Names are not allowed in expressions: "x"', position: 4 },
    });
  });

  it('rejects an unbalanced parenthesis', () => {
    expect(parse('(1 + 2')).toEqual({
      ok: false,
      error: { kind: 'ParseError', message: 'Expected ")"', position: 6 },
    });
  });

  it('rejects a dangling operator', () => {
    expect(parse('2 +')).toEqual({
      ok: false,
      error: { kind: 'ParseError', message: 'Unexpected end of expression', position: 3 },
    });
  });

  it('rejects empty input', () => {
    const result = parse('   ');
    expect(result.ok).toBe(false);
  });

  it('rejects input longer than the length bound', () => {
    const result = parse('1+'.repeat(200) + '1');
    expect(result).toEqual({
      ok: false,
      error: { kind: 'ParseError', message: 'Expression is longer than 256 characters', position: 256 },
    });
  });

  it('rejects nesting deeper than the depth bound', () => {
    const deep = '('.repeat(100) + '1' + ')'.repeat(100);
    const result = parse(deep);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Expression is nested deeper than 64 levels');
    }
  });

  it('accepts moderate nesting', () => {
    const nested = '('.repeat(10) + '1' + ')'.repeat(10);
    expect(parse(nested)).toEqual({ ok: true, value: num(1) });
  });

  it('rejects a long run of unary signs', () => {
    expect(parse('-'.repeat(100) + '1').ok).toBe(false);
  });
});
