import { Injectable } from '@nestjs/common';
import { evaluate } from './evaluator';
import { parse } from './parser';
import { EvalError, ExpressionError, ExpressionNode, ParseError, Result } from './types';

@Injectable()
export class ExpressionService {

  parse(text: string): Result<ExpressionNode, ParseError> {
    return parse(text);
  }

  evaluate(ast: ExpressionNode): Result<number, EvalError> {
    return evaluate(ast);
  }

  evaluateText(text: string): Result<number, ExpressionError> {
    const parsed = parse(text);
    if (!parsed.ok) return parsed;
    return evaluate(parsed.value);
  }
}
