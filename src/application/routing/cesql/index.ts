import type { CesqlValue, Expression } from './ast.js';
import { castToBoolean } from './casts.js';
import { CesqlEvaluationError } from './errors.js';
import { type AttributeLookup, evaluate } from './evaluator.js';
import { parse } from './parser.js';

export type { CesqlValue, Expression } from './ast.js';
export { CesqlEvaluationError, CesqlSyntaxError } from './errors.js';
export type { AttributeLookup } from './evaluator.js';
export { evaluate, likeToRegExp } from './evaluator.js';
export { Parser, parse } from './parser.js';
export { tokenize } from './lexer.js';

/** A parsed expression, ready to be tested against many events. */
export interface CompiledExpression {
  readonly source: string;
  readonly ast: Expression;
  /** `true` only when the expression evaluates to boolean true. */
  test(lookup: AttributeLookup): boolean;
}

/**
 * Parses once, evaluates many times. Evaluation errors (a missing
 * attribute, an impossible cast) make `test` return false.
 *
 * @throws CesqlSyntaxError when `source` does not parse.
 */
export function compile(source: string): CompiledExpression {
  const ast = parse(source);
  return {
    source,
    ast,
    test(lookup: AttributeLookup): boolean {
      try {
        return castToBoolean(evaluate(ast, lookup));
      } catch (err: unknown) {
        if (err instanceof CesqlEvaluationError) return false;
        throw err;
      }
    },
  };
}
