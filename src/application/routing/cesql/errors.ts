/**
 * Error raised while compiling an expression (lexing or parsing).
 * Compile errors reject the routing file that carries the expression.
 */
export class CesqlSyntaxError extends Error {
  /** The expression that failed to compile */
  readonly expression: string;
  /** Character offset where the error was detected */
  readonly offset: number;

  constructor(message: string, expression: string, offset: number) {
    super(`${message} at offset ${offset} in "${expression}"`);
    this.name = 'CesqlSyntaxError';
    this.expression = expression;
    this.offset = offset;
  }
}

/**
 * Error raised while evaluating against an event: missing attribute,
 * impossible cast, division by zero. A filter whose expression fails to
 * evaluate does not match.
 */
export class CesqlEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CesqlEvaluationError';
  }
}
