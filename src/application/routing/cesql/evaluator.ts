import type { ArithmeticOperator, CesqlValue, ComparisonOperator, Expression } from './ast.js';
import { castLike, castToBoolean, castToInteger, castToString } from './casts.js';
import { CesqlEvaluationError } from './errors.js';
import { FUNCTIONS } from './functions.js';

/** Resolves an attribute name to its value, `undefined` when absent. */
export type AttributeLookup = (name: string) => CesqlValue | undefined;

export function evaluate(expression: Expression, lookup: AttributeLookup): CesqlValue {
  switch (expression.type) {
    case 'Literal':
      return expression.value;

    case 'Attribute': {
      const value = lookup(expression.name);
      if (value === undefined) {
        throw new CesqlEvaluationError(`Attribute '${expression.name}' is not present`);
      }
      return value;
    }

    case 'Exists':
      return lookup(expression.name) !== undefined;

    case 'Not':
      return !castToBoolean(evaluate(expression.operand, lookup));

    case 'Negate':
      return -castToInteger(evaluate(expression.operand, lookup));

    case 'Logical':
      return evaluateLogical(expression.operator, expression.left, expression.right, lookup);

    case 'Comparison':
      return compare(expression.operator, evaluate(expression.left, lookup), evaluate(expression.right, lookup));

    case 'Arithmetic':
      return arithmetic(
        expression.operator,
        castToInteger(evaluate(expression.left, lookup)),
        castToInteger(evaluate(expression.right, lookup)),
      );

    case 'Like': {
      const subject = castToString(evaluate(expression.operand, lookup));
      const matched = likeToRegExp(expression.pattern).test(subject);
      return expression.negated ? !matched : matched;
    }

    case 'In': {
      const subject = evaluate(expression.operand, lookup);
      const found = expression.items.some((item) => equals(subject, evaluate(item, lookup)));
      return expression.negated ? !found : found;
    }

    case 'Call': {
      const fn = FUNCTIONS.get(expression.name);
      if (fn === undefined) {
        throw new CesqlEvaluationError(`Unknown function '${expression.name}'`);
      }
      return fn.call(expression.args.map((arg) => evaluate(arg, lookup)));
    }
  }
}

function evaluateLogical(
  operator: 'AND' | 'OR' | 'XOR',
  left: Expression,
  right: Expression,
  lookup: AttributeLookup,
): boolean {
  const l = castToBoolean(evaluate(left, lookup));
  // short-circuit: the right side may reference attributes that are absent
  if (operator === 'AND' && !l) return false;
  if (operator === 'OR' && l) return true;
  const r = castToBoolean(evaluate(right, lookup));
  if (operator === 'XOR') return l !== r;
  return r;
}

/** The right operand is cast to the left operand's type. */
function equals(left: CesqlValue, right: CesqlValue): boolean {
  return left === castLike(right, left);
}

function compare(operator: ComparisonOperator, left: CesqlValue, right: CesqlValue): boolean {
  switch (operator) {
    case '=':
      return equals(left, right);
    case '!=':
    case '<>':
      return !equals(left, right);
    case '<':
      return order(left, right) < 0;
    case '<=':
      return order(left, right) <= 0;
    case '>':
      return order(left, right) > 0;
    case '>=':
      return order(left, right) >= 0;
  }
}

/** Two strings compare lexically, anything else as integers. */
function order(left: CesqlValue, right: CesqlValue): number {
  if (typeof left === 'string' && typeof right === 'string') {
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }
  return castToInteger(left) - castToInteger(right);
}

function arithmetic(operator: ArithmeticOperator, left: number, right: number): number {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0) throw new CesqlEvaluationError('Division by zero');
      return Math.trunc(left / right);
    case '%':
      if (right === 0) throw new CesqlEvaluationError('Division by zero');
      return left % right;
  }
}

/**
 * `%` matches any run of characters, `_` exactly one;
 * a backslash makes the next character literal.
 */
export function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === '\\' && i + 1 < pattern.length) {
      source += escapeRegExp(pattern.charAt(i + 1));
      i++;
    } else if (char === '%') {
      source += '.*';
    } else if (char === '_') {
      source += '.';
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`, 's');
}

function escapeRegExp(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}
