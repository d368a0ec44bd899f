import type { CesqlValue } from './ast.js';
import { CesqlEvaluationError } from './errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function castToString(value: CesqlValue): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}

/** Strings must hold a base-10 integer; booleans do not convert. */
export function castToInteger(value: CesqlValue): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  throw new CesqlEvaluationError(`Cannot cast ${JSON.stringify(value)} to integer`);
}

/** Strings convert case-insensitively from "true"/"false"; integers do not convert. */
export function castToBoolean(value: CesqlValue): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  throw new CesqlEvaluationError(`Cannot cast ${JSON.stringify(value)} to boolean`);
}

/** Casts `value` to the type of `target`. */
export function castLike(value: CesqlValue, target: CesqlValue): CesqlValue {
  if (typeof target === 'string') return castToString(value);
  if (typeof target === 'number') return castToInteger(value);
  return castToBoolean(value);
}
