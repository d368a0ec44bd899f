import type { CesqlValue } from './ast.js';
import { castToInteger, castToString } from './casts.js';

export interface BuiltinFunction {
  readonly minArgs: number;
  readonly maxArgs: number;
  call(args: readonly CesqlValue[]): CesqlValue;
}

function first(args: readonly CesqlValue[]): CesqlValue {
  const [value] = args;
  if (value === undefined) throw new Error('Missing argument');
  return value;
}

/** Built-in functions, keyed by upper-cased name. */
export const FUNCTIONS: ReadonlyMap<string, BuiltinFunction> = new Map<string, BuiltinFunction>([
  ['LENGTH', { minArgs: 1, maxArgs: 1, call: (args) => castToString(first(args)).length }],
  ['LOWER', { minArgs: 1, maxArgs: 1, call: (args) => castToString(first(args)).toLowerCase() }],
  ['UPPER', { minArgs: 1, maxArgs: 1, call: (args) => castToString(first(args)).toUpperCase() }],
  ['CONCAT', { minArgs: 0, maxArgs: Number.POSITIVE_INFINITY, call: (args) => args.map(castToString).join('') }],
  ['ABS', { minArgs: 1, maxArgs: 1, call: (args) => Math.abs(castToInteger(first(args))) }],
]);
