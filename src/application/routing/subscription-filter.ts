import { type AttributeLookup, compile } from './cesql/index.js';
import type { AttributeMatch, FilterSpec } from './routing-schema.js';

/** A compiled filter: true when the event's attributes satisfy it. */
export type EventPredicate = (lookup: AttributeLookup) => boolean;

/**
 * Compiles a Subscriptions API filter tree into a predicate.
 *
 * String dialects compare the attribute's string form. A missing
 * attribute never matches `exact`, `prefix` or `suffix`.
 *
 * @throws CesqlSyntaxError when a `sql` filter does not parse.
 */
export function compileFilter(filter: FilterSpec): EventPredicate {
  if ('exact' in filter) {
    return attributeMatcher(filter.exact, (actual, expected) => actual === expected);
  }
  if ('prefix' in filter) {
    return attributeMatcher(filter.prefix, (actual, expected) => actual.startsWith(expected));
  }
  if ('suffix' in filter) {
    return attributeMatcher(filter.suffix, (actual, expected) => actual.endsWith(expected));
  }
  if ('all' in filter) {
    const predicates = filter.all.map(compileFilter);
    return (lookup) => predicates.every((predicate) => predicate(lookup));
  }
  if ('any' in filter) {
    const predicates = filter.any.map(compileFilter);
    return (lookup) => predicates.some((predicate) => predicate(lookup));
  }
  if ('not' in filter) {
    const inner = compileFilter(filter.not);
    return (lookup) => !inner(lookup);
  }
  const expression = compile(filter.sql);
  return (lookup) => expression.test(lookup);
}

function attributeMatcher(
  match: AttributeMatch,
  test: (actual: string, expected: string) => boolean,
): EventPredicate {
  const entries = Object.entries(match).map(([name, value]) => [name.toLowerCase(), String(value)] as const);
  return (lookup) =>
    entries.every(([name, expected]) => {
      const actual = lookup(name);
      return actual !== undefined && test(String(actual), expected);
    });
}
