import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { OutputDestination } from '../../domain/index.js';
import { RoutingConfigError } from '../../domain/index.js';
import type { AttributeLookup, CesqlValue } from './cesql/index.js';
import { type DestinationInput, type RoutingFile, routingFileSchema } from './routing-schema.js';
import { type EventPredicate, compileFilter } from './subscription-filter.js';

export interface CompiledRoute {
  readonly name: string;
  readonly matches: EventPredicate;
  readonly destination: OutputDestination;
}

/** Which rule (if any) picked the destination. */
export interface RouteDecision {
  readonly destination: OutputDestination;
  /** `null` when the table's default applied. */
  readonly rule: string | null;
}

/**
 * Ordered routing rules: the first rule whose filter matches wins, then
 * the file's default. A rule without a filter matches every event.
 */
export class RoutingTable {
  readonly routes: readonly CompiledRoute[];
  readonly fallback: OutputDestination | null;

  constructor(routes: readonly CompiledRoute[], fallback: OutputDestination | null) {
    this.routes = routes;
    this.fallback = fallback;
  }

  /** `null` when no rule matched and the file declares no default. */
  resolve(lookup: AttributeLookup): RouteDecision | null {
    for (const route of this.routes) {
      if (route.matches(lookup)) {
        return { destination: route.destination, rule: route.name };
      }
    }
    return this.fallback === null ? null : { destination: this.fallback, rule: null };
  }

  static fromFile(file: RoutingFile): RoutingTable {
    const routes = file.routing.rules.map(
      (rule): CompiledRoute => ({
        name: rule.name,
        matches: rule.filter === undefined ? () => true : compileFilter(rule.filter),
        destination: toDestination(rule.destination),
      }),
    );
    const fallback = file.routing.default === undefined ? null : toDestination(file.routing.default);
    return new RoutingTable(routes, fallback);
  }
}

function toDestination(input: DestinationInput): OutputDestination {
  return Object.freeze({ kind: input.type, target: input.target, cluster: input.cluster });
}

/**
 * Reads, parses and validates a routing file, compiling every filter.
 *
 * @throws RoutingConfigError for an unreadable file, invalid YAML, a
 * schema violation or a `sql` filter that does not parse.
 */
export async function loadRoutingTable(path: string): Promise<RoutingTable> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new RoutingConfigError('Cannot read routing file', path, { cause: err });
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err: unknown) {
    throw new RoutingConfigError('Routing file is not valid YAML', path, { cause: err });
  }

  const parsed = routingFileSchema.safeParse(document);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new RoutingConfigError(`Invalid routing file: ${detail}`, path);
  }

  try {
    return RoutingTable.fromFile(parsed.data);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RoutingConfigError(`Invalid routing filter: ${message}`, path, { cause: err });
  }
}

/**
 * Attribute lookup over a serialised envelope. Only top-level scalar
 * members are attributes; `data` is not.
 *
 * @throws Error when `eventJson` is not a JSON object.
 */
export function envelopeLookup(eventJson: string): AttributeLookup {
  const envelope: unknown = JSON.parse(eventJson);
  if (envelope === null || typeof envelope !== 'object' || Array.isArray(envelope)) {
    throw new Error('Event envelope is not a JSON object');
  }

  const attributes = new Map<string, CesqlValue>();
  for (const [name, value] of Object.entries(envelope)) {
    if (name === 'data' || name === 'data_base64') continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      attributes.set(name, value);
    }
  }
  return (name) => attributes.get(name);
}
