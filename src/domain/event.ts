/**
 * Core domain types for the event envelope.
 *
 * The envelope follows the CloudEvents 1.0 attribute set. It carries no
 * framework dependencies and is used uniformly on input and output.
 */

/** Values an extension attribute may hold. */
export type ExtensionValue = string | number | boolean;

/** Extension attributes keyed by their (lowercase alphanumeric) name. */
export type EventExtensions = Readonly<Record<string, ExtensionValue>>;

/**
 * Canonical Event entity.
 *
 * Events are immutable: the codec freezes every event it produces and the
 * engine hands handlers a fresh copy, so no two components share one.
 */
export interface Event {
  readonly specversion: string;
  readonly id: string;
  readonly type: string;
  readonly source: string;
  readonly subject?: string | undefined;
  readonly time?: string | undefined; // RFC 3339
  readonly datacontenttype?: string | undefined;
  readonly dataschema?: string | undefined;
  readonly data?: unknown;
  readonly extensions: EventExtensions;
}

/** Fields a handler supplies when building an event. */
export interface EventInit {
  id: string;
  type: string;
  source: string;
  specversion?: string;
  subject?: string;
  time?: string;
  datacontenttype?: string;
  dataschema?: string;
  data?: unknown;
  extensions?: Record<string, ExtensionValue>;
}

export const SPEC_VERSION = '1.0';

/** Names of the context attributes defined by the envelope itself. */
export const CONTEXT_ATTRIBUTES = [
  'specversion',
  'id',
  'type',
  'source',
  'subject',
  'time',
  'datacontenttype',
  'dataschema',
] as const;

export type ContextAttribute = (typeof CONTEXT_ATTRIBUTES)[number];

const CONTEXT_ATTRIBUTE_SET: ReadonlySet<string> = new Set(CONTEXT_ATTRIBUTES);

export function isContextAttribute(name: string): name is ContextAttribute {
  return CONTEXT_ATTRIBUTE_SET.has(name);
}

/**
 * Builds an event, filling `specversion` and an empty extension map.
 * Optional attributes that are not supplied are left out entirely.
 */
export function createEvent(init: EventInit): Event {
  const event: {
    -readonly [K in keyof Event]: Event[K];
  } = {
    specversion: init.specversion ?? SPEC_VERSION,
    id: init.id,
    type: init.type,
    source: init.source,
    extensions: { ...(init.extensions ?? {}) },
  };

  if (init.subject !== undefined) event.subject = init.subject;
  if (init.time !== undefined) event.time = init.time;
  if (init.datacontenttype !== undefined) event.datacontenttype = init.datacontenttype;
  if (init.dataschema !== undefined) event.dataschema = init.dataschema;
  if (init.data !== undefined) event.data = init.data;

  return event;
}

/**
 * Builds an event derived from `input`. The `source` of the input is
 * inherited when the caller does not set one.
 */
export function deriveEvent(
  input: Event,
  init: Omit<EventInit, 'source'> & { source?: string },
): Event {
  return createEvent({ ...init, source: init.source ?? input.source });
}

/** Deep copy of an event, so callers never share mutable data. */
export function cloneEvent(event: Event): Event {
  return structuredClone(event);
}
