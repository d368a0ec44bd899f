import type { Event, ExtensionValue } from '../domain/index.js';
import { DecodeError, createEvent, isContextAttribute } from '../domain/index.js';
import type { BrokerMessage } from './broker.js';
import { cloudEventSchema } from './event-schema.js';

export const STRUCTURED_CONTENT_TYPE = 'application/cloudevents+json';

/** Header prefix carrying context attributes in binary content mode. */
const BINARY_HEADER_PREFIX = 'ce_';

export interface EventCodecOptions {
  /**
   * Wrap messages that are neither structured nor binary CloudEvents into a
   * generic `stream.message` event instead of rejecting them.
   */
  wrapRawMessages?: boolean;
}

/** Decodes broker messages into events and encodes events for publishing. */
export interface EventCodec {
  decode(message: BrokerMessage): Event;
  encode(event: Event): string;
}

export function createEventCodec(options: EventCodecOptions = {}): EventCodec {
  const wrapRaw = options.wrapRawMessages ?? false;
  return {
    decode: (message) => decodeMessage(message, wrapRaw),
    encode: encodeEvent,
  };
}

/**
 * Turns a broker message into a frozen event.
 *
 * Tries, in order:
 * 1. Binary mode: attributes in `ce_*` headers, payload in the value.
 * 2. Structured mode: the whole envelope as JSON in the value.
 * 3. Raw wrapping, when enabled.
 *
 * @throws DecodeError when no mode applies.
 */
export function decodeMessage(message: BrokerMessage, wrapRaw = false): Event {
  try {
    const event = isBinaryMode(message) ? decodeBinary(message) : decodeStructured(message);
    return deepFreeze(event);
  } catch (err: unknown) {
    if (!wrapRaw) throw err;
    return deepFreeze(wrapRawMessage(message));
  }
}

/**
 * Canonical JSON form: required attributes first, then optional
 * attributes, then extensions, then `data`.
 */
export function encodeEvent(event: Event): string {
  const out: Record<string, unknown> = {
    specversion: event.specversion,
    id: event.id,
    source: event.source,
    type: event.type,
  };
  if (event.subject !== undefined) out['subject'] = event.subject;
  if (event.time !== undefined) out['time'] = event.time;
  if (event.datacontenttype !== undefined) out['datacontenttype'] = event.datacontenttype;
  if (event.dataschema !== undefined) out['dataschema'] = event.dataschema;
  for (const [name, value] of Object.entries(event.extensions)) {
    out[name] = value;
  }
  if (event.data !== undefined) out['data'] = event.data;
  return JSON.stringify(out);
}

function isBinaryMode(message: BrokerMessage): boolean {
  return message.headers['ce_specversion'] !== undefined || message.headers['ce_id'] !== undefined;
}

function decodeStructured(message: BrokerMessage): Event {
  let body: unknown;
  try {
    body = JSON.parse(message.value);
  } catch (err: unknown) {
    throw new DecodeError('Message value is not valid JSON', message.id, { cause: err });
  }
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    throw new DecodeError('Message value is not a JSON object', message.id);
  }
  return fromEnvelope(body, message.id);
}

function decodeBinary(message: BrokerMessage): Event {
  const envelope: Record<string, unknown> = {};

  for (const [header, value] of Object.entries(message.headers)) {
    if (!header.startsWith(BINARY_HEADER_PREFIX)) continue;
    envelope[header.slice(BINARY_HEADER_PREFIX.length)] = value;
  }

  const contentType = message.headers['content-type'];
  if (contentType !== undefined) envelope['datacontenttype'] = contentType;

  if (message.value !== '') {
    if (contentType === undefined || isJsonContentType(contentType)) {
      try {
        envelope['data'] = JSON.parse(message.value);
      } catch (err: unknown) {
        throw new DecodeError('Binary-mode payload is not valid JSON', message.id, { cause: err });
      }
    } else {
      envelope['data'] = message.value;
    }
  }

  return fromEnvelope(envelope, message.id);
}

function fromEnvelope(envelope: object, messageId: string): Event {
  const parsed = cloudEventSchema.safeParse(envelope);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(`Invalid CloudEvent: ${detail}`, messageId, { cause: parsed.error });
  }

  const raw: Record<string, unknown> = parsed.data;
  const extensions: Record<string, ExtensionValue> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (name === 'data' || isContextAttribute(name)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      extensions[name] = value;
    }
  }

  return createEvent({
    id: parsed.data.id,
    type: parsed.data.type,
    source: parsed.data.source,
    specversion: parsed.data.specversion,
    subject: parsed.data.subject,
    time: parsed.data.time,
    datacontenttype: parsed.data.datacontenttype,
    dataschema: parsed.data.dataschema,
    data: raw['data'],
    extensions,
  });
}

function wrapRawMessage(message: BrokerMessage): Event {
  const json = parseJson(message.value);
  return createEvent({
    id: message.key ?? message.id,
    source: 'stream',
    type: 'stream.message',
    datacontenttype: json.ok ? 'application/json' : 'text/plain',
    data: json.ok ? json.value : message.value,
  });
}

function isJsonContentType(contentType: string): boolean {
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return mediaType === 'application/json' || mediaType.endsWith('+json');
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
