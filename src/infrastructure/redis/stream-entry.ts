import { z } from 'zod';

/**
 * XREADGROUP reply: [[stream, [[id, [field, value, ...]], ...]], ...].
 * Field lists are `null` for entries deleted while pending.
 */
export const readGroupReplySchema = z
  .array(
    z.tuple([
      z.string(),
      z.array(z.tuple([z.string(), z.array(z.string()).nullable()])),
    ]),
  )
  .nullable();

export type ReadGroupReply = z.infer<typeof readGroupReplySchema>;

/** Field names with a fixed meaning; every other field is a header. */
export const KEY_FIELD = 'key';
export const VALUE_FIELD = 'value';

export interface ParsedStreamEntry {
  key?: string | undefined;
  value: string;
  headers: Record<string, string>;
}

/**
 * Parses a raw Redis Stream entry.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 * A missing `value` field yields an empty value, which fails decoding
 * downstream rather than here.
 */
export function parseStreamEntry(fields: readonly string[]): ParsedStreamEntry {
  const headers: Record<string, string> = {};
  let key: string | undefined;
  let value = '';

  for (let i = 0; i + 1 < fields.length; i += 2) {
    const name = fields[i];
    const fieldValue = fields[i + 1];
    if (name === undefined || fieldValue === undefined) continue;

    if (name === KEY_FIELD) key = fieldValue;
    else if (name === VALUE_FIELD) value = fieldValue;
    else headers[name.toLowerCase()] = fieldValue;
  }

  return { key, value, headers };
}

/** Flattens an outbound record into XADD field arguments. */
export function toStreamFields(key: string, value: string, headers: Readonly<Record<string, string>>): string[] {
  const fields = [KEY_FIELD, key, VALUE_FIELD, value];
  for (const [name, headerValue] of Object.entries(headers)) {
    if (name === KEY_FIELD || name === VALUE_FIELD) continue;
    fields.push(name, headerValue);
  }
  return fields;
}
