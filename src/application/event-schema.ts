import { z } from 'zod';
import { isContextAttribute } from '../domain/index.js';

/** Extension attribute names: lowercase letters and digits only. */
const EXTENSION_NAME = /^[a-z0-9]+$/;

const extensionValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Zod schema for a CloudEvents 1.0 envelope in its JSON form.
 *
 * - `specversion`, `id`, `type` and `source` are required and non-empty.
 * - `time` must be an RFC 3339 timestamp.
 * - Any other top-level member is an extension attribute; it must carry a
 *   scalar value and a lowercase alphanumeric name. That also rejects
 *   `data_base64`, which this runtime does not accept.
 */
export const cloudEventSchema = z
  .object({
    specversion: z.literal('1.0'),
    id: z.string().min(1),
    type: z.string().min(1),
    source: z.string().min(1),
    subject: z.string().min(1).optional(),
    time: z.string().datetime({ offset: true, message: 'Must be an RFC 3339 timestamp' }).optional(),
    datacontenttype: z.string().min(1).optional(),
    dataschema: z.string().min(1).optional(),
    data: z.unknown().optional(),
  })
  .catchall(extensionValueSchema)
  .superRefine((value, ctx) => {
    for (const key of Object.keys(value)) {
      if (key === 'data' || isContextAttribute(key)) continue;
      if (!EXTENSION_NAME.test(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Invalid extension attribute name "${key}"`,
        });
      }
    }
  });

export type CloudEventInput = z.infer<typeof cloudEventSchema>;

/**
 * Schema for an in-memory Event object, as a handler returns it.
 * Extensions live in their own map and may not shadow context attributes.
 */
export const eventObjectSchema = z.object({
  specversion: z.literal('1.0'),
  id: z.string().min(1),
  type: z.string().min(1),
  source: z.string().min(1),
  subject: z.string().min(1).optional(),
  time: z.string().datetime({ offset: true, message: 'Must be an RFC 3339 timestamp' }).optional(),
  datacontenttype: z.string().min(1).optional(),
  dataschema: z.string().min(1).optional(),
  data: z.unknown().optional(),
  extensions: z
    .record(z.string().regex(EXTENSION_NAME).refine((name) => !isContextAttribute(name) && name !== 'data'), extensionValueSchema),
});
