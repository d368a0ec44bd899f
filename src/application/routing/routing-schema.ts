import { z } from 'zod';
import { DESTINATION_KINDS } from '../../domain/index.js';

/**
 * Zod schemas for routing.yaml.
 *
 * routing:
 *   default: { type: broker, target: events-out }
 *   rules:
 *     - name: big-orders
 *       filter: { sql: "type = 'order.created' AND amount > 100" }
 *       destination: { type: broker, target: big-orders, cluster: analytics }
 */

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/** attribute name → expected value; at least one entry. */
const attributeMapSchema = z
  .record(z.string().min(1), attributeValueSchema)
  .refine((map) => Object.keys(map).length > 0, { message: 'At least one attribute must be given' });

export type AttributeMatch = z.infer<typeof attributeMapSchema>;

/** One filter dialect per object, as in the CloudEvents Subscriptions API. */
export type FilterSpec =
  | { exact: AttributeMatch }
  | { prefix: AttributeMatch }
  | { suffix: AttributeMatch }
  | { all: FilterSpec[] }
  | { any: FilterSpec[] }
  | { not: FilterSpec }
  | { sql: string };

export const filterSchema: z.ZodType<FilterSpec> = z.lazy(() =>
  z.union([
    z.object({ exact: attributeMapSchema }).strict(),
    z.object({ prefix: attributeMapSchema }).strict(),
    z.object({ suffix: attributeMapSchema }).strict(),
    z.object({ all: z.array(filterSchema).min(1) }).strict(),
    z.object({ any: z.array(filterSchema).min(1) }).strict(),
    z.object({ not: filterSchema }).strict(),
    z.object({ sql: z.string().min(1) }).strict(),
  ]),
);

/**
 * `target` may be omitted only for `discard`.
 * `cluster` names an entry of the broker cluster map.
 */
export const destinationSchema = z
  .object({
    type: z.enum(DESTINATION_KINDS),
    target: z.string().optional().default(''),
    cluster: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((destination, ctx) => {
    if (destination.type !== 'discard' && destination.target.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['target'],
        message: `A ${destination.type} destination needs a target`,
      });
    }
  });

export type DestinationInput = z.infer<typeof destinationSchema>;

export const routingRuleSchema = z
  .object({
    name: z.string().min(1),
    filter: filterSchema.optional(),
    destination: destinationSchema,
  })
  .strict();

export type RoutingRuleInput = z.infer<typeof routingRuleSchema>;

export const routingFileSchema = z.object({
  routing: z
    .object({
      default: destinationSchema.optional(),
      rules: z.array(routingRuleSchema).optional().default([]),
    })
    .strict(),
});

export type RoutingFile = z.infer<typeof routingFileSchema>;
