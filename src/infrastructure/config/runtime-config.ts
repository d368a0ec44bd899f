import { z } from 'zod';
import { ConnectionConfigError } from '../../domain/index.js';

/** Process configuration, read once from the environment at startup. */
export interface RuntimeConfig {
  readonly brokerUrl: string;
  readonly topic: string;
  readonly consumerGroup: string;
  readonly consumerName: string;
  readonly outputTopic: string;
  /** cluster name → broker URL, for output destinations naming a cluster */
  readonly clusters: Readonly<Record<string, string>>;
  readonly pollTimeoutMs: number;
  readonly flushTimeoutMs: number;
  readonly requireRouting: boolean;
  readonly wrapRawMessages: boolean;
  readonly retry: {
    readonly maxAttempts: number;
    readonly baseBackoffMs: number;
    readonly maxBackoffMs: number;
  };
  /** Status server port; `null` keeps it off. */
  readonly statusPort: number | null;
  readonly logLevel: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const nonNegativeInt = z.coerce.number().int().min(0);

/**
 * `name=url,name=url`. Entries are trimmed; an entry without `=` or
 * with an empty side is rejected.
 */
const clustersSchema = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const clusters: Record<string, string> = {};
    for (const entry of value.split(',')) {
      const trimmed = entry.trim();
      if (trimmed === '') continue;
      const eq = trimmed.indexOf('=');
      const name = trimmed.slice(0, eq).trim();
      const url = trimmed.slice(eq + 1).trim();
      if (eq <= 0 || name === '' || url === '') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Malformed cluster entry "${trimmed}"` });
        return z.NEVER;
      }
      clusters[name] = url;
    }
    return clusters;
  });

const envSchema = z.object({
  BROKER_URL: z.string().min(1).default('redis://localhost:6379'),
  TOPIC: z.string().min(1).default('events'),
  CONSUMER_GROUP: z.string().min(1).default('eventfn'),
  CONSUMER_NAME: z.string().min(1).optional(),
  OUTPUT_TOPIC: z.string().min(1).default('events-out'),
  BROKER_CLUSTERS: clustersSchema,
  POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(100),
  FLUSH_TIMEOUT_MS: nonNegativeInt.default(5000),
  REQUIRE_ROUTING: flag,
  WRAP_RAW_MESSAGES: flag,
  RETRY_MAX_ATTEMPTS: nonNegativeInt.default(0),
  RETRY_BASE_BACKOFF_MS: nonNegativeInt.default(0),
  RETRY_MAX_BACKOFF_MS: nonNegativeInt.default(30000),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * Reads the runtime configuration from `env`.
 * Empty strings count as unset, so `TOPIC=` falls back to the default.
 *
 * @throws ConnectionConfigError listing every invalid variable.
 */
export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConnectionConfigError(`Invalid environment configuration: ${detail}`);
  }

  const vars = parsed.data;
  return Object.freeze({
    brokerUrl: vars.BROKER_URL,
    topic: vars.TOPIC,
    consumerGroup: vars.CONSUMER_GROUP,
    consumerName: vars.CONSUMER_NAME ?? `worker-${process.pid}`,
    outputTopic: vars.OUTPUT_TOPIC,
    clusters: Object.freeze(vars.BROKER_CLUSTERS),
    pollTimeoutMs: vars.POLL_TIMEOUT_MS,
    flushTimeoutMs: vars.FLUSH_TIMEOUT_MS,
    requireRouting: vars.REQUIRE_ROUTING,
    wrapRawMessages: vars.WRAP_RAW_MESSAGES,
    retry: Object.freeze({
      maxAttempts: vars.RETRY_MAX_ATTEMPTS,
      baseBackoffMs: vars.RETRY_BASE_BACKOFF_MS,
      maxBackoffMs: vars.RETRY_MAX_BACKOFF_MS,
    }),
    statusPort: vars.STATUS_PORT ?? null,
    logLevel: vars.LOG_LEVEL,
  });
}
