import type { Event, HandlerOutcome } from '../domain/index.js';
import { HandlerShapeError, ack, ackWithOutput, cloneEvent, createEvent, failure, toError } from '../domain/index.js';
import { eventObjectSchema } from './event-schema.js';

/** Handles an event; throwing (or rejecting) reports a failure. */
export type SimpleHandlerFn = (event: Event) => void | Promise<void>;

/**
 * Handles an event and may produce one derived event.
 * `null` or `undefined` means "no output".
 */
export type OutputHandlerFn = (event: Event) => Event | null | undefined | Promise<Event | null | undefined>;

/**
 * The two recognised handler shapes, as a closed tagged variant.
 *
 * A function's return type is not visible at run time, so the shape is
 * declared when the handler is wrapped rather than guessed per call.
 */
export type HandlerDefinition =
  | { readonly shape: 'simple'; readonly fn: SimpleHandlerFn }
  | { readonly shape: 'output'; readonly fn: OutputHandlerFn };

export type HandlerShape = HandlerDefinition['shape'];

export function simpleHandler(fn: SimpleHandlerFn): HandlerDefinition {
  return { shape: 'simple', fn };
}

export function outputHandler(fn: OutputHandlerFn): HandlerDefinition {
  return { shape: 'output', fn };
}

/** Uniform invocation entry point handed to the engine. */
export interface AdaptedHandler {
  readonly shape: HandlerShape;
  invoke(event: Event): Promise<HandlerOutcome>;
}

/**
 * Checks the shape of `value` once and returns the uniform invoker.
 *
 * @throws HandlerShapeError when `value` is not a wrapped handler of a
 * recognised shape. Bare functions are rejected too: whether they produce
 * output cannot be told from the function value.
 */
export function adaptHandler(value: unknown): AdaptedHandler {
  if (typeof value === 'function') {
    throw new HandlerShapeError(
      'Handler must be wrapped with simpleHandler() or outputHandler() to declare whether it produces output events',
    );
  }
  if (!isHandlerDefinition(value)) {
    throw new HandlerShapeError(
      'Handler must be a definition of shape "simple" or "output" with a function to invoke',
    );
  }

  switch (value.shape) {
    case 'simple': {
      const fn = value.fn;
      return { shape: 'simple', invoke: (event) => invokeSimple(fn, event) };
    }
    case 'output': {
      const fn = value.fn;
      return { shape: 'output', invoke: (event) => invokeOutput(fn, event) };
    }
  }
}

function isHandlerDefinition(value: unknown): value is HandlerDefinition {
  if (value === null || typeof value !== 'object') return false;
  const shape: unknown = Reflect.get(value, 'shape');
  return (shape === 'simple' || shape === 'output') && typeof Reflect.get(value, 'fn') === 'function';
}

async function invokeSimple(fn: SimpleHandlerFn, event: Event): Promise<HandlerOutcome> {
  try {
    await fn(cloneEvent(event));
    return ack();
  } catch (err: unknown) {
    return failure(toError(err));
  }
}

/** An error from the handler wins over any output it produced. */
async function invokeOutput(fn: OutputHandlerFn, event: Event): Promise<HandlerOutcome> {
  let produced: unknown;
  try {
    produced = await fn(cloneEvent(event));
  } catch (err: unknown) {
    return failure(toError(err));
  }

  if (produced === null || produced === undefined) return ack();

  const parsed = eventObjectSchema.safeParse(produced);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return failure(new Error(`Handler returned an invalid event: ${detail}`));
  }

  let output: Event;
  try {
    output = createEvent(structuredClone(parsed.data));
  } catch (err: unknown) {
    return failure(new Error(`Handler returned an event that cannot be copied: ${toError(err).message}`, { cause: err }));
  }
  return ackWithOutput(output);
}
