import type { Event } from './event.js';

/**
 * Result of a single handler invocation.
 *
 * Outcomes are synchronous return values of the handler adapter; the
 * engine holds at most one at a time and never queues them.
 */
export type HandlerOutcome =
  | { readonly kind: 'ack' }
  | { readonly kind: 'ack-with-output'; readonly event: Event }
  | { readonly kind: 'failure'; readonly error: Error };

export const ack = (): HandlerOutcome => ({ kind: 'ack' });

export const ackWithOutput = (event: Event): HandlerOutcome => ({ kind: 'ack-with-output', event });

export const failure = (error: Error): HandlerOutcome => ({ kind: 'failure', error });
