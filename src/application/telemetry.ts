import type { RouteResult } from './output-router.js';

/** Counters the engine keeps while it runs. */
export interface TelemetrySnapshot {
  received: number;
  decode_failures: number;
  handler_successes: number;
  handler_failures: number;
  retry_decisions: number;
  retries_requested: number;
  published: number;
  discarded: number;
  unsupported_destinations: number;
  routing_failures: number;
  transport_failures: number;
  /** Per event type: how many events of that type reached the handler. */
  by_event_type: Record<string, number>;
}

/**
 * In-memory counters for one engine instance.
 *
 * Single-threaded increments only; `snapshot()` returns a copy, so
 * readers (the status routes) never observe a later mutation.
 */
export class EngineTelemetry {
  private readonly counters: Omit<TelemetrySnapshot, 'by_event_type'> = {
    received: 0,
    decode_failures: 0,
    handler_successes: 0,
    handler_failures: 0,
    retry_decisions: 0,
    retries_requested: 0,
    published: 0,
    discarded: 0,
    unsupported_destinations: 0,
    routing_failures: 0,
    transport_failures: 0,
  };

  private readonly eventTypes: Map<string, number> = new Map();

  recordReceived(): void {
    this.counters.received++;
  }

  recordDecodeFailure(): void {
    this.counters.decode_failures++;
  }

  recordProcessed(eventType: string, success: boolean): void {
    this.eventTypes.set(eventType, (this.eventTypes.get(eventType) ?? 0) + 1);
    if (success) {
      this.counters.handler_successes++;
    } else {
      this.counters.handler_failures++;
    }
  }

  recordRetryDecision(retry: boolean): void {
    this.counters.retry_decisions++;
    if (retry) this.counters.retries_requested++;
  }

  recordRouted(result: RouteResult): void {
    switch (result) {
      case 'published':   this.counters.published++; break;
      case 'discarded':   this.counters.discarded++; break;
      case 'unsupported': this.counters.unsupported_destinations++; break;
    }
  }

  recordRoutingFailure(): void {
    this.counters.routing_failures++;
  }

  recordTransportFailure(): void {
    this.counters.transport_failures++;
  }

  snapshot(): TelemetrySnapshot {
    return {
      ...this.counters,
      by_event_type: Object.fromEntries(this.eventTypes),
    };
  }
}
