/** Category of sink an output event is sent to. */
export const DESTINATION_KINDS = ['broker', 'queue', 'http', 'discard'] as const;

export type DestinationKind = (typeof DESTINATION_KINDS)[number];

/**
 * Where a derived event goes. Produced by the Core once per output
 * event and consumed once by the output router; never persisted.
 */
export interface OutputDestination {
  readonly kind: DestinationKind;
  /** Topic (stream key), queue name or URL depending on `kind`. */
  readonly target: string;
  /** Named broker cluster; the primary broker when absent. */
  readonly cluster?: string | undefined;
}

/**
 * Broker connection settings, fetched once from the Core at startup and
 * immutable for the engine's lifetime.
 */
export interface ConnectionConfig {
  readonly broker: string;
  readonly topic: string;
  readonly group: string;
}

/** Transient record of one failed invocation, passed to the retry decision. */
export interface RetryAttempt {
  readonly errorMessage: string;
  readonly attemptNumber: number;
}
