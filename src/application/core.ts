import type { ConnectionConfig, OutputDestination } from '../domain/index.js';

/**
 * Capability contract of the decision backend.
 *
 * The dispatch engine obtains configuration and every retry or routing
 * decision through this interface and never assumes which implementation
 * sits behind it. Every operation signals failure by rejecting.
 */
export interface Core {
  /** Called once before any broker interaction. Failure is fatal to startup. */
  getConnectionConfig(): Promise<ConnectionConfig>;

  /** Whether a failed invocation should be retried. `attempt` is 1-based. */
  shouldRetry(errorMessage: string, attempt: number): Promise<boolean>;

  /** Backoff in milliseconds; only asked after `shouldRetry` said yes. */
  calculateBackoff(attempt: number): Promise<number>;

  /** Destination for a derived event, given its serialised envelope. */
  getOutputDestination(eventJson: string): Promise<OutputDestination>;

  /** Loads routing rules from a file. Called at most once, at startup. */
  loadRoutingConfig(path: string): Promise<void>;

  /** Releases backend resources. Idempotent. */
  close(): Promise<void>;
}

/**
 * Zero-argument constructor of a Core. The engine calls it exactly once,
 * so a backend that fails to materialise surfaces as a startup error.
 */
export type CoreFactory = () => Core | Promise<Core>;
