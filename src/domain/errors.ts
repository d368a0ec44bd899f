/**
 * Error taxonomy of the runtime.
 *
 * Only `EngineFatalError` crosses the process boundary; everything else is
 * absorbed by the engine and logged.
 */

/** Phase of the engine lifecycle a fatal error came from. */
export type FatalPhase = 'configure' | 'subscribe' | 'run';

export class EngineFatalError extends Error {
  readonly phase: FatalPhase;

  constructor(phase: FatalPhase, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineFatalError';
    this.phase = phase;
  }
}

/** The supplied handler matches neither recognised shape. */
export class HandlerShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerShapeError';
  }
}

/** Connection settings are missing or unusable. */
export class ConnectionConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionConfigError';
  }
}

/** A routing file exists but cannot be read, parsed or validated. */
export class RoutingConfigError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(`${message} (${path})`, options);
    this.name = 'RoutingConfigError';
    this.path = path;
  }
}

/** A broker message could not be turned into an event. */
export class DecodeError extends Error {
  readonly messageId: string;

  constructor(message: string, messageId: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
    this.messageId = messageId;
  }
}

/** The Core returned a destination kind this router does not know. */
export class UnknownDestinationError extends Error {
  readonly kind: string;

  constructor(kind: string) {
    super(`Unknown destination kind: ${kind}`);
    this.name = 'UnknownDestinationError';
    this.kind = kind;
  }
}

/** Normalises anything thrown into an Error instance. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}
