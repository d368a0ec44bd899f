export type { Event, EventInit, EventExtensions, ExtensionValue, ContextAttribute } from './event.js';
export {
  SPEC_VERSION,
  CONTEXT_ATTRIBUTES,
  isContextAttribute,
  createEvent,
  deriveEvent,
  cloneEvent,
} from './event.js';
export type { HandlerOutcome } from './outcome.js';
export { ack, ackWithOutput, failure } from './outcome.js';
export type { DestinationKind, OutputDestination, ConnectionConfig, RetryAttempt } from './destination.js';
export { DESTINATION_KINDS } from './destination.js';
export type { FatalPhase } from './errors.js';
export {
  EngineFatalError,
  HandlerShapeError,
  ConnectionConfigError,
  RoutingConfigError,
  DecodeError,
  UnknownDestinationError,
  toError,
} from './errors.js';
