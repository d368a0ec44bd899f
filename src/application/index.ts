export type { AssignmentPolicy, BrokerClient, BrokerConnection, BrokerMessage, BrokerPublisher, OutboundMessage } from './broker.js';
export type { Core, CoreFactory } from './core.js';
export {
  DEFAULT_FLUSH_TIMEOUT_MS,
  DEFAULT_POLL_TIMEOUT_MS,
  DispatchEngine,
  MAX_CONSECUTIVE_TRANSPORT_ERRORS,
} from './dispatch-engine.js';
export type { DispatchEngineOptions, EngineState } from './dispatch-engine.js';
export { STRUCTURED_CONTENT_TYPE, createEventCodec, decodeMessage, encodeEvent } from './event-codec.js';
export type { EventCodec, EventCodecOptions } from './event-codec.js';
export { cloudEventSchema, eventObjectSchema } from './event-schema.js';
export type { CloudEventInput } from './event-schema.js';
export { adaptHandler, outputHandler, simpleHandler } from './handler-adapter.js';
export type { AdaptedHandler, HandlerDefinition, HandlerShape, OutputHandlerFn, SimpleHandlerFn } from './handler-adapter.js';
export { OutputRouter } from './output-router.js';
export type { RouteResult } from './output-router.js';
export { EngineTelemetry } from './telemetry.js';
export type { TelemetrySnapshot } from './telemetry.js';
export { RoutingTable, compileFilter, envelopeLookup, loadRoutingTable } from './routing/index.js';
export type { CompiledRoute, FilterSpec, RouteDecision, RoutingFile } from './routing/index.js';
