export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { buildStatusServer, startStatusServer, statusRoutes } from './interfaces/http/index.js';
export type { EngineStatusSource, StatusServerOptions } from './interfaces/http/index.js';
export { ROUTING_FILE_NAME, discoverRoutingFile, run } from './runtime/index.js';
export type { RunOptions } from './runtime/index.js';
