export { default as statusRoutes } from './status-routes.js';
export type { EngineStatusSource, StatusRoutesOptions } from './status-routes.js';
export { buildStatusServer, startStatusServer } from './status-server.js';
export type { StatusServerOptions } from './status-server.js';
