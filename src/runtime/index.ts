export { ROUTING_FILE_NAME, discoverRoutingFile, run } from './run.js';
export type { RunOptions } from './run.js';
