export { loadRuntimeConfig } from './runtime-config.js';
export type { Env, RuntimeConfig } from './runtime-config.js';
