export { InProcessCore, createInProcessCore } from './in-process-core.js';
export type { InProcessCoreOptions } from './in-process-core.js';
