export * from './cesql/index.js';
export * from './routing-schema.js';
export * from './routing-table.js';
export * from './subscription-filter.js';
