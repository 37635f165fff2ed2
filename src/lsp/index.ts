export * from './context.js';
export * from './capabilities.js';
export * from './errors.js';
export * from './diagnostics.js';
export * from './documents.js';
export * from './queries.js';
export * from './commands.js';
