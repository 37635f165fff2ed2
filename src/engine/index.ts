export * from './features.js';
export * from './completion.js';
export * from './engine.js';
