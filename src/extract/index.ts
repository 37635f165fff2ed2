export * from './grammar.js';
export * from './regions.js';
export * from './extractor.js';
