export * from './contact.js';
export * from './document.js';
export * from './token.js';
export * from './load.js';
