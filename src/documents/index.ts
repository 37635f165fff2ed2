export { DocumentStore, comparePositions } from './store.js';
export { DocumentSnapshot } from './document.js';
export { LineIndex, utf8Length } from './line-index.js';
