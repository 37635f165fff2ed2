import { randomUUID } from 'node:crypto';

export * from './errors.js';
export * from './logger.js';
export * from './paths.js';

export function generateId(): string {
  return randomUUID();
}
