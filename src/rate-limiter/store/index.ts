/**
 * Admission Control - Counter Stores
 */

export * from './types.js';
export * from './memory-store.js';
export * from './redis-store.js';
