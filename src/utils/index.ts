/**
 * Admission Control - Utilities Module
 */

export * from './logger.js';
export * from './errors.js';
export * from './helpers.js';
