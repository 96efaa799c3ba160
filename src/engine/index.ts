/**
 * Main engine exports.
 */

export * from './types';
export * from './errors';
export * from './hash';
export * from './ability';
