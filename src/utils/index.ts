/**
 * Utility exports
 */

export * from './bytes';
export * from './encoding';
export * from './hash';
