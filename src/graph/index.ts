/**
 * Graph definition exports.
 */

export * from './types';
export * from './builder';
export * from './validator';
