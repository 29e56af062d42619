/**
 * Domain model exports.
 */

export * from './errors';
export * from './run';
export * from './state';
