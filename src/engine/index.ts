/**
 * Execution engine exports.
 */

export * from './executor';
export * from './node-runner';
export * from './state-machine';
