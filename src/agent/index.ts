/**
 * Agent workflow exports.
 */

export * from './nodes';
export * from './graph';
