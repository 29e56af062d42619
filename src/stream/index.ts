/**
 * Streaming exports.
 */

export * from './channel';
export * from './events';
export * from './bridge';
export * from './sse';
