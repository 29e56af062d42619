/**
 * Events a streaming run emits, in order:
 *   progress* (result | error) end
 * An empty prompt yields a single `error` event and nothing else.
 */

import { TypedError } from '../domain/errors';

export interface ProgressEvent {
  type: 'progress';
  nodeId: string;
  /** Position of the step within the run. */
  index: number;
  message: string;
}

export interface ResultEvent {
  type: 'result';
  message: string;
}

export interface RunErrorEvent {
  type: 'error';
  error: TypedError;
  message: string;
}

/** Terminating sentinel. Always the last event of a run. */
export interface EndEvent {
  type: 'end';
  message: string;
}

export type StreamEvent = ProgressEvent | ResultEvent | RunErrorEvent | EndEvent;
