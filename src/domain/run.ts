/**
 * Run domain model.
 *
 * A single execution of a compiled graph for one input, owning its
 * own state record.
 */

import { TypedError } from './errors';

/** Run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Running, RunStatus.Canceled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Canceled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Canceled]: [],
};

/** One completed node execution, as yielded by the executor. */
export interface NodeStep<S> {
  nodeId: string;
  /** The partial update the node returned. */
  update: Partial<S>;
  /** Zero-based position of this step within the run. */
  index: number;
  durationMs: number;
}

/** Point-in-time view of a run. */
export interface RunSnapshot<S> {
  id: string;
  status: RunStatus;
  state: Readonly<S>;
  /** Node ids in execution order. */
  visited: string[];
  startedAt?: string;
  completedAt?: string;
  error?: TypedError;
}
