/**
 * State record threaded through a workflow run, and the merge rule
 * applied to every node's partial update.
 */

import { TypedError, createTypedError } from './errors';

/** Outcome of the planning node. `unset` until `plan` has run. */
export type PlanDecision = 'unset' | 'yes' | 'no';

/** The agent workflow's state record. */
export interface AgentState {
  /** Caller's prompt. Set at run start, never written by a node. */
  userMessage: string;
  planNeeded: PlanDecision;
  executionComplete: boolean;
  finalAnswer?: string;
}

/** Declared fields of the agent state record, in a stable order. */
export const AGENT_STATE_FIELDS: readonly (keyof AgentState)[] = [
  'userMessage',
  'planNeeded',
  'executionComplete',
  'finalAnswer',
];

/** A partial update naming only the fields a node sets. */
export type StatePatch<S> = Partial<S>;

/** Build the initial state for a run. */
export function createInitialState(prompt: string): AgentState {
  return {
    userMessage: prompt,
    planNeeded: 'unset',
    executionComplete: false,
  };
}

export interface MergeOptions<S> {
  /** Every field the state record declares. Keys outside this list are rejected. */
  fields: readonly (keyof S)[];
  /** Fields the writing node may set. When omitted, any declared field may be written. */
  writes?: readonly (keyof S)[];
  /** Writing node, for error reporting. */
  nodeId?: string;
}

/** Result of a merge attempt. */
export interface MergeResult<S> {
  success: boolean;
  state?: S;
  error?: TypedError;
}

/**
 * Shallow-merge a partial update into state. Returns a new object;
 * fields not named by the patch keep their previous value.
 */
export function mergeState<S extends object>(
  state: S,
  patch: StatePatch<S>,
  options: MergeOptions<S>,
): MergeResult<S> {
  const declared = new Set<PropertyKey>(options.fields);
  const allowed = options.writes ? new Set<PropertyKey>(options.writes) : declared;

  for (const key of Object.keys(patch)) {
    if (!declared.has(key)) {
      return {
        success: false,
        error: createTypedError({
          code: 'STATE.UNKNOWN_FIELD',
          message: `Update sets unknown state field "${key}"`,
          nodeId: options.nodeId,
          retryable: false,
          details: { field: key, declaredFields: [...options.fields].map(String) },
        }),
      };
    }
    if (!allowed.has(key)) {
      return {
        success: false,
        error: createTypedError({
          code: 'STATE.UNDECLARED_WRITE',
          message: `Node "${options.nodeId ?? 'unknown'}" wrote field "${key}" it does not own`,
          nodeId: options.nodeId,
          retryable: false,
          details: { field: key, writes: [...allowed].map(String) },
        }),
      };
    }
  }

  return { success: true, state: { ...state, ...patch } };
}
