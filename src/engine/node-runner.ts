/**
 * Node runner: executes a single node handler under the run's
 * cancellation signal and a per-node timeout.
 *
 * The node receives its own AbortSignal, aborted on run cancellation or
 * timeout, so a suspended handler can release what it holds.
 */

import {
  NodeExecutionError,
  RunCanceledError,
  WorkflowError,
  errorMessage,
  nodeFailureError,
  nodeTimeoutError,
  runCanceledError,
} from '../domain/errors';
import { StatePatch } from '../domain/state';
import { Logger } from '../logger';
import { NodeDefinition } from '../graph/types';

export interface NodeRunOptions {
  runId: string;
  /** Run-level cancellation signal. */
  signal: AbortSignal;
  /** Applied when the node declares no timeout of its own. 0 disables the timeout. */
  defaultTimeoutMs: number;
  logger: Logger;
}

/** Run one node against the current state. Throws a WorkflowError on any failure. */
export async function runNode<S>(
  node: NodeDefinition<S>,
  state: Readonly<S>,
  options: NodeRunOptions,
): Promise<StatePatch<S>> {
  if (options.signal.aborted) {
    throw new RunCanceledError(runCanceledError(options.runId, abortReason(options.signal)));
  }

  const timeoutMs = node.timeoutMs ?? options.defaultTimeoutMs;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let settle: ((err: WorkflowError) => void) | undefined;

  // Rejects when the run is canceled or the timeout fires, whichever comes first.
  const interrupted = new Promise<never>((_resolve, reject) => {
    settle = reject;
  });

  const onAbort = () => {
    const reason = abortReason(options.signal);
    settle?.(new RunCanceledError(runCanceledError(options.runId, reason)));
    controller.abort(reason);
  };
  options.signal.addEventListener('abort', onAbort, { once: true });

  if (timeoutMs > 0) {
    timer = setTimeout(() => {
      settle?.(new NodeExecutionError(nodeTimeoutError(node.id, timeoutMs, options.runId)));
      controller.abort(`timeout after ${timeoutMs}ms`);
    }, timeoutMs);
  }

  try {
    const patch = await Promise.race([
      node.handler(state, {
        runId: options.runId,
        nodeId: node.id,
        signal: controller.signal,
        logger: options.logger.child({ nodeId: node.id }),
      }),
      interrupted,
    ]);
    if (!isPatch(patch)) {
      throw new NodeExecutionError(
        nodeFailureError(node.id, 'handler must resolve to an object', options.runId),
      );
    }
    return patch;
  } catch (err) {
    if (err instanceof WorkflowError) throw err;
    throw new NodeExecutionError(
      nodeFailureError(node.id, errorMessage(err), options.runId),
      err,
    );
  } finally {
    if (timer) clearTimeout(timer);
    options.signal.removeEventListener('abort', onAbort);
    // Keep the losing race branch from surfacing as an unhandled rejection.
    interrupted.catch(() => undefined);
    if (!controller.signal.aborted) controller.abort('node finished');
  }
}

function isPatch<S>(value: StatePatch<S> | null | undefined): value is StatePatch<S> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  return undefined;
}

/**
 * Promise-based delay that rejects when the signal aborts. Node handlers
 * use this for simulated latency so cancellation interrupts the wait.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(abortReason(signal) ?? 'aborted'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error((signal && abortReason(signal)) ?? 'aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
