/**
 * Graph Executor: walks a compiled graph from its entry node to END.
 *
 * Nodes run strictly one at a time. After each node the partial update
 * is merged into the run's state, the step is yielded to the consumer,
 * and only then is the next node chosen, from the merged state.
 *
 *   const run = executor.run(createInitialState('hola'), { signal });
 *   for await (const step of run) {
 *     console.log(step.nodeId, step.update);
 *   }
 *   console.log(run.state.finalAnswer);
 */

import { v4 as uuid } from 'uuid';
import {
  NodeExecutionError,
  RoutingError,
  RunCanceledError,
  StepLimitError,
  TypedError,
  WorkflowError,
  createTypedError,
  errorMessage,
  routingError,
  runCanceledError,
  stepLimitError,
  toTypedError,
} from '../domain/errors';
import { NodeStep, RunSnapshot, RunStatus } from '../domain/run';
import { mergeState } from '../domain/state';
import { CompiledGraph, END } from '../graph/types';
import { Logger, logger as rootLogger } from '../logger';
import { runNode } from './node-runner';
import { isTerminalRunStatus, transitionRunStatus } from './state-machine';

/** Executor configuration. */
export interface ExecutorConfig {
  /** Timeout for nodes that declare none. 0 disables it. */
  nodeTimeoutMs: number;
  /** Upper bound on node executions per run. */
  maxSteps: number;
}

const DEFAULT_CONFIG: ExecutorConfig = {
  nodeTimeoutMs: 30_000,
  maxSteps: 25,
};

export interface RunOptions {
  /** External cancellation, e.g. the caller disconnecting. */
  signal?: AbortSignal;
  runId?: string;
}

/** The graph executor. Stateless apart from its configuration; safe to share. */
export class GraphExecutor<S extends object> {
  private readonly config: ExecutorConfig;

  constructor(
    private readonly graph: CompiledGraph<S>,
    config?: Partial<ExecutorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Create a run. Nothing executes until the run is iterated. */
  run(initialState: S, options: RunOptions = {}): GraphRun<S> {
    return new GraphRun(this.graph, this.config, initialState, options);
  }

  /** Execute a run to completion and return its final snapshot. Throws on failure. */
  async invoke(initialState: S, options: RunOptions = {}): Promise<RunSnapshot<S>> {
    const run = this.run(initialState, options);
    for await (const _step of run) {
      // drain
    }
    return run.snapshot();
  }
}

/**
 * A single execution of the graph. Iterable exactly once; the
 * accumulated state stays available after iteration ends.
 */
export class GraphRun<S extends object> implements AsyncIterable<NodeStep<S>> {
  readonly id: string;
  private currentState: S;
  private currentStatus: RunStatus = RunStatus.Created;
  private readonly visitedNodes: string[] = [];
  private failure?: TypedError;
  private startedAt?: string;
  private completedAt?: string;
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private iterated = false;

  constructor(
    private readonly graph: CompiledGraph<S>,
    private readonly config: ExecutorConfig,
    initialState: S,
    private readonly options: RunOptions,
  ) {
    this.id = options.runId ?? `run_${uuid()}`;
    this.currentState = { ...initialState };
    this.log = rootLogger.child({ runId: this.id });
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  /** State as of the last merged update. */
  get state(): Readonly<S> {
    return this.currentState;
  }

  get visited(): readonly string[] {
    return this.visitedNodes;
  }

  get error(): TypedError | undefined {
    return this.failure;
  }

  snapshot(): RunSnapshot<S> {
    return {
      id: this.id,
      status: this.currentStatus,
      state: this.currentState,
      visited: [...this.visitedNodes],
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      error: this.failure,
    };
  }

  /** Abort the run at its next suspension point. */
  cancel(reason = 'canceled by caller'): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<NodeStep<S>> {
    if (this.iterated) {
      throw new WorkflowError(
        createTypedError({
          code: 'RUN.ALREADY_STARTED',
          message: `Run "${this.id}" can only be iterated once`,
          runId: this.id,
          retryable: false,
        }),
      );
    }
    this.iterated = true;
    return this.execute();
  }

  private async *execute(): AsyncGenerator<NodeStep<S>, void, undefined> {
    const external = this.options.signal;
    const forwardAbort = () => this.cancel(reasonOf(external));
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    this.transition(RunStatus.Running);
    this.startedAt = new Date().toISOString();
    const started = Date.now();
    this.log.info('Run started', { entry: this.graph.entry });

    try {
      let current = this.graph.entry;
      for (let index = 0; ; index++) {
        if (index >= this.config.maxSteps) {
          throw new StepLimitError(stepLimitError(this.id, this.config.maxSteps));
        }

        const node = this.graph.nodes.get(current);
        if (!node) {
          throw new RoutingError(routingError(current, current, [...this.graph.nodes.keys()], this.id));
        }

        const nodeStarted = Date.now();
        const update = await runNode(node, this.currentState, {
          runId: this.id,
          signal: this.controller.signal,
          defaultTimeoutMs: this.config.nodeTimeoutMs,
          logger: this.log,
        });

        const merged = mergeState(this.currentState, update, {
          fields: this.graph.fields,
          writes: node.writes,
          nodeId: node.id,
        });
        if (!merged.success || !merged.state) {
          throw new NodeExecutionError({
            ...(merged.error ?? createTypedError({ code: 'STATE.MERGE_FAILED', message: 'State merge failed', nodeId: node.id })),
            runId: this.id,
          });
        }
        this.currentState = merged.state;
        this.visitedNodes.push(node.id);

        const durationMs = Date.now() - nodeStarted;
        this.log.debug('Node completed', { nodeId: node.id, durationMs, fields: Object.keys(update) });
        yield { nodeId: node.id, update, index, durationMs };

        const next = this.nextNode(node.id);
        if (next === END) break;
        current = next;
      }

      this.transition(RunStatus.Succeeded);
      this.log.info('Run succeeded', { visited: this.visitedNodes, durationMs: Date.now() - started });
    } catch (err) {
      const typed = { ...toTypedError(err), runId: this.id };
      this.failure = typed;
      this.transition(err instanceof RunCanceledError ? RunStatus.Canceled : RunStatus.Failed);
      this.log.warn('Run ended with error', { status: this.currentStatus, code: typed.code, error: typed.message });
      throw err;
    } finally {
      // The consumer stopped iterating before END: treat as cancellation.
      if (!isTerminalRunStatus(this.currentStatus)) {
        this.cancel('consumer stopped reading');
        this.failure = runCanceledError(this.id, 'consumer stopped reading');
        this.transition(RunStatus.Canceled);
        this.log.info('Run canceled', { visited: this.visitedNodes });
      }
      this.completedAt = new Date().toISOString();
      external?.removeEventListener('abort', forwardAbort);
    }
  }

  /** Pick the successor of `nodeId` from the just-merged state. */
  private nextNode(nodeId: string): string {
    if (this.graph.terminals.has(nodeId)) return END;

    const edge = this.graph.edges.get(nodeId);
    if (!edge) return END;
    if (edge.kind === 'unconditional') return edge.to;

    let outcome: string;
    try {
      outcome = edge.router.route(this.currentState);
    } catch (err) {
      throw new RoutingError(
        createTypedError({
          code: 'RUN.ROUTING',
          message: `Router on node "${nodeId}" threw: ${errorMessage(err)}`,
          nodeId,
          runId: this.id,
          retryable: false,
        }),
      );
    }

    if (!Object.prototype.hasOwnProperty.call(edge.table, outcome)) {
      throw new RoutingError(routingError(nodeId, outcome, Object.keys(edge.table), this.id));
    }
    return edge.table[outcome];
  }

  private transition(target: RunStatus): void {
    const result = transitionRunStatus(this.currentStatus, target);
    if (!result.success || result.newStatus === undefined) {
      throw new WorkflowError(result.error ?? runCanceledError(this.id));
    }
    this.currentStatus = result.newStatus;
  }
}

function reasonOf(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  return 'aborted';
}
