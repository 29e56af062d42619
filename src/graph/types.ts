/**
 * Graph model: nodes, edges, routers, and the compiled graph handed to
 * the executor.
 */

import { Logger } from '../logger';
import { StatePatch } from '../domain/state';

/** Virtual entry marker. */
export const START = '__start__';
/** Virtual terminal marker. */
export const END = '__end__';

/** Runtime context passed to every node handler. */
export interface NodeContext {
  runId: string;
  nodeId: string;
  /** Aborted when the run is canceled or the node exceeds its timeout. */
  signal: AbortSignal;
  logger: Logger;
}

/** A node's unit of work: read the current state, return a partial update. */
export type NodeHandler<S> = (state: Readonly<S>, context: NodeContext) => Promise<StatePatch<S>>;

export interface NodeOptions<S> {
  /** Fields this node is allowed to set. Omit to allow any declared field. */
  writes?: readonly (keyof S)[];
  /** Per-node timeout override in milliseconds. */
  timeoutMs?: number;
  description?: string;
}

export interface NodeDefinition<S> {
  id: string;
  handler: NodeHandler<S>;
  writes?: readonly (keyof S)[];
  timeoutMs?: number;
  description?: string;
}

/**
 * A routing function over an explicit, finite outcome set. `outcomes`
 * lists every value `route` can return; the builder checks the table
 * against it.
 */
export interface Router<S, K extends string> {
  outcomes: readonly K[];
  route(state: Readonly<S>): K;
}

/** Routing table: every router outcome maps to a node id or END. */
export type RoutingTable<K extends string> = Record<K, string>;

export interface UnconditionalEdge {
  kind: 'unconditional';
  from: string;
  to: string;
}

export interface ConditionalEdge<S> {
  kind: 'conditional';
  from: string;
  router: Router<S, string>;
  table: Readonly<Record<string, string>>;
}

export type Edge<S> = UnconditionalEdge | ConditionalEdge<S>;

/** Unvalidated graph definition collected by the builder. */
export interface GraphDefinition<S> {
  /** Declared fields of the state record. */
  fields: readonly (keyof S)[];
  nodes: NodeDefinition<S>[];
  edges: Edge<S>[];
  entry?: string;
  terminals: string[];
}

/** JSON-friendly description of a compiled graph. */
export interface GraphDescription {
  entry: string;
  nodes: Array<{ id: string; writes: string[]; description?: string }>;
  edges: Array<{ from: string; to: string; kind: 'unconditional' | 'conditional'; outcome?: string }>;
  terminals: string[];
}

/** A validated, frozen graph. Safe to share across concurrent runs. */
export interface CompiledGraph<S> {
  readonly fields: readonly (keyof S)[];
  readonly entry: string;
  readonly nodes: ReadonlyMap<string, NodeDefinition<S>>;
  /** Outgoing edge per node id. Nodes without an entry transition to END. */
  readonly edges: ReadonlyMap<string, Edge<S>>;
  readonly terminals: ReadonlySet<string>;
  describe(): GraphDescription;
}
