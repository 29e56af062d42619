/**
 * Graph builder.
 *
 * Collects nodes and edges, then validates and freezes them into a
 * `CompiledGraph`. The builder itself is mutable and single-use; the
 * compiled graph is not.
 *
 *   const graph = new GraphBuilder<AgentState>(AGENT_STATE_FIELDS)
 *     .addNode('plan', planNode, { writes: ['planNeeded'] })
 *     .addEdge(START, 'plan')
 *     .addEdge('plan', END)
 *     .build();
 */

import { GraphValidationError } from '../domain/errors';
import { logger } from '../logger';
import { validateGraph } from './validator';
import {
  END,
  START,
  CompiledGraph,
  Edge,
  GraphDefinition,
  GraphDescription,
  NodeDefinition,
  NodeHandler,
  NodeOptions,
  Router,
  RoutingTable,
} from './types';

export class GraphBuilder<S extends object> {
  private readonly definition: GraphDefinition<S>;

  constructor(fields: readonly (keyof S)[]) {
    this.definition = { fields: [...fields], nodes: [], edges: [], terminals: [] };
  }

  addNode(id: string, handler: NodeHandler<S>, options: NodeOptions<S> = {}): this {
    this.definition.nodes.push({
      id,
      handler,
      writes: options.writes ? [...options.writes] : undefined,
      timeoutMs: options.timeoutMs,
      description: options.description,
    });
    return this;
  }

  /** `addEdge(START, id)` sets the entry; `addEdge(id, END)` marks a terminal. */
  addEdge(from: string, to: string): this {
    if (from === START) {
      return this.setEntry(to);
    }
    if (to === END) {
      return this.setTerminal(from);
    }
    this.definition.edges.push({ kind: 'unconditional', from, to });
    return this;
  }

  addConditionalEdge<K extends string>(from: string, router: Router<S, K>, table: RoutingTable<K>): this {
    this.definition.edges.push({
      kind: 'conditional',
      from,
      router,
      table: { ...table },
    });
    return this;
  }

  setEntry(id: string): this {
    this.definition.entry = id;
    return this;
  }

  setTerminal(id: string): this {
    if (!this.definition.terminals.includes(id)) {
      this.definition.terminals.push(id);
    }
    return this;
  }

  /** Validate and freeze. Throws GraphValidationError listing every issue found. */
  build(): CompiledGraph<S> {
    const result = validateGraph(this.definition);
    for (const warning of result.warnings) {
      logger.warn('Graph validation warning', { warning });
    }
    if (!result.valid || this.definition.entry === undefined) {
      throw new GraphValidationError(result.errors);
    }
    return compile(this.definition, this.definition.entry);
  }
}

function compile<S>(definition: GraphDefinition<S>, entry: string): CompiledGraph<S> {
  const nodes = new Map<string, NodeDefinition<S>>();
  for (const node of definition.nodes) {
    nodes.set(node.id, Object.freeze({ ...node, writes: node.writes ? Object.freeze([...node.writes]) : undefined }));
  }

  const edges = new Map<string, Edge<S>>();
  for (const edge of definition.edges) {
    edges.set(
      edge.from,
      Object.freeze(edge.kind === 'conditional' ? { ...edge, table: Object.freeze({ ...edge.table }) } : { ...edge }),
    );
  }

  const fields = Object.freeze([...definition.fields]);
  const terminals = new Set(definition.terminals);

  return Object.freeze({
    fields,
    entry,
    nodes,
    edges,
    terminals,
    describe: () => describeGraph(entry, nodes, edges, terminals),
  });
}

function describeGraph<S>(
  entry: string,
  nodes: ReadonlyMap<string, NodeDefinition<S>>,
  edges: ReadonlyMap<string, Edge<S>>,
  terminals: ReadonlySet<string>,
): GraphDescription {
  const edgeList: GraphDescription['edges'] = [{ from: START, to: entry, kind: 'unconditional' }];

  for (const node of nodes.values()) {
    const edge = edges.get(node.id);
    if (!edge || terminals.has(node.id)) {
      edgeList.push({ from: node.id, to: END, kind: 'unconditional' });
    } else if (edge.kind === 'unconditional') {
      edgeList.push({ from: edge.from, to: edge.to, kind: 'unconditional' });
    } else {
      for (const [outcome, to] of Object.entries(edge.table)) {
        edgeList.push({ from: edge.from, to, kind: 'conditional', outcome });
      }
    }
  }

  return {
    entry,
    nodes: [...nodes.values()].map((n) => ({
      id: n.id,
      writes: (n.writes ?? []).map(String),
      description: n.description,
    })),
    edges: edgeList,
    terminals: [...terminals],
  };
}
