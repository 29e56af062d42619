/**
 * Graph validator.
 *
 * Checks a graph definition before it is compiled: node identity, edge
 * targets, routing table totality, and reachability of END from the
 * entry node. All issues are collected; `build()` refuses the graph if
 * any error is present.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { END, START, Edge, GraphDefinition } from './types';

/** Validation result. */
export interface GraphValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

const RESERVED_IDS = new Set([START, END]);

/** Validate a graph definition. */
export function validateGraph<S>(definition: GraphDefinition<S>): GraphValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  const nodeIds = validateNodes(definition, errors);
  validateEntry(definition, nodeIds, errors);
  validateTerminals(definition, nodeIds, errors);
  validateEdges(definition, nodeIds, errors);

  // Reachability is only meaningful once the structure itself is sound.
  if (errors.length === 0) {
    validateReachability(definition, errors, warnings);
  }

  return { valid: errors.length === 0, errors, warnings };
}

function validateNodes<S>(definition: GraphDefinition<S>, errors: TypedError[]): Set<string> {
  const seen = new Set<string>();
  for (const node of definition.nodes) {
    if (RESERVED_IDS.has(node.id)) {
      errors.push(
        createTypedError({
          code: 'GRAPH.RESERVED_NODE_ID',
          message: `Node id "${node.id}" is reserved`,
          nodeId: node.id,
          retryable: false,
        }),
      );
      continue;
    }
    if (seen.has(node.id)) {
      errors.push(
        createTypedError({
          code: 'GRAPH.DUPLICATE_NODE',
          message: `Duplicate node id: ${node.id}`,
          nodeId: node.id,
          retryable: false,
          suggestedFixes: [
            { type: 'RENAME_NODE', params: { nodeId: node.id }, description: 'Give each node a unique id' },
          ],
        }),
      );
      continue;
    }
    seen.add(node.id);

    for (const field of node.writes ?? []) {
      if (!definition.fields.includes(field)) {
        errors.push(
          createTypedError({
            code: 'GRAPH.UNKNOWN_FIELD',
            message: `Node "${node.id}" declares write to unknown state field "${String(field)}"`,
            nodeId: node.id,
            retryable: false,
          }),
        );
      }
    }
  }
  return seen;
}

function validateEntry<S>(definition: GraphDefinition<S>, nodeIds: Set<string>, errors: TypedError[]): void {
  if (definition.entry === undefined) {
    errors.push(
      createTypedError({
        code: 'GRAPH.MISSING_ENTRY',
        message: 'Graph has no entry node',
        retryable: false,
        suggestedFixes: [
          { type: 'SET_ENTRY', params: {}, description: 'Call setEntry(id) or addEdge(START, id)' },
        ],
      }),
    );
    return;
  }
  if (!nodeIds.has(definition.entry)) {
    errors.push(unknownNodeError(definition.entry, 'entry'));
  }
}

function validateTerminals<S>(definition: GraphDefinition<S>, nodeIds: Set<string>, errors: TypedError[]): void {
  for (const id of definition.terminals) {
    if (!nodeIds.has(id)) {
      errors.push(unknownNodeError(id, 'terminal'));
    }
  }
}

function validateEdges<S>(definition: GraphDefinition<S>, nodeIds: Set<string>, errors: TypedError[]): void {
  const outgoing = new Map<string, number>();

  for (const edge of definition.edges) {
    if (!nodeIds.has(edge.from)) {
      errors.push(unknownNodeError(edge.from, 'edge source'));
    }
    outgoing.set(edge.from, (outgoing.get(edge.from) ?? 0) + 1);

    if (edge.kind === 'unconditional') {
      if (edge.to !== END && !nodeIds.has(edge.to)) {
        errors.push(unknownNodeError(edge.to, `edge target from "${edge.from}"`));
      }
      continue;
    }

    validateRoutingTable(edge, nodeIds, errors);
  }

  for (const [from, count] of outgoing) {
    if (count > 1) {
      errors.push(
        createTypedError({
          code: 'GRAPH.AMBIGUOUS_EDGE',
          message: `Node "${from}" has ${count} outgoing edges; a node may have at most one`,
          nodeId: from,
          retryable: false,
        }),
      );
    }
    if (definition.terminals.includes(from)) {
      errors.push(
        createTypedError({
          code: 'GRAPH.TERMINAL_HAS_EDGE',
          message: `Terminal node "${from}" cannot have outgoing edges`,
          nodeId: from,
          retryable: false,
        }),
      );
    }
  }
}

function validateRoutingTable<S>(
  edge: Extract<Edge<S>, { kind: 'conditional' }>,
  nodeIds: Set<string>,
  errors: TypedError[],
): void {
  const outcomes = new Set(edge.router.outcomes);
  const tableKeys = Object.keys(edge.table);

  for (const outcome of outcomes) {
    if (!Object.prototype.hasOwnProperty.call(edge.table, outcome)) {
      errors.push(
        createTypedError({
          code: 'GRAPH.ROUTING_TABLE_INCOMPLETE',
          message: `Routing table for "${edge.from}" has no entry for outcome "${outcome}"`,
          nodeId: edge.from,
          retryable: false,
          suggestedFixes: [
            { type: 'ADD_ROUTE', params: { outcome }, description: `Map outcome "${outcome}" to a node id or END` },
          ],
        }),
      );
    }
  }

  for (const key of tableKeys) {
    if (!outcomes.has(key)) {
      errors.push(
        createTypedError({
          code: 'GRAPH.ROUTING_TABLE_EXTRA_KEY',
          message: `Routing table for "${edge.from}" maps "${key}", which the router never produces`,
          nodeId: edge.from,
          retryable: false,
        }),
      );
    }
    const target = edge.table[key];
    if (target !== END && !nodeIds.has(target)) {
      errors.push(unknownNodeError(target, `route "${key}" from "${edge.from}"`));
    }
  }
}

/** Breadth-first walk from the entry; END must be reachable. */
function validateReachability<S>(
  definition: GraphDefinition<S>,
  errors: TypedError[],
  warnings: string[],
): void {
  const entry = definition.entry;
  if (entry === undefined) return;

  const edgeByNode = new Map(definition.edges.map((e) => [e.from, e]));
  const terminals = new Set(definition.terminals);
  const visited = new Set<string>();
  const queue = [entry];
  let endReachable = false;

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);

    const edge = edgeByNode.get(current);
    const targets = terminals.has(current) || !edge
      ? [END]
      : edge.kind === 'unconditional'
        ? [edge.to]
        : Object.values(edge.table);

    for (const target of targets) {
      if (target === END) {
        endReachable = true;
      } else if (!visited.has(target)) {
        queue.push(target);
      }
    }
  }

  if (!endReachable) {
    errors.push(
      createTypedError({
        code: 'GRAPH.END_UNREACHABLE',
        message: `No terminal is reachable from entry node "${entry}"`,
        retryable: false,
        suggestedFixes: [
          { type: 'ADD_TERMINAL', params: {}, description: 'Call setTerminal(id) or addEdge(id, END) on a reachable node' },
        ],
      }),
    );
  }

  for (const node of definition.nodes) {
    if (!visited.has(node.id)) {
      warnings.push(`Node "${node.id}" is not reachable from entry "${entry}"`);
    }
  }
}

function unknownNodeError(nodeId: string, role: string): TypedError {
  return createTypedError({
    code: 'GRAPH.UNKNOWN_NODE',
    message: `Unknown node "${nodeId}" referenced as ${role}`,
    nodeId,
    retryable: false,
  });
}
