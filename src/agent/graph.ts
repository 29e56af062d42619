/**
 * The agent workflow graph.
 *
 *   START -> plan
 *   plan --yes--> execute
 *   plan --no---> check_result
 *   execute -> check_result
 *   check_result -> END
 */

import { AGENT_STATE_FIELDS, AgentState } from '../domain/state';
import { MessageCatalog } from '../config/messages';
import { NodeLatencyConfig } from '../config';
import { GraphBuilder } from '../graph/builder';
import { CompiledGraph, END, START } from '../graph/types';
import {
  NODE_CHECK_RESULT,
  NODE_EXECUTE,
  NODE_PLAN,
  createCheckResultNode,
  createExecuteNode,
  createPlanNode,
  planRouter,
} from './nodes';

export interface AgentGraphOptions {
  catalog: MessageCatalog;
  latency: NodeLatencyConfig;
}

/** Build and validate the agent graph. Throws GraphValidationError if the wiring is wrong. */
export function createAgentGraph(options: AgentGraphOptions): CompiledGraph<AgentState> {
  const { catalog, latency } = options;

  return new GraphBuilder<AgentState>(AGENT_STATE_FIELDS)
    .addNode(NODE_PLAN, createPlanNode(catalog.triggerKeywords, latency.plan), {
      writes: ['planNeeded'],
      description: 'Decide whether the request needs execution',
    })
    .addNode(NODE_EXECUTE, createExecuteNode(catalog.templates, latency.execute), {
      writes: ['executionComplete', 'finalAnswer'],
      description: 'Run the simulated task',
    })
    .addNode(NODE_CHECK_RESULT, createCheckResultNode(catalog.templates, latency.checkResult), {
      writes: ['finalAnswer'],
      description: 'Format the final answer',
    })
    .addEdge(START, NODE_PLAN)
    .addConditionalEdge(NODE_PLAN, planRouter, {
      yes: NODE_EXECUTE,
      no: NODE_CHECK_RESULT,
    })
    .addEdge(NODE_EXECUTE, NODE_CHECK_RESULT)
    .addEdge(NODE_CHECK_RESULT, END)
    .build();
}
