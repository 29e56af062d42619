/**
 * Agent nodes: plan, execute, check_result.
 *
 * Each factory closes over the catalog text it needs and a simulated
 * latency, and returns a NodeHandler that writes only its own fields.
 */

import { AgentState, PlanDecision, StatePatch } from '../domain/state';
import { AnswerTemplates, renderTemplate } from '../config/messages';
import { sleep } from '../engine/node-runner';
import { NodeHandler, Router } from '../graph/types';

export const NODE_PLAN = 'plan';
export const NODE_EXECUTE = 'execute';
export const NODE_CHECK_RESULT = 'check_result';

/**
 * True when the message contains any keyword, compared case-insensitively
 * as a plain substring.
 */
export function containsTrigger(message: string, keywords: readonly string[]): boolean {
  const haystack = message.toLowerCase();
  return keywords.some((keyword) => keyword.length > 0 && haystack.includes(keyword.toLowerCase()));
}

/** Decide whether the request needs the execution step. */
export function createPlanNode(keywords: readonly string[], latencyMs: number): NodeHandler<AgentState> {
  return async (state, context) => {
    await sleep(latencyMs, context.signal);
    const planNeeded: PlanDecision = containsTrigger(state.userMessage, keywords) ? 'yes' : 'no';
    context.logger.debug('Plan decided', { planNeeded });
    return { planNeeded };
  };
}

/** Simulate a long-running task and record a provisional answer. */
export function createExecuteNode(templates: AnswerTemplates, latencyMs: number): NodeHandler<AgentState> {
  return async (state, context) => {
    await sleep(latencyMs, context.signal);
    return {
      executionComplete: true,
      finalAnswer: renderTemplate(templates.executionSummary, { prompt: state.userMessage }),
    };
  };
}

/** Produce the externally visible answer. */
export function createCheckResultNode(templates: AnswerTemplates, latencyMs: number): NodeHandler<AgentState> {
  return async (state, context): Promise<StatePatch<AgentState>> => {
    await sleep(latencyMs, context.signal);
    if (state.executionComplete) {
      return {
        finalAnswer: renderTemplate(templates.taskComplete, { finalAnswer: state.finalAnswer ?? '' }),
      };
    }
    return {
      finalAnswer: renderTemplate(templates.quickResponse, { prompt: state.userMessage }),
    };
  };
}

/** Routes on the planning decision. Runs only after `plan`, so `unset` is not an outcome. */
export const planRouter: Router<AgentState, 'yes' | 'no'> = {
  outcomes: ['yes', 'no'],
  route(state) {
    if (state.planNeeded === 'unset') {
      throw new Error('planNeeded is unset; plan must run before routing');
    }
    return state.planNeeded;
  },
};
