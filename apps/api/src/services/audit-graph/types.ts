/**
 * Audit Graph - Type Definitions
 *
 * Conversation state threaded through the workflow, plus execution
 * bookkeeping. Schemas are zod-based so an incoming state can be validated
 * and defaulted before the graph runs.
 */

import { z } from 'zod';
import { RoutingDecisionSchema, StageNameSchema } from '@ledger-auditor/shared';

// ============================================================
// CONVERSATION STATE
// ============================================================

export const ConversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

/**
 * The unit threaded through every node. `messages` is required; everything
 * else falls back to an empty default.
 */
export const ConversationStateSchema = z.object({
  threadId: z.string().default('default'),
  messages: z.array(ConversationMessageSchema),
  routingDecision: RoutingDecisionSchema.optional(),
  structuredResult: z.string().default(''),
  documentContext: z.string().default(''),
  routeTrace: z.array(StageNameSchema).default([]),
});

// ============================================================
// EXECUTION BOOKKEEPING
// ============================================================

/**
 * Agent error with structured information
 */
export const AgentErrorSchema = z.object({
  code: z.enum(['PRECONDITION_FAILED', 'NODE_EXECUTION_ERROR', 'POSTCONDITION_FAILED', 'UNKNOWN_NODE']),
  message: z.string(),
  nodeId: z.string().optional(),
  severity: z.enum(['warning', 'error', 'fatal']).default('error'),
  timestamp: z.coerce.date().default(() => new Date()),
});

/**
 * Node pre/post condition
 */
export const ConditionResultSchema = z.object({
  passed: z.boolean(),
  conditionName: z.string(),
  message: z.string().optional(),
});

// ============================================================
// TYPE EXPORTS
// ============================================================

export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;
export type ConversationState = z.infer<typeof ConversationStateSchema>;
/** State as callers may supply it: optional fields can be omitted */
export type ConversationStateInput = z.input<typeof ConversationStateSchema>;

export type AgentError = z.infer<typeof AgentErrorSchema>;
export type ConditionResult = z.infer<typeof ConditionResultSchema>;

/**
 * Raised when a node fails. These are contract violations, not runtime
 * conditions to recover from.
 */
export class GraphExecutionError extends Error {
  constructor(
    public agentError: AgentError,
    public executionPath: string[]
  ) {
    super(`${agentError.code} at ${agentError.nodeId ?? 'unknown node'}: ${agentError.message}`);
    this.name = 'GraphExecutionError';
  }
}

/**
 * Fresh state for one query: the user's message and nothing else
 */
export function createInitialState(query: string, threadId = 'default'): ConversationState {
  return {
    threadId,
    messages: [{ role: 'user', content: query }],
    routingDecision: undefined,
    structuredResult: '',
    documentContext: '',
    routeTrace: [],
  };
}
