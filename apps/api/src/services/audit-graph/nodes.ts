/**
 * Audit Graph - Node Implementations
 *
 * Each node is one stage of the workflow with pre/post conditions. Nodes never
 * call each other; the graph executor decides what runs next. Every node's
 * `updateState` appends its own id to the route trace.
 */

import type { RoutingDecision, StageName } from '@ledger-auditor/shared';
import type { DocumentIndex } from '../document-index';
import type { StructuredQueryResolver } from '../invoices';
import { createLogger } from '../../utils/logger';
import type { AnswerSynthesizer } from './answer-synthesizer';
import { decideRoute, scoreQuery, type RouteScores } from './query-router';
import type { AgentError, ConditionResult, ConversationState } from './types';

const logger = createLogger('AuditGraph');

// ============================================================
// NODE INTERFACES
// ============================================================

/**
 * Precondition - must pass before node execution
 */
export interface Precondition {
  name: string;
  check(state: ConversationState): boolean;
  errorMessage: string;
}

/**
 * Postcondition - must pass after node execution
 */
export interface Postcondition<TOutput> {
  name: string;
  check(state: ConversationState, output: TOutput): boolean;
  errorMessage: string;
}

/**
 * Graph node interface
 */
export interface GraphNode<TOutput> {
  id: StageName;
  name: string;
  description: string;

  preconditions: Precondition[];
  postconditions: Postcondition<TOutput>[];

  execute(state: ConversationState, context: NodeContext): Promise<TOutput>;

  updateState(state: ConversationState, output: TOutput): ConversationState;
}

/** Any node, regardless of output type */
export type AnyGraphNode = GraphNode<unknown>;

/**
 * Collaborators available to every node
 */
export interface NodeContext {
  resolver: Pick<StructuredQueryResolver, 'resolve'>;
  documents: Pick<DocumentIndex, 'hybridRetrieve'>;
  synthesizer: Pick<AnswerSynthesizer, 'synthesize'>;
  topK: number;
}

/**
 * Node execution result
 */
export interface NodeExecutionResult<TOutput> {
  success: boolean;
  output?: TOutput;
  error?: AgentError;
  preconditionResults: ConditionResult[];
  postconditionResults: ConditionResult[];
  duration: number;
}

// ============================================================
// NODE EXECUTOR
// ============================================================

/**
 * Executes a graph node with condition checking
 */
export class NodeExecutor {
  async execute<TOutput>(
    node: GraphNode<TOutput>,
    state: ConversationState,
    context: NodeContext
  ): Promise<NodeExecutionResult<TOutput>> {
    const startTime = Date.now();
    const preconditionResults: ConditionResult[] = [];
    const postconditionResults: ConditionResult[] = [];

    const fail = (code: AgentError['code'], message: string): NodeExecutionResult<TOutput> => ({
      success: false,
      error: { code, message, nodeId: node.id, severity: 'fatal', timestamp: new Date() },
      preconditionResults,
      postconditionResults,
      duration: Date.now() - startTime,
    });

    for (const precondition of node.preconditions) {
      const passed = precondition.check(state);
      preconditionResults.push({
        passed,
        conditionName: precondition.name,
        message: passed ? undefined : precondition.errorMessage,
      });
      if (!passed) {
        return fail('PRECONDITION_FAILED', precondition.errorMessage);
      }
    }

    let output: TOutput;
    try {
      output = await node.execute(state, context);
    } catch (error) {
      return fail('NODE_EXECUTION_ERROR', error instanceof Error ? error.message : String(error));
    }

    for (const postcondition of node.postconditions) {
      const passed = postcondition.check(state, output);
      postconditionResults.push({
        passed,
        conditionName: postcondition.name,
        message: passed ? undefined : postcondition.errorMessage,
      });
      if (!passed) {
        return fail('POSTCONDITION_FAILED', postcondition.errorMessage);
      }
    }

    return {
      success: true,
      output,
      preconditionResults,
      postconditionResults,
      duration: Date.now() - startTime,
    };
  }
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Text of the newest user turn, or undefined if the last turn is not the user's
 */
export function latestUserQuery(state: ConversationState): string | undefined {
  const last = state.messages[state.messages.length - 1];
  return last?.role === 'user' ? last.content : undefined;
}

function requireQuery(state: ConversationState): string {
  const query = latestUserQuery(state);
  if (query === undefined) {
    throw new Error('Conversation does not end with a user message');
  }
  return query;
}

const hasUserQuery: Precondition = {
  name: 'has_user_query',
  check: (state) => latestUserQuery(state) !== undefined,
  errorMessage: 'The last message must be a user message',
};

const isRouted: Precondition = {
  name: 'is_routed',
  check: (state) => state.routingDecision !== undefined,
  errorMessage: 'Routing decision must be set before querying',
};

function withStage(state: ConversationState, stage: StageName): StageName[] {
  return [...state.routeTrace, stage];
}

// ============================================================
// NODES
// ============================================================

export interface RouteOutput {
  decision: RoutingDecision;
  scores: RouteScores;
}

/**
 * Route Node
 * Scores the query against both lexicons and records the single routing decision
 */
export const RouteNode: GraphNode<RouteOutput> = {
  id: 'route',
  name: 'Route',
  description: 'Decide whether the query needs the invoice database, the documents, or both',

  preconditions: [
    hasUserQuery,
    {
      name: 'not_yet_routed',
      check: (state) => state.routingDecision === undefined,
      errorMessage: 'A routing decision was already made for this invocation',
    },
  ],
  postconditions: [],

  async execute(state) {
    const scores = scoreQuery(requireQuery(state));
    const decision = decideRoute(scores);
    logger.info(`Routing to ${decision} (sql=${scores.sqlScore}, rag=${scores.ragScore}) [thread ${state.threadId}]`);
    return { decision, scores };
  },

  updateState(state, output) {
    return {
      ...state,
      routingDecision: output.decision,
      routeTrace: withStage(state, 'route'),
    };
  },
};

/**
 * Hybrid Query Node
 * Marks entry into the composite branch; the executor then runs the
 * structured stage followed by the document stage
 */
export const HybridQueryNode: GraphNode<void> = {
  id: 'query_both',
  name: 'Query Both',
  description: 'Composite stage: structured query first, then document retrieval',

  preconditions: [
    {
      name: 'routed_to_both',
      check: (state) => state.routingDecision === 'both',
      errorMessage: 'Composite stage requires a "both" routing decision',
    },
  ],
  postconditions: [],

  async execute() {
    logger.debug('Entering composite stage');
  },

  updateState(state) {
    return { ...state, routeTrace: withStage(state, 'query_both') };
  },
};

/**
 * Structured Query Node
 * Resolves the query against the invoice store. Storage failures arrive here
 * as marked text, never as exceptions.
 */
export const StructuredQueryNode: GraphNode<string> = {
  id: 'query_sql',
  name: 'Query Invoices',
  description: 'Run the matching invoice query template and summarize the result',

  preconditions: [hasUserQuery, isRouted],
  postconditions: [],

  async execute(state, context) {
    logger.debug('Querying invoice store');
    return context.resolver.resolve(requireQuery(state));
  },

  updateState(state, output) {
    return {
      ...state,
      structuredResult: output,
      routeTrace: withStage(state, 'query_sql'),
    };
  },
};

export interface DocumentQueryOutput {
  context: string;
  chunkCount: number;
}

/**
 * Document Query Node
 * Hybrid retrieval over the document index; no hits leaves the context empty
 */
export const DocumentQueryNode: GraphNode<DocumentQueryOutput> = {
  id: 'query_rag',
  name: 'Query Documents',
  description: 'Retrieve relevant document chunks with dense + BM25 search',

  preconditions: [hasUserQuery, isRouted],
  postconditions: [],

  async execute(state, context) {
    const results = await context.documents.hybridRetrieve(requireQuery(state), context.topK);
    logger.debug(`Retrieved ${results.length} chunks`);
    return {
      context: results.map((result) => result.chunk.content).join('\n\n'),
      chunkCount: results.length,
    };
  },

  updateState(state, output) {
    return {
      ...state,
      documentContext: output.context,
      routeTrace: withStage(state, 'query_rag'),
    };
  },
};

/**
 * Generate Node
 * Merges gathered context into the final assistant turn
 */
export const GenerateNode: GraphNode<{ content: string }> = {
  id: 'generate',
  name: 'Generate Answer',
  description: 'Combine structured results and documents into the final answer',

  preconditions: [hasUserQuery, isRouted],
  postconditions: [
    {
      name: 'has_content',
      check: (_state, output) => output.content.trim().length > 0,
      errorMessage: 'Answer must not be empty',
    },
  ],

  async execute(state, context) {
    logger.debug('Generating answer');
    const result = await context.synthesizer.synthesize({
      query: requireQuery(state),
      structuredResult: state.structuredResult,
      documentContext: state.documentContext,
      routeTrace: withStage(state, 'generate'),
    });
    return { content: result.content };
  },

  updateState(state, output) {
    return {
      ...state,
      messages: [...state.messages, { role: 'assistant', content: output.content }],
      routeTrace: withStage(state, 'generate'),
    };
  },
};

// ============================================================
// NODE REGISTRY
// ============================================================

/**
 * Registry of all available nodes
 */
export const NodeRegistry = {
  route: RouteNode,
  query_both: HybridQueryNode,
  query_sql: StructuredQueryNode,
  query_rag: DocumentQueryNode,
  generate: GenerateNode,
} satisfies Record<StageName, AnyGraphNode>;
