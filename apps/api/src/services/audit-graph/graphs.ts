/**
 * Audit Graph - Graph Definition and Execution
 *
 * route -> (structured | document | both)
 *   structured -> query_sql -> generate
 *   document   -> query_rag -> generate
 *   both       -> query_both -> query_sql -> query_rag -> generate
 *
 * Routing is deterministic: conditional edges read the routing decision
 * from state, never a model.
 */

import { STAGE_NAMES, type StageName } from '@ledger-auditor/shared';
import { createLogger } from '../../utils/logger';
import {
  NodeExecutor,
  NodeRegistry,
  type AnyGraphNode,
  type NodeContext,
} from './nodes';
import {
  ConversationStateSchema,
  GraphExecutionError,
  createInitialState,
  type ConversationState,
  type ConversationStateInput,
} from './types';

const logger = createLogger('AuditAgent');

// ============================================================
// GRAPH TYPES
// ============================================================

export type NodeTarget = StageName | 'END';

/**
 * Edge definition - connection between nodes
 */
export interface Edge {
  from: StageName;
  to: NodeTarget;
}

/**
 * Conditional edge - routing based on state
 */
export interface ConditionalEdge {
  from: StageName;
  condition: (state: ConversationState) => string;
  routes: Record<string, NodeTarget>;
}

/**
 * Graph definition
 */
export interface GraphDefinition {
  id: string;
  name: string;
  entryPoint: StageName;
  nodes: Map<StageName, AnyGraphNode>;
  edges: Edge[];
  conditionalEdges: ConditionalEdge[];
}

/**
 * Graph execution result
 */
export interface GraphExecutionResult {
  finalState: ConversationState;
  executionPath: StageName[];
  totalDuration: number;
}

// ============================================================
// GRAPH EXECUTOR
// ============================================================

/**
 * Executes a graph definition against a state, one node at a time
 */
export class GraphExecutor {
  private nodeExecutor = new NodeExecutor();

  constructor(
    private graph: GraphDefinition,
    private context: NodeContext
  ) {}

  /**
   * Execute the graph from entry point to END. A failing node aborts the run
   * with a GraphExecutionError.
   */
  async execute(initialState: ConversationState): Promise<GraphExecutionResult> {
    const startTime = Date.now();
    const executionPath: StageName[] = [];
    let currentState = initialState;
    let currentNodeId: NodeTarget = this.graph.entryPoint;

    while (currentNodeId !== 'END') {
      executionPath.push(currentNodeId);

      const node = this.graph.nodes.get(currentNodeId);
      if (!node) {
        throw new GraphExecutionError(
          {
            code: 'UNKNOWN_NODE',
            message: `Node not found: ${currentNodeId}`,
            nodeId: currentNodeId,
            severity: 'fatal',
            timestamp: new Date(),
          },
          executionPath
        );
      }

      const result = await this.nodeExecutor.execute(node, currentState, this.context);
      if (!result.success) {
        const agentError = result.error ?? {
          code: 'NODE_EXECUTION_ERROR' as const,
          message: 'Node failed without an error',
          nodeId: currentNodeId,
          severity: 'fatal' as const,
          timestamp: new Date(),
        };
        logger.error(`Node ${currentNodeId} failed: ${agentError.message}`);
        throw new GraphExecutionError(agentError, executionPath);
      }

      currentState = node.updateState(currentState, result.output);
      currentNodeId = this.getNextNode(currentNodeId, currentState);
    }

    return {
      finalState: currentState,
      executionPath,
      totalDuration: Date.now() - startTime,
    };
  }

  /**
   * Get next node based on edges
   */
  private getNextNode(currentNodeId: StageName, state: ConversationState): NodeTarget {
    // Check conditional edges first
    for (const condEdge of this.graph.conditionalEdges) {
      if (condEdge.from === currentNodeId) {
        const routeKey = condEdge.condition(state);
        const nextNode = condEdge.routes[routeKey];
        if (nextNode) {
          return nextNode;
        }
      }
    }

    // Check regular edges
    for (const edge of this.graph.edges) {
      if (edge.from === currentNodeId) {
        return edge.to;
      }
    }

    // No edge found - end
    return 'END';
  }
}

// ============================================================
// AUDIT GRAPH
// ============================================================

/**
 * Create the query workflow graph
 */
export function createAuditGraph(): GraphDefinition {
  const nodes = new Map<StageName, AnyGraphNode>(
    STAGE_NAMES.map((id): [StageName, AnyGraphNode] => [id, NodeRegistry[id]])
  );

  const edges: Edge[] = [
    { from: 'query_both', to: 'query_sql' },
    { from: 'query_rag', to: 'generate' },
    { from: 'generate', to: 'END' },
  ];

  const conditionalEdges: ConditionalEdge[] = [
    {
      from: 'route',
      condition: (state) => state.routingDecision ?? 'unrouted',
      routes: {
        structured: 'query_sql',
        document: 'query_rag',
        both: 'query_both',
      },
    },
    {
      // Inside the composite branch the structured stage hands off to documents
      from: 'query_sql',
      condition: (state) => (state.routingDecision === 'both' ? 'continue_composite' : 'answer'),
      routes: {
        continue_composite: 'query_rag',
        answer: 'generate',
      },
    },
  ];

  return {
    id: 'audit_query',
    name: 'Audit Query Workflow',
    entryPoint: 'route',
    nodes,
    edges,
    conditionalEdges,
  };
}

// ============================================================
// ENTRY POINT
// ============================================================

/**
 * The contract exposed upward: query text (plus optional thread id) in,
 * answer text out. Independent invocations share no mutable state besides
 * the collaborators in the node context.
 */
export class AuditAgent {
  constructor(
    private context: NodeContext,
    private graph: GraphDefinition = createAuditGraph()
  ) {}

  /**
   * Run the graph on a caller-supplied state. Optional fields are defaulted;
   * a state without `messages` is rejected.
   */
  async invoke(input: ConversationStateInput): Promise<ConversationState> {
    const state = ConversationStateSchema.parse(input);
    const executor = new GraphExecutor(this.graph, this.context);
    const result = await executor.execute(state);
    logger.info(
      `Completed ${result.executionPath.join(' -> ')} in ${result.totalDuration}ms [thread ${state.threadId}]`
    );
    return result.finalState;
  }

  async ask(query: string, threadId = 'default'): Promise<string> {
    const finalState = await this.invoke(createInitialState(query, threadId));
    const answer = finalState.messages[finalState.messages.length - 1];
    if (answer?.role !== 'assistant') {
      throw new Error('Workflow finished without an assistant message');
    }
    return answer.content;
  }
}
