export * from './types';
export { SQL_INTENT_TERMS, DOCUMENT_INTENT_TERMS, scoreQuery, decideRoute, routeQuery, type RouteScores } from './query-router';
export {
  AnswerSynthesizer,
  buildContextBlock,
  buildRouteBanner,
  characterizeRoute,
  type RouteCharacterization,
  type SynthesisInput,
  type SynthesisOutput,
} from './answer-synthesizer';
export {
  NodeExecutor,
  NodeRegistry,
  RouteNode,
  HybridQueryNode,
  StructuredQueryNode,
  DocumentQueryNode,
  GenerateNode,
  latestUserQuery,
  type AnyGraphNode,
  type GraphNode,
  type NodeContext,
  type NodeExecutionResult,
} from './nodes';
export {
  AuditAgent,
  GraphExecutor,
  createAuditGraph,
  type ConditionalEdge,
  type Edge,
  type GraphDefinition,
  type GraphExecutionResult,
  type NodeTarget,
} from './graphs';
