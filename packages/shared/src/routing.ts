import { z } from 'zod';

// ============ Routing ============

export const RoutingDecisionSchema = z.enum(['structured', 'document', 'both']);

export type RoutingDecision = z.infer<typeof RoutingDecisionSchema>;

/**
 * Workflow stages, in the order they may appear in a route trace.
 */
export const STAGE_NAMES = ['route', 'query_both', 'query_sql', 'query_rag', 'generate'] as const;

export const StageNameSchema = z.enum(STAGE_NAMES);

export type StageName = z.infer<typeof StageNameSchema>;
