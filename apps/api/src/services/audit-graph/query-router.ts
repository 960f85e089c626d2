/**
 * Query Router
 *
 * Keyword scoring against two fixed lexicons. A pure function of the text:
 * more database terms -> structured, more document terms -> document,
 * anything else (including no matches at all) -> both.
 */

import type { RoutingDecision } from '@ledger-auditor/shared';

/** Terms that signal aggregation or filtering over invoice rows */
export const SQL_INTENT_TERMS: readonly string[] = [
  'invoice',
  'vendor',
  'amount',
  'total',
  'sum',
  'count',
  'average',
  'how many',
  'list all',
  'show me',
  'paid',
  'pending',
  'status',
];

/** Terms that signal narrative or report content */
export const DOCUMENT_INTENT_TERMS: readonly string[] = [
  'report',
  'audit',
  'analysis',
  'summary',
  'growth',
  'compliance',
  'revenue',
  'expense',
  'gaap',
  'quarter',
  'q1',
  'q2',
  'q3',
  'q4',
];

export interface RouteScores {
  sqlScore: number;
  ragScore: number;
}

function countMatches(text: string, terms: readonly string[]): number {
  return terms.filter((term) => text.includes(term)).length;
}

/**
 * Each lexicon term counts once if it occurs anywhere in the case-folded text
 */
export function scoreQuery(query: string): RouteScores {
  const folded = query.toLowerCase();
  return {
    sqlScore: countMatches(folded, SQL_INTENT_TERMS),
    ragScore: countMatches(folded, DOCUMENT_INTENT_TERMS),
  };
}

export function decideRoute(scores: RouteScores): RoutingDecision {
  if (scores.sqlScore > scores.ragScore) return 'structured';
  if (scores.ragScore > scores.sqlScore) return 'document';
  return 'both';
}

export function routeQuery(query: string): RoutingDecision {
  return decideRoute(scoreQuery(query));
}
