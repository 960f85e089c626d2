/**
 * Structured Query Resolver
 *
 * Maps a question to exactly one invoice query template and renders the
 * result as a plain-text fragment. Templates are evaluated in table order;
 * the first whose predicate matches wins.
 */

import type { GroupDimension, InvoiceFilter, InvoiceRecord } from '@ledger-auditor/shared';
import { createLogger, type Logger } from '../../utils/logger';
import type { InvoiceStore } from './types';

export const DETAIL_LIST_LIMIT = 10;
export const RECENT_LIST_LIMIT = 10;

export type QueryTemplateId =
  | 'pending_count'
  | 'overdue_count'
  | 'paid_count'
  | 'spending_by_category'
  | 'spending_by_department'
  | 'total_by_vendor'
  | 'pending_detail'
  | 'overdue_detail'
  | 'paid_detail'
  | 'record_count'
  | 'recent_invoices';

export interface QueryTemplate {
  id: QueryTemplateId;
  /** `query` is already lower-cased */
  matches(query: string): boolean;
  run(store: InvoiceStore): Promise<string>;
}

// ============================================================
// FORMATTING
// ============================================================

const currency = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

export function formatMoney(amount: number): string {
  return currency.format(amount);
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

// ============================================================
// FILTERS
// ============================================================

interface NamedFilter {
  label: string;
  filter: InvoiceFilter;
}

const PENDING: NamedFilter = { label: 'pending', filter: { field: 'status', value: 'Pending' } };
// Overdue is an approval-workflow flag, not a lifecycle status
const OVERDUE: NamedFilter = { label: 'overdue', filter: { field: 'approvalStatus', value: 'Overdue' } };
const PAID: NamedFilter = { label: 'paid', filter: { field: 'status', value: 'Paid' } };

// ============================================================
// TEMPLATE BUILDERS
// ============================================================

function isCountQuery(query: string): boolean {
  return query.includes('count') || query.includes('how many');
}

function countTemplate(id: QueryTemplateId, named: NamedFilter): QueryTemplate {
  return {
    id,
    matches: (query) => isCountQuery(query) && query.includes(named.label),
    async run(store) {
      const { count, total } = await store.summarize(named.filter);
      return `Found ${pluralize(count, `${named.label} invoice`)} totaling ${formatMoney(total)}.`;
    },
  };
}

function groupTemplate(
  id: QueryTemplateId,
  keywords: string[],
  dimension: GroupDimension,
  heading: string
): QueryTemplate {
  return {
    id,
    matches: (query) => keywords.some((keyword) => query.includes(keyword)),
    async run(store) {
      const groups = await store.sumBy(dimension);
      if (groups.length === 0) {
        return 'No invoices found.';
      }
      const lines = groups.map(
        (group) => `- ${group.key}: ${formatMoney(group.total)} (${pluralize(group.count, 'invoice')})`
      );
      return [`${heading}:`, ...lines].join('\n');
    },
  };
}

function formatDetailLine(record: InvoiceRecord): string {
  return `- ${record.invoiceId} | ${record.vendor} | ${formatMoney(record.amount)} | due ${record.dueDate ?? 'n/a'}`;
}

function detailTemplate(id: QueryTemplateId, named: NamedFilter): QueryTemplate {
  return {
    id,
    matches: (query) => query.includes(named.label),
    async run(store) {
      const { records, total } = await store.list(named.filter, DETAIL_LIST_LIMIT);
      if (total === 0) {
        return `No ${named.label} invoices found.`;
      }
      const lines = [`${capitalize(named.label)} invoices (${total}):`, ...records.map(formatDetailLine)];
      const omitted = total - records.length;
      if (omitted > 0) {
        lines.push(`...and ${omitted} more not shown.`);
      }
      return lines.join('\n');
    },
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ============================================================
// DECISION TABLE
// ============================================================

/**
 * Priority order matters: status-specific counts come before status detail
 * listings, which come before the generic count.
 */
export const QUERY_TEMPLATES: readonly QueryTemplate[] = [
  countTemplate('pending_count', PENDING),
  countTemplate('overdue_count', OVERDUE),
  countTemplate('paid_count', PAID),
  groupTemplate('spending_by_category', ['category', 'spending by'], 'category', 'Spending by category'),
  groupTemplate('spending_by_department', ['department'], 'department', 'Spending by department'),
  groupTemplate('total_by_vendor', ['total', 'sum'], 'vendor', 'Total amount by vendor'),
  detailTemplate('pending_detail', PENDING),
  detailTemplate('overdue_detail', OVERDUE),
  detailTemplate('paid_detail', PAID),
  {
    id: 'record_count',
    matches: isCountQuery,
    async run(store) {
      const count = await store.count();
      return `There are ${pluralize(count, 'invoice')} in the database.`;
    },
  },
  {
    id: 'recent_invoices',
    matches: () => true,
    async run(store) {
      const records = await store.listRecent(RECENT_LIST_LIMIT);
      if (records.length === 0) {
        return 'No invoices found.';
      }
      const lines = records.map(
        (record) =>
          `- ${record.invoiceId} | ${record.vendor} | ${formatMoney(record.amount)} | issued ${record.issueDate} | ${record.status}`
      );
      return ['Most recent invoices:', ...lines].join('\n');
    },
  },
];

export function formatDatabaseError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `[Database error] ${message}`;
}

export class StructuredQueryResolver {
  private logger: Logger;

  constructor(
    private store: InvoiceStore,
    private templates: readonly QueryTemplate[] = QUERY_TEMPLATES,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('StructuredQueryResolver');
  }

  /**
   * First template whose predicate matches the case-folded query
   */
  selectTemplate(query: string): QueryTemplate {
    const folded = query.toLowerCase();
    const template = this.templates.find((candidate) => candidate.matches(folded));
    if (!template) {
      // The built-in table ends in a catch-all; a custom table must too.
      throw new Error(`No query template matches "${query}"`);
    }
    return template;
  }

  /**
   * Never throws for storage failures: they come back as a marked error string
   */
  async resolve(query: string): Promise<string> {
    const template = this.selectTemplate(query);
    this.logger.debug(`Selected template ${template.id}`);
    try {
      return await template.run(this.store);
    } catch (error) {
      this.logger.error(`Template ${template.id} failed:`, error);
      return formatDatabaseError(error);
    }
  }
}
