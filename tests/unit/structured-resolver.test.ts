import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { InvoiceRecord } from '../../packages/shared/src';
import { SqliteInvoiceStore } from '../../apps/api/src/services/invoices/store';
import {
  QUERY_TEMPLATES,
  StructuredQueryResolver,
  formatDatabaseError,
  formatMoney,
} from '../../apps/api/src/services/invoices/resolver';
import type { InvoiceStore } from '../../apps/api/src/services/invoices/types';
import { SAMPLE_INVOICES, makeInvoice } from '../fixtures/invoices';

class UnreachableStore implements InvoiceStore {
  private fail(): Promise<never> {
    return Promise.reject(new Error('connection refused'));
  }
  summarize() {
    return this.fail();
  }
  list() {
    return this.fail();
  }
  sumBy() {
    return this.fail();
  }
  count() {
    return this.fail();
  }
  listRecent() {
    return this.fail();
  }
  insertMany(_records: InvoiceRecord[]) {
    return this.fail();
  }
  close() {}
}

describe('Structured Query Resolver', () => {
  let store: SqliteInvoiceStore;
  let resolver: StructuredQueryResolver;

  beforeEach(async () => {
    store = new SqliteInvoiceStore(':memory:');
    await store.insertMany(SAMPLE_INVOICES);
    resolver = new StructuredQueryResolver(store);
  });

  afterEach(() => {
    store.close();
  });

  describe('template priority', () => {
    const cases: Array<[string, string]> = [
      ['How many pending invoices are there?', 'pending_count'],
      ['how many pending invoices do we have in total', 'pending_count'],
      ['Count overdue invoices', 'overdue_count'],
      ['how many paid invoices', 'paid_count'],
      ['total spending by category', 'spending_by_category'],
      ['how many invoices per department', 'spending_by_department'],
      ['total by vendor', 'total_by_vendor'],
      ['list pending invoices', 'pending_detail'],
      ['Which invoices are overdue?', 'overdue_detail'],
      ['show paid invoices', 'paid_detail'],
      ['How many invoices are there?', 'record_count'],
      ['What came in lately?', 'recent_invoices'],
    ];

    it.each(cases)('"%s" selects %s', (query, expected) => {
      expect(resolver.selectTemplate(query).id).toBe(expected);
    });

    it('ends with a catch-all', () => {
      expect(QUERY_TEMPLATES).toHaveLength(11);
      expect(QUERY_TEMPLATES[QUERY_TEMPLATES.length - 1].matches('')).toBe(true);
    });

    it('throws when a custom table has no match', () => {
      const narrow = new StructuredQueryResolver(store, [QUERY_TEMPLATES[0]]);
      expect(() => narrow.selectTemplate('hello')).toThrow('No query template matches "hello"');
    });
  });

  describe('rendering', () => {
    it('summarizes status counts', async () => {
      expect(await resolver.resolve('How many pending invoices are there?')).toBe(
        'Found 3 pending invoices totaling $450.00.'
      );
      expect(await resolver.resolve('how many overdue invoices')).toBe('Found 2 overdue invoices totaling $760.00.');
      expect(await resolver.resolve('count paid')).toBe('Found 2 paid invoices totaling $560.00.');
    });

    it('uses the singular for one match', async () => {
      const single = new SqliteInvoiceStore(':memory:');
      await single.insertMany([makeInvoice({ invoiceId: 'INV-900' })]);
      try {
        expect(await new StructuredQueryResolver(single).resolve('how many pending')).toBe(
          'Found 1 pending invoice totaling $100.00.'
        );
      } finally {
        single.close();
      }
    });

    it('renders grouped totals', async () => {
      expect(await resolver.resolve('spending by category')).toBe(
        [
          'Spending by category:',
          '- Software: $510.00 (3 invoices)',
          '- Consulting: $500.00 (1 invoice)',
          '- Travel: $500.00 (2 invoices)',
        ].join('\n')
      );
      expect(await resolver.resolve('department breakdown')).toBe(
        [
          'Spending by department:',
          '- Engineering: $510.00 (3 invoices)',
          '- Finance: $500.00 (1 invoice)',
          '- Sales: $500.00 (2 invoices)',
        ].join('\n')
      );
      expect(await resolver.resolve('total by vendor')).toBe(
        [
          'Total amount by vendor:',
          '- Acme Parts: $510.00 (3 invoices)',
          '- Globex: $500.00 (2 invoices)',
          '- Initech: $500.00 (1 invoice)',
        ].join('\n')
      );
    });

    it('lists detail records soonest due first', async () => {
      expect(await resolver.resolve('list pending invoices')).toBe(
        [
          'Pending invoices (3):',
          '- INV-002 | Acme Parts | $150.00 | due 2024-02-01',
          '- INV-001 | Acme Parts | $100.00 | due 2024-02-10',
          '- INV-003 | Globex | $200.00 | due n/a',
        ].join('\n')
      );
      expect(await resolver.resolve('Which invoices are overdue?')).toBe(
        [
          'Overdue invoices (2):',
          '- INV-006 | Acme Parts | $260.00 | due 2024-04-04',
          '- INV-005 | Initech | $500.00 | due 2024-04-05',
        ].join('\n')
      );
    });

    it('notes records beyond the detail limit', async () => {
      const many = new SqliteInvoiceStore(':memory:');
      await many.insertMany(
        Array.from({ length: 12 }, (_, i) =>
          makeInvoice({ invoiceId: `INV-${String(i + 100)}`, dueDate: `2024-05-${String(i + 10)}` })
        )
      );
      try {
        const lines = (await new StructuredQueryResolver(many).resolve('pending invoices')).split('\n');
        expect(lines[0]).toBe('Pending invoices (12):');
        expect(lines).toHaveLength(12);
        expect(lines[11]).toBe('...and 2 more not shown.');
      } finally {
        many.close();
      }
    });

    it('counts all records', async () => {
      expect(await resolver.resolve('How many invoices are there?')).toBe('There are 6 invoices in the database.');
    });

    it('lists recent invoices for anything else', async () => {
      const lines = (await resolver.resolve('What came in lately?')).split('\n');
      expect(lines[0]).toBe('Most recent invoices:');
      expect(lines[1]).toBe('- INV-006 | Acme Parts | $260.00 | issued 2024-03-05 | Paid');
      expect(lines[2]).toBe('- INV-005 | Initech | $500.00 | issued 2024-03-05 | Approved');
      expect(lines).toHaveLength(7);
    });
  });

  describe('empty store', () => {
    it('renders explicit no-result text', async () => {
      const empty = new SqliteInvoiceStore(':memory:');
      const emptyResolver = new StructuredQueryResolver(empty);
      try {
        expect(await emptyResolver.resolve('how many pending')).toBe('Found 0 pending invoices totaling $0.00.');
        expect(await emptyResolver.resolve('by category')).toBe('No invoices found.');
        expect(await emptyResolver.resolve('paid invoices')).toBe('No paid invoices found.');
        expect(await emptyResolver.resolve('how many')).toBe('There are 0 invoices in the database.');
        expect(await emptyResolver.resolve('hello')).toBe('No invoices found.');
      } finally {
        empty.close();
      }
    });
  });

  describe('storage failures', () => {
    it('returns a marked error string instead of throwing', async () => {
      const failing = new StructuredQueryResolver(new UnreachableStore());
      expect(await failing.resolve('How many pending invoices?')).toBe('[Database error] connection refused');
      expect(await failing.resolve('hello')).toBe('[Database error] connection refused');
    });

    it('marks wrapped SQLite failures', async () => {
      const closed = new SqliteInvoiceStore(':memory:');
      closed.close();
      const result = await new StructuredQueryResolver(closed).resolve('how many invoices');
      expect(result.startsWith('[Database error] Invoice store count failed: ')).toBe(true);
    });
  });

  it('formats money and errors', () => {
    expect(formatMoney(8555.75)).toBe('$8,555.75');
    expect(formatDatabaseError('timeout')).toBe('[Database error] timeout');
  });
});
