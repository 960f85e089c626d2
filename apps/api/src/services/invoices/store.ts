/**
 * SQLite-backed invoice storage
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  InvoiceStatusSchema,
  type FilterSummary,
  type GroupDimension,
  type GroupTotal,
  type InvoiceFilter,
  type InvoiceRecord,
} from '@ledger-auditor/shared';
import { InvoiceStoreError, type InvoiceStore } from './types';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS invoices (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    invoice_id TEXT NOT NULL UNIQUE,
    vendor TEXT NOT NULL,
    amount REAL NOT NULL CHECK (amount >= 0),
    issue_date TEXT NOT NULL,
    due_date TEXT,
    status TEXT NOT NULL DEFAULT 'Pending',
    approval_status TEXT NOT NULL DEFAULT 'Pending',
    category TEXT NOT NULL,
    department TEXT NOT NULL,
    payment_terms TEXT NOT NULL,
    po_number TEXT,
    subtotal REAL NOT NULL,
    tax_rate REAL NOT NULL,
    tax_amount REAL NOT NULL,
    notes TEXT,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_invoices_status ON invoices(status);
  CREATE INDEX IF NOT EXISTS idx_invoices_approval_status ON invoices(approval_status);
  CREATE INDEX IF NOT EXISTS idx_invoices_issue_date ON invoices(issue_date);
`;

// Column names are never taken from user input; these maps are the only source.
const FILTER_COLUMNS: Record<InvoiceFilter['field'], string> = {
  status: 'status',
  approvalStatus: 'approval_status',
};

const GROUP_COLUMNS: Record<GroupDimension, string> = {
  category: 'category',
  department: 'department',
  vendor: 'vendor',
};

const nullable = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullable().transform((value) => value ?? undefined);

const InvoiceRowSchema = z
  .object({
    invoice_id: z.string(),
    vendor: z.string(),
    amount: z.number(),
    issue_date: z.string(),
    due_date: nullable(z.string()),
    status: InvoiceStatusSchema,
    approval_status: InvoiceStatusSchema,
    category: z.string(),
    department: z.string(),
    payment_terms: z.string(),
    po_number: nullable(z.string()),
    subtotal: z.number(),
    tax_rate: z.number(),
    tax_amount: z.number(),
    notes: nullable(z.string()),
  })
  .transform(
    (row): InvoiceRecord => ({
      invoiceId: row.invoice_id,
      vendor: row.vendor,
      amount: row.amount,
      issueDate: row.issue_date,
      dueDate: row.due_date,
      status: row.status,
      approvalStatus: row.approval_status,
      category: row.category,
      department: row.department,
      paymentTerms: row.payment_terms,
      poNumber: row.po_number,
      subtotal: row.subtotal,
      taxRate: row.tax_rate,
      taxAmount: row.tax_amount,
      notes: row.notes,
    })
  );

const SummaryRowSchema = z.object({
  count: z.number().int(),
  total: z.number(),
});

const CountRowSchema = z.object({ count: z.number().int() });

const GroupRowSchema = z.object({
  key: z.string(),
  total: z.number(),
  count: z.number().int(),
});

export class SqliteInvoiceStore implements InvoiceStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(dbPath);
    this.db.exec(SCHEMA);
  }

  async summarize(filter: InvoiceFilter): Promise<FilterSummary> {
    return this.run('summarize', () => {
      const column = FILTER_COLUMNS[filter.field];
      const row = this.db
        .prepare(`SELECT COUNT(*) AS count, COALESCE(SUM(amount), 0) AS total FROM invoices WHERE ${column} = ?`)
        .get(filter.value);
      return SummaryRowSchema.parse(row);
    });
  }

  async list(filter: InvoiceFilter, limit: number): Promise<{ records: InvoiceRecord[]; total: number }> {
    return this.run('list', () => {
      const column = FILTER_COLUMNS[filter.field];
      const rows = this.db
        .prepare(
          `SELECT * FROM invoices WHERE ${column} = ?
           ORDER BY due_date IS NULL, due_date ASC, invoice_id ASC
           LIMIT ?`
        )
        .all(filter.value, limit);
      const { count } = CountRowSchema.parse(
        this.db.prepare(`SELECT COUNT(*) AS count FROM invoices WHERE ${column} = ?`).get(filter.value)
      );
      return { records: z.array(InvoiceRowSchema).parse(rows), total: count };
    });
  }

  async sumBy(dimension: GroupDimension): Promise<GroupTotal[]> {
    return this.run('sumBy', () => {
      const column = GROUP_COLUMNS[dimension];
      const rows = this.db
        .prepare(
          `SELECT ${column} AS key, SUM(amount) AS total, COUNT(*) AS count
           FROM invoices
           GROUP BY ${column}
           ORDER BY total DESC, key ASC`
        )
        .all();
      return z.array(GroupRowSchema).parse(rows);
    });
  }

  async count(): Promise<number> {
    return this.run('count', () => {
      return CountRowSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM invoices').get()).count;
    });
  }

  async listRecent(limit: number): Promise<InvoiceRecord[]> {
    return this.run('listRecent', () => {
      const rows = this.db
        .prepare('SELECT * FROM invoices ORDER BY issue_date DESC, invoice_id DESC LIMIT ?')
        .all(limit);
      return z.array(InvoiceRowSchema).parse(rows);
    });
  }

  async insertMany(records: InvoiceRecord[]): Promise<number> {
    return this.run('insertMany', () => {
      const insert = this.db.prepare(`
        INSERT INTO invoices (
          invoice_id, vendor, amount, issue_date, due_date, status, approval_status,
          category, department, payment_terms, po_number, subtotal, tax_rate, tax_amount,
          notes, created_at
        ) VALUES (
          @invoiceId, @vendor, @amount, @issueDate, @dueDate, @status, @approvalStatus,
          @category, @department, @paymentTerms, @poNumber, @subtotal, @taxRate, @taxAmount,
          @notes, @createdAt
        )
      `);
      const insertAll = this.db.transaction((batch: InvoiceRecord[]) => {
        const now = Date.now();
        for (const record of batch) {
          insert.run({
            ...record,
            dueDate: record.dueDate ?? null,
            poNumber: record.poNumber ?? null,
            notes: record.notes ?? null,
            createdAt: now,
          });
        }
        return batch.length;
      });
      return insertAll(records);
    });
  }

  close(): void {
    this.db.close();
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvoiceStoreError(`Invoice store ${operation} failed: ${message}`, operation, error);
    }
  }
}
