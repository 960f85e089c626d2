import { z } from 'zod';

// ============ Status Vocabulary ============

export const INVOICE_STATUSES = [
  'Pending',
  'Approved',
  'Rejected',
  'Paid',
  'Overdue',
  'On Hold',
  'Cancelled',
] as const;

export const InvoiceStatusSchema = z.enum(INVOICE_STATUSES);

export type InvoiceStatus = z.infer<typeof InvoiceStatusSchema>;

// ============ Invoice Record ============

/** ISO calendar date, e.g. 2024-03-31 */
const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

/**
 * A persisted invoice. Read-only from the query path; written only by seeding.
 */
export const InvoiceRecordSchema = z.object({
  invoiceId: z.string().min(1),
  vendor: z.string().min(1),
  amount: z.number().nonnegative(),
  issueDate: IsoDateSchema,
  dueDate: IsoDateSchema.optional(),
  status: InvoiceStatusSchema,
  // May legitimately disagree with `status` (e.g. Paid but flagged Overdue on approval)
  approvalStatus: InvoiceStatusSchema,
  category: z.string(),
  department: z.string(),
  paymentTerms: z.string(),
  poNumber: z.string().optional(),
  subtotal: z.number().nonnegative(),
  taxRate: z.number().nonnegative(),
  taxAmount: z.number().nonnegative(),
  notes: z.string().optional(),
});

export type InvoiceRecord = z.infer<typeof InvoiceRecordSchema>;

/** Equality filter the store understands */
export interface InvoiceFilter {
  field: 'status' | 'approvalStatus';
  value: InvoiceStatus;
}

export type GroupDimension = 'category' | 'department' | 'vendor';

export interface GroupTotal {
  key: string;
  total: number;
  count: number;
}

export interface FilterSummary {
  count: number;
  total: number;
}
