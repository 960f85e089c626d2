import type {
  FilterSummary,
  GroupDimension,
  GroupTotal,
  InvoiceFilter,
  InvoiceRecord,
} from '@ledger-auditor/shared';

/**
 * The query shapes the structured resolver depends on. Any engine can back it.
 */
export interface InvoiceStore {
  /** Count and total amount of records matching the filter */
  summarize(filter: InvoiceFilter): Promise<FilterSummary>;

  /** Up to `limit` matching records (soonest due first) plus the full match count */
  list(filter: InvoiceFilter, limit: number): Promise<{ records: InvoiceRecord[]; total: number }>;

  /** Amounts grouped by a dimension, descending by sum */
  sumBy(dimension: GroupDimension): Promise<GroupTotal[]>;

  /** Unfiltered record count */
  count(): Promise<number>;

  /** Newest records by issue date */
  listRecent(limit: number): Promise<InvoiceRecord[]>;

  /** Seeding path only; the query path never writes */
  insertMany(records: InvoiceRecord[]): Promise<number>;

  close(): void;
}

/**
 * Storage-level failure (connection, SQL, row validation)
 */
export class InvoiceStoreError extends Error {
  constructor(
    message: string,
    public operation: string,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'InvoiceStoreError';
  }
}
