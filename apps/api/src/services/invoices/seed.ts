import fs from 'fs';
import { z } from 'zod';
import { InvoiceRecordSchema } from '@ledger-auditor/shared';
import { createLogger } from '../../utils/logger';
import type { InvoiceStore } from './types';

const logger = createLogger('InvoiceSeed');

/**
 * Load invoice fixtures into an empty store. A populated store is left alone.
 *
 * @returns number of records inserted
 */
export async function seedInvoicesIfEmpty(store: InvoiceStore, seedPath: string): Promise<number> {
  const existing = await store.count();
  if (existing > 0) {
    logger.debug(`Store already holds ${existing} invoices, skipping seed`);
    return 0;
  }
  if (!fs.existsSync(seedPath)) {
    logger.warn(`Seed file not found: ${seedPath}`);
    return 0;
  }

  const parsed = z.array(InvoiceRecordSchema).safeParse(JSON.parse(fs.readFileSync(seedPath, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Invalid invoice seed file ${seedPath}: ${parsed.error.message}`);
  }

  const inserted = await store.insertMany(parsed.data);
  logger.info(`Seeded ${inserted} invoices from ${seedPath}`);
  return inserted;
}
