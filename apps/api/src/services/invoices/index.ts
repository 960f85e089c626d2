export { type InvoiceStore, InvoiceStoreError } from './types';
export { SqliteInvoiceStore } from './store';
export { seedInvoicesIfEmpty } from './seed';
export {
  type QueryTemplate,
  type QueryTemplateId,
  QUERY_TEMPLATES,
  DETAIL_LIST_LIMIT,
  RECENT_LIST_LIMIT,
  StructuredQueryResolver,
  formatMoney,
  formatDatabaseError,
} from './resolver';
