/**
 * Reconciliation Workflow
 *
 * journal export → master data
 * voucher file → prepare → check names → reviewer choices → finalize
 */

export { extractMasterData, DEFAULT_MASTER_COLUMNS } from './masterData';
export {
  renameSubAccountColumns,
  formatVoucherPrefix,
  generateVoucherNumbers,
  prepareImportRows,
  renameSubAccountHeaders,
} from './prepareImport';
export { reconcileRows, summarizeReconciliation, pickSourceValue } from './reconcileNames';
export { finalizeImportRows } from './finalizeImport';
export { JOURNAL_COLUMNS, IMPORT_COLUMNS } from './types';

export type { MasterColumns } from './masterData';
export type {
  SheetRow,
  MasterData,
  FieldCheck,
  RowReconciliation,
  FieldSummary,
  ReconciliationSummary,
  ReviewSelection,
} from './types';
