/**
 * Reconciliation Service
 *
 * Orchestrates the import check:
 * - Parses the voucher file and the journal exports
 * - Extracts master partner and department names
 * - Renames sub-account columns and renumbers vouchers
 * - Checks every row's names against the master data
 *
 * Nothing is stored. The client keeps the prepared rows, lets a reviewer pick
 * replacements, and posts both back for finalization.
 */

import { matcherDefaults } from '../config';
import type { MatcherConfig } from '../matching';
import {
  IMPORT_COLUMNS,
  extractMasterData,
  finalizeImportRows,
  prepareImportRows,
  reconcileRows,
  renameSubAccountHeaders,
  summarizeReconciliation,
} from '../reconciliation';
import type {
  ReconciliationSummary,
  ReviewSelection,
  RowReconciliation,
  SheetRow,
} from '../reconciliation';
import { AppError, Logging, parseCsvBuffer, validateCsvHeaders } from '../utils';
import type { CsvEncoding } from '../utils';

// ============================================
// Types
// ============================================

/**
 * An uploaded file, as multer's memory storage hands it over.
 */
export interface UploadedCsv {
  originalname: string;
  buffer: Buffer;
}

export interface ReconciliationCheckResult {
  importFile: {
    name: string;
    encoding: CsvEncoding;
    headers: string[];
  };
  masterData: {
    journalFiles: number;
    partners: number;
    departments: number;
  };
  rows: SheetRow[];
  checks: RowReconciliation[];
  summary: ReconciliationSummary;
}

const REQUIRED_IMPORT_COLUMNS: readonly string[] = [IMPORT_COLUMNS.VOUCHER_NUMBER];

// ============================================
// Service
// ============================================

export class ReconciliationService {
  constructor(private readonly matcherConfig: Readonly<MatcherConfig>) {}

  /**
   * Prepares the import file and checks its names.
   *
   * @param importFile - Voucher file to import
   * @param journalFiles - One or more journal exports holding the master names
   * @param now - Clock used for the new voucher numbers
   * @throws AppError (400) without journal files, (422) when the import file lacks 伝票番号
   */
  checkNames(
    importFile: UploadedCsv,
    journalFiles: readonly UploadedCsv[],
    now: Date = new Date()
  ): ReconciliationCheckResult {
    if (journalFiles.length === 0) {
      throw AppError.badRequest('At least one journal file is required');
    }

    const parsedImport = parseCsvBuffer(importFile.buffer);
    const validation = validateCsvHeaders(parsedImport.headers, REQUIRED_IMPORT_COLUMNS);
    if (!validation.valid) {
      throw AppError.unprocessable(
        `Import file ${importFile.originalname} is missing required columns: ${validation.missing.join(', ')}`
      );
    }
    Logging.info(
      `📖 Read ${parsedImport.rows.length} rows from ${importFile.originalname} (${parsedImport.encoding})`
    );

    const journals = journalFiles.map((file) => {
      const parsed = parseCsvBuffer(file.buffer);
      Logging.info(`📖 Read ${parsed.rows.length} journal rows from ${file.originalname} (${parsed.encoding})`);
      return parsed.rows;
    });

    const masterData = extractMasterData(journals);
    if (masterData.partners.length === 0) {
      Logging.warn('No partner names found in the journal files; partner checks skipped');
    }
    if (masterData.departments.length === 0) {
      Logging.warn('No department names found in the journal files; department checks skipped');
    }

    const rows = prepareImportRows(parsedImport.rows, now);
    const checks = reconcileRows(rows, masterData, this.matcherConfig);
    const summary = summarizeReconciliation(checks);

    Logging.success(
      `Checked ${summary.totalRows} rows: partners ${summary.partner.exactMatches}/${summary.partner.checked} exact, ` +
        `departments ${summary.department.exactMatches}/${summary.department.checked} exact`
    );

    return {
      importFile: {
        name: importFile.originalname,
        encoding: parsedImport.encoding,
        headers: renameSubAccountHeaders(parsedImport.headers),
      },
      masterData: {
        journalFiles: journalFiles.length,
        partners: masterData.partners.length,
        departments: masterData.departments.length,
      },
      rows,
      checks,
      summary,
    };
  }

  /**
   * Applies reviewer selections and unifies names per voucher.
   */
  finalize(
    rows: readonly SheetRow[],
    selections: readonly (ReviewSelection | null | undefined)[]
  ): SheetRow[] {
    const finalized = finalizeImportRows(rows, selections);
    Logging.success(`Finalized ${finalized.length} rows for import`);
    return finalized;
  }
}

export const reconciliationService = new ReconciliationService(matcherDefaults);

export default reconciliationService;
