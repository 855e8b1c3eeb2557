/**
 * Master Data Extraction
 *
 * The journal export already holds every partner and department name the
 * accounting system knows. Collecting the distinct values of the debit and
 * credit columns gives the candidate universe for matching.
 */

import { JOURNAL_COLUMNS } from './types';
import type { MasterData, SheetRow } from './types';

/**
 * Column names holding partner and department values.
 */
export interface MasterColumns {
  partners: readonly string[];
  departments: readonly string[];
}

export const DEFAULT_MASTER_COLUMNS: MasterColumns = {
  partners: [JOURNAL_COLUMNS.DEBIT_PARTNER, JOURNAL_COLUMNS.CREDIT_PARTNER],
  departments: [JOURNAL_COLUMNS.DEBIT_DEPARTMENT, JOURNAL_COLUMNS.CREDIT_DEPARTMENT],
};

function collectDistinct(
  journals: readonly (readonly SheetRow[])[],
  columns: readonly string[]
): string[] {
  const values = new Set<string>();

  for (const rows of journals) {
    for (const row of rows) {
      for (const column of columns) {
        const value = row[column];
        if (value !== undefined && value.trim() !== '') {
          values.add(value);
        }
      }
    }
  }

  return [...values].sort();
}

/**
 * Extracts the distinct partner and department names of one or more
 * journal exports (e.g. several fiscal years).
 *
 * @param journals - Rows of each journal file
 * @param columns - Columns to read, the journal export layout by default
 * @returns Sorted, de-duplicated, non-blank names
 *
 * @example
 * extractMasterData([[{ 借方取引先名: 'テスト商事', 貸方部門: '営業部' }]])
 * // Returns: { partners: ['テスト商事'], departments: ['営業部'] }
 */
export function extractMasterData(
  journals: readonly (readonly SheetRow[])[],
  columns: MasterColumns = DEFAULT_MASTER_COLUMNS
): MasterData {
  return {
    partners: collectDistinct(journals, columns.partners),
    departments: collectDistinct(journals, columns.departments),
  };
}

export default extractMasterData;
