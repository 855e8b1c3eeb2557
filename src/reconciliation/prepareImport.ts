/**
 * Import File Preparation
 *
 * The voucher file exported by the source system uses sub-account columns
 * where the accounting import expects partner columns, and its voucher
 * numbers collide with numbers already in the ledger. Both are fixed before
 * the names are checked.
 */

import { IMPORT_COLUMNS } from './types';
import type { SheetRow } from './types';

const SUB_ACCOUNT_RENAMES: ReadonlyMap<string, string> = new Map([
  [IMPORT_COLUMNS.DEBIT_SUB_ACCOUNT, IMPORT_COLUMNS.DEBIT_PARTNER],
  [IMPORT_COLUMNS.CREDIT_SUB_ACCOUNT, IMPORT_COLUMNS.CREDIT_PARTNER],
]);

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Renames 借方補助科目 / 貸方補助科目 to 借方取引先 / 貸方取引先.
 * Column order is kept; rows without those columns pass through unchanged.
 */
export function renameSubAccountColumns(rows: readonly SheetRow[]): SheetRow[] {
  return rows.map((row) => {
    const renamed: SheetRow = {};
    for (const [column, value] of Object.entries(row)) {
      renamed[SUB_ACCOUNT_RENAMES.get(column) ?? column] = value;
    }
    return renamed;
  });
}

/**
 * The same rename applied to a header list, for files without data rows.
 */
export function renameSubAccountHeaders(headers: readonly string[]): string[] {
  return headers.map((header) => SUB_ACCOUNT_RENAMES.get(header) ?? header);
}

/**
 * Formats the local time as MMDDHHmm.
 *
 * @example
 * formatVoucherPrefix(new Date(2024, 2, 5, 9, 7)) // Returns: "03050907"
 */
export function formatVoucherPrefix(now: Date): string {
  return (
    pad2(now.getMonth() + 1) + pad2(now.getDate()) + pad2(now.getHours()) + pad2(now.getMinutes())
  );
}

/**
 * Replaces 伝票番号 with fresh numbers: the MMDDHHmm prefix followed by a
 * 3-digit sequence per distinct original number, in first-seen order.
 * Rows sharing an original number share the new one. A row with a blank
 * or missing number cannot be grouped and gets a number of its own.
 *
 * @example
 * generateVoucherNumbers([{ 伝票番号: 'A' }, { 伝票番号: 'A' }, { 伝票番号: 'B' }], new Date(2024, 2, 5, 9, 7))
 * // Returns: [{ 伝票番号: '03050907001' }, { 伝票番号: '03050907001' }, { 伝票番号: '03050907002' }]
 */
export function generateVoucherNumbers(rows: readonly SheetRow[], now: Date = new Date()): SheetRow[] {
  const prefix = formatVoucherPrefix(now);
  const assigned = new Map<string, string>();
  let sequence = 0;

  const nextNumber = (): string => {
    sequence += 1;
    return `${prefix}${String(sequence).padStart(3, '0')}`;
  };

  return rows.map((row) => {
    const original = row[IMPORT_COLUMNS.VOUCHER_NUMBER] ?? '';

    if (original.trim() === '') {
      return { ...row, [IMPORT_COLUMNS.VOUCHER_NUMBER]: nextNumber() };
    }

    let voucherNumber = assigned.get(original);
    if (voucherNumber === undefined) {
      voucherNumber = nextNumber();
      assigned.set(original, voucherNumber);
    }

    return { ...row, [IMPORT_COLUMNS.VOUCHER_NUMBER]: voucherNumber };
  });
}

/**
 * Applies column renaming and voucher renumbering.
 */
export function prepareImportRows(rows: readonly SheetRow[], now: Date = new Date()): SheetRow[] {
  return generateVoucherNumbers(renameSubAccountColumns(rows), now);
}

export default prepareImportRows;
