/**
 * Import Finalization
 *
 * Applies the reviewer's choices and makes every line of a voucher carry
 * the same partner and department, which the accounting import requires.
 */

import { IMPORT_COLUMNS } from './types';
import type { ReviewSelection, SheetRow } from './types';

const {
  VOUCHER_NUMBER,
  DEBIT_PARTNER,
  CREDIT_PARTNER,
  DEBIT_DEPARTMENT,
  CREDIT_DEPARTMENT,
} = IMPORT_COLUMNS;

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

/**
 * Groups row indexes by voucher number. Rows with a blank number form a
 * group of their own.
 */
function groupByVoucher(rows: readonly SheetRow[]): number[][] {
  const groups = new Map<string, number[]>();
  const result: number[][] = [];

  rows.forEach((row, index) => {
    const voucher = row[VOUCHER_NUMBER];
    if (!isPresent(voucher)) {
      result.push([index]);
      return;
    }
    let group = groups.get(voucher);
    if (group === undefined) {
      group = [];
      groups.set(voucher, group);
      result.push(group);
    }
    group.push(index);
  });

  return result;
}

/**
 * Sets both columns of every row in each voucher to the first non-blank
 * value found, scanning rows in order and columns in the given priority.
 * Groups without any value are left as they are.
 */
function unifyPerVoucher(
  rows: SheetRow[],
  groups: readonly number[][],
  columns: readonly [string, string]
): void {
  for (const group of groups) {
    let chosen: string | undefined;

    for (const index of group) {
      const row = rows[index];
      if (row === undefined) continue;
      chosen = columns.map((column) => row[column]).find(isPresent);
      if (chosen !== undefined) break;
    }

    if (chosen === undefined) continue;

    for (const index of group) {
      const row = rows[index];
      if (row === undefined) continue;
      row[columns[0]] = chosen;
      row[columns[1]] = chosen;
    }
  }
}

/**
 * Produces the final import rows.
 *
 * 1. A chosen partner replaces 貸方取引先.
 * 2. A blank 借方取引先 is filled from 貸方取引先.
 * 3. Partners are unified per 伝票番号 (credit before debit).
 * 4. A chosen department replaces 借方部門 and 貸方部門.
 * 5. Departments are unified per 伝票番号 (debit before credit).
 *
 * The input rows are not modified.
 *
 * @param rows - Prepared import rows
 * @param selections - Reviewer choices by row index; missing entries keep the row as is
 */
export function finalizeImportRows(
  rows: readonly SheetRow[],
  selections: readonly (ReviewSelection | null | undefined)[] = []
): SheetRow[] {
  const result = rows.map((row) => ({ ...row }));

  result.forEach((row, index) => {
    const chosen = selections[index]?.partner;
    if (isPresent(chosen)) {
      row[CREDIT_PARTNER] = chosen;
    }
  });

  for (const row of result) {
    const credit = row[CREDIT_PARTNER];
    if (credit !== undefined && !isPresent(row[DEBIT_PARTNER])) {
      row[DEBIT_PARTNER] = credit;
    }
  }

  const groups = groupByVoucher(result);
  unifyPerVoucher(result, groups, [CREDIT_PARTNER, DEBIT_PARTNER]);

  result.forEach((row, index) => {
    const chosen = selections[index]?.department;
    if (isPresent(chosen)) {
      row[DEBIT_DEPARTMENT] = chosen;
      row[CREDIT_DEPARTMENT] = chosen;
    }
  });

  unifyPerVoucher(result, groups, [DEBIT_DEPARTMENT, CREDIT_DEPARTMENT]);

  return result;
}

export default finalizeImportRows;
