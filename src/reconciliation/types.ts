/**
 * Type Definitions for the Reconciliation Workflow
 *
 * Rows come straight from CSV files: every cell is a string, keyed by its
 * header. Column names follow the Japanese accounting exports the tool
 * reads.
 */

import type { MatchStatus, RankedCandidate } from '../matching/types';

/**
 * One spreadsheet row, header → cell value.
 */
export type SheetRow = Record<string, string>;

/**
 * Columns of the accounting journal export used as the master source.
 */
export const JOURNAL_COLUMNS = {
  DEBIT_PARTNER: '借方取引先名',
  CREDIT_PARTNER: '貸方取引先名',
  DEBIT_DEPARTMENT: '借方部門',
  CREDIT_DEPARTMENT: '貸方部門',
} as const;

/**
 * Columns of the voucher file being prepared for import.
 */
export const IMPORT_COLUMNS = {
  VOUCHER_NUMBER: '伝票番号',
  DEBIT_SUB_ACCOUNT: '借方補助科目',
  CREDIT_SUB_ACCOUNT: '貸方補助科目',
  DEBIT_PARTNER: '借方取引先',
  CREDIT_PARTNER: '貸方取引先',
  DEBIT_DEPARTMENT: '借方部門',
  CREDIT_DEPARTMENT: '貸方部門',
} as const;

/**
 * Known legitimate names, extracted from the journal export.
 */
export interface MasterData {
  partners: string[];
  departments: string[];
}

/**
 * Result of checking one cell value against a master list.
 */
export interface FieldCheck {
  /** Value found in the row */
  source: string;
  status: MatchStatus;
  exactMatch: boolean;
  /** Suggested replacements, best first (empty when the value is already a master name) */
  candidates: RankedCandidate[];
}

/**
 * Partner and department checks of one row.
 * A check is null when the row has no value or the master list is empty.
 */
export interface RowReconciliation {
  /** 1-based data row number */
  rowNumber: number;
  partner: FieldCheck | null;
  department: FieldCheck | null;
}

/**
 * Counts per status for one field.
 */
export interface FieldSummary {
  checked: number;
  exactMatches: number;
  candidatesFound: number;
  noViableCandidate: number;
}

export interface ReconciliationSummary {
  totalRows: number;
  partner: FieldSummary;
  department: FieldSummary;
}

/**
 * Reviewer's choice for one row. Blank or missing keeps the current value.
 */
export interface ReviewSelection {
  partner?: string;
  department?: string;
}
