/**
 * Name Reconciliation
 *
 * Checks the partner and department of every import row against the master
 * lists. The credit side is the value the import uses, so it is checked
 * first; the debit side is the fallback when the credit cell is blank.
 */

import { buildCandidateSet } from '../matching/rankCandidates';
import { matchNameAgainstSet } from '../matching/matchName';
import { resolveMatcherConfig } from '../matching/matcherConfig';
import type { CandidateEntry, MatcherConfig } from '../matching/types';
import { IMPORT_COLUMNS } from './types';
import type {
  FieldCheck,
  FieldSummary,
  MasterData,
  ReconciliationSummary,
  RowReconciliation,
  SheetRow,
} from './types';

interface MasterIndex {
  names: ReadonlySet<string>;
  candidates: readonly CandidateEntry[];
}

function buildMasterIndex(names: readonly string[]): MasterIndex | null {
  if (names.length === 0) {
    return null;
  }
  return { names: new Set(names), candidates: buildCandidateSet(names) };
}

/**
 * Returns the first non-blank value among the given columns, or null.
 */
export function pickSourceValue(row: SheetRow, columns: readonly string[]): string | null {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value.trim() !== '') {
      return value;
    }
  }
  return null;
}

function checkField(
  source: string | null,
  master: MasterIndex | null,
  config: MatcherConfig
): FieldCheck | null {
  if (source === null || master === null) {
    return null;
  }

  // Already a master name: nothing to suggest
  if (master.names.has(source)) {
    return { source, status: 'EXACT_MATCH', exactMatch: true, candidates: [] };
  }

  const result = matchNameAgainstSet(source, master.candidates, config);
  return {
    source,
    status: result.status,
    exactMatch: result.exactMatch,
    candidates: result.candidates,
  };
}

/**
 * Checks every row's partner and department against the master data.
 *
 * @param rows - Prepared import rows
 * @param masterData - Names extracted from the journal export
 * @param overrides - Matcher configuration
 * @throws ConfigurationError if the configuration is invalid, even with no rows
 */
export function reconcileRows(
  rows: readonly SheetRow[],
  masterData: MasterData,
  overrides: Partial<MatcherConfig> = {}
): RowReconciliation[] {
  const config = resolveMatcherConfig(overrides);
  const partners = buildMasterIndex(masterData.partners);
  const departments = buildMasterIndex(masterData.departments);

  return rows.map((row, index) => ({
    rowNumber: index + 1,
    partner: checkField(
      pickSourceValue(row, [IMPORT_COLUMNS.CREDIT_PARTNER, IMPORT_COLUMNS.DEBIT_PARTNER]),
      partners,
      config
    ),
    department: checkField(
      pickSourceValue(row, [IMPORT_COLUMNS.CREDIT_DEPARTMENT, IMPORT_COLUMNS.DEBIT_DEPARTMENT]),
      departments,
      config
    ),
  }));
}

function summarizeField(checks: readonly (FieldCheck | null)[]): FieldSummary {
  const summary: FieldSummary = {
    checked: 0,
    exactMatches: 0,
    candidatesFound: 0,
    noViableCandidate: 0,
  };

  for (const check of checks) {
    if (check === null) continue;
    summary.checked += 1;
    if (check.status === 'EXACT_MATCH') summary.exactMatches += 1;
    else if (check.status === 'CANDIDATES_FOUND') summary.candidatesFound += 1;
    else summary.noViableCandidate += 1;
  }

  return summary;
}

/**
 * Counts the checked values per status.
 */
export function summarizeReconciliation(results: readonly RowReconciliation[]): ReconciliationSummary {
  return {
    totalRows: results.length,
    partner: summarizeField(results.map((result) => result.partner)),
    department: summarizeField(results.map((result) => result.department)),
  };
}

export default reconcileRows;
