/**
 * CSV Utilities
 *
 * Accounting exports arrive either as UTF-8 (with or without BOM) or as
 * Shift_JIS. Files are small enough to parse in memory once uploaded.
 */

import { parse } from 'csv-parse/sync';
import { AppError } from './AppError';

export type CsvEncoding = 'utf-8' | 'shift_jis';

export interface ParsedCsv {
  encoding: CsvEncoding;
  headers: string[];
  rows: Record<string, string>[];
}

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

const hasUtf8Bom = (buffer: Uint8Array): boolean =>
  UTF8_BOM.every((byte, index) => buffer[index] === byte);

/**
 * Detects the encoding of a CSV file. Anything that is not valid UTF-8 is
 * read as Shift_JIS.
 */
export function detectEncoding(buffer: Uint8Array): CsvEncoding {
  if (hasUtf8Bom(buffer)) {
    return 'utf-8';
  }

  try {
    new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    return 'utf-8';
  } catch {
    return 'shift_jis';
  }
}

/**
 * Decodes a CSV buffer to text, dropping a UTF-8 BOM.
 */
export function decodeCsvBuffer(buffer: Uint8Array): { text: string; encoding: CsvEncoding } {
  const encoding = detectEncoding(buffer);
  return { text: new TextDecoder(encoding).decode(buffer), encoding };
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (record: unknown) =>
        Array.isArray(record) && record.every((cell: unknown) => typeof cell === 'string')
    )
  );
}

/**
 * Parses CSV text. The first record is the header row; short records are
 * padded with empty cells and extra cells are dropped.
 *
 * @throws AppError (422) if the text is not valid CSV
 */
export function parseCsvText(text: string): { headers: string[]; rows: Record<string, string>[] } {
  let records: unknown;
  try {
    records = parse(text, {
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw AppError.unprocessable(`Invalid CSV: ${reason}`);
  }

  if (!isStringMatrix(records)) {
    throw AppError.unprocessable('Invalid CSV: unexpected record shape');
  }

  const [headers = [], ...body] = records;
  const rows = body.map((record) => {
    const row: Record<string, string> = {};
    headers.forEach((header, index) => {
      row[header] = record[index] ?? '';
    });
    return row;
  });

  return { headers, rows };
}

/**
 * Decodes and parses an uploaded CSV file.
 */
export function parseCsvBuffer(buffer: Uint8Array): ParsedCsv {
  const { text, encoding } = decodeCsvBuffer(buffer);
  return { encoding, ...parseCsvText(text) };
}

/**
 * Validates that all required columns are present in the CSV headers
 */
export function validateCsvHeaders(
  headers: readonly string[],
  required: readonly string[]
): { valid: boolean; missing: string[] } {
  const present = new Set(headers.map((header) => header.trim()));
  const missing = required.filter((column) => !present.has(column));

  return {
    valid: missing.length === 0,
    missing,
  };
}
