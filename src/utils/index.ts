export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export {
  detectEncoding,
  decodeCsvBuffer,
  parseCsvText,
  parseCsvBuffer,
  validateCsvHeaders,
} from './csv';
export type { CsvEncoding, ParsedCsv } from './csv';
