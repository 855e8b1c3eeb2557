/**
 * Reconciliation API Routes
 *
 * These routes handle HTTP concerns only - the workflow lives in the
 * reconciliation service.
 *
 * Endpoints:
 * - POST /check - Upload the voucher file and journal exports, get suggestions
 * - POST /finalize - Apply reviewer selections and unify names per voucher
 */

import { Router, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { env } from '../config';
import { asyncHandler, sendSuccess, AppError } from '../utils';
import { validateRequest } from '../middlewares';
import { reconciliationService } from '../services';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

const MAX_JOURNAL_FILES = 20;

/**
 * File filter to only accept CSV files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain', 'application/vnd.ms-excel'];
  const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest(`Only CSV files are allowed (got ${file.originalname})`));
  }
};

/**
 * Files stay in memory; they are parsed once and discarded.
 */
const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: env.UPLOAD_MAX_BYTES,
    files: MAX_JOURNAL_FILES + 1,
  },
});

const uploadFields = upload.fields([
  { name: 'importFile', maxCount: 1 },
  { name: 'journalFiles', maxCount: MAX_JOURNAL_FILES },
]);

// ============================================
// Schemas
// ============================================

const finalizeSchema = z.object({
  rows: z.array(z.record(z.string(), z.string())),
  selections: z
    .array(
      z
        .object({
          partner: z.string().optional(),
          department: z.string().optional(),
        })
        .nullable()
    )
    .default([]),
});

type FinalizeBody = z.infer<typeof finalizeSchema>;

// ============================================
// Routes
// ============================================

/**
 * @route   POST /api/v1/reconciliation/check
 * @desc    Prepare the voucher file and check its partner/department names
 * @access  Public
 *
 * Request:
 * - Content-Type: multipart/form-data
 * - importFile: voucher CSV (UTF-8 or Shift_JIS)
 * - journalFiles: one or more journal export CSVs
 *
 * Response:
 * - 200 OK: { importFile, masterData, rows, checks, summary }
 * - 400 Bad Request: Missing files or not CSV
 * - 413 Payload Too Large: File over the upload limit
 * - 422 Unprocessable Entity: Malformed CSV or missing 伝票番号 column
 */
router.post(
  '/check',
  uploadFields,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const files = req.files;
    if (!files || Array.isArray(files)) {
      throw AppError.badRequest('Expected multipart fields importFile and journalFiles');
    }

    const importFile = files['importFile']?.[0];
    if (!importFile) {
      throw AppError.badRequest('No import file uploaded. Use field name "importFile"');
    }

    const journalFiles = files['journalFiles'] ?? [];
    if (journalFiles.length === 0) {
      throw AppError.badRequest('No journal files uploaded. Use field name "journalFiles"');
    }

    const result = reconciliationService.checkNames(importFile, journalFiles);

    sendSuccess(
      res,
      result,
      `Checked ${result.summary.totalRows} rows against ${result.masterData.partners} partners and ${result.masterData.departments} departments`
    );
  })
);

/**
 * @route   POST /api/v1/reconciliation/finalize
 * @desc    Apply reviewer selections and unify names per voucher
 * @access  Public
 *
 * Body: { rows: Record<string, string>[], selections?: ({ partner?, department? } | null)[] }
 *
 * Response:
 * - 200 OK: { rows }
 * - 400 Bad Request: Validation failed
 */
router.post(
  '/finalize',
  validateRequest({ body: finalizeSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body: FinalizeBody = req.body;
    const rows = reconciliationService.finalize(body.rows, body.selections);
    sendSuccess(res, { rows }, `Finalized ${rows.length} rows`);
  })
);

export default router;
