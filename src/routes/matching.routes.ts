/**
 * Matching API Routes
 *
 * Stateless access to the matching engine.
 *
 * Endpoints:
 * - POST /normalize - Normalize a list of names
 * - POST /rank - Rank candidate names for one query
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess } from '../utils';
import { validateRequest } from '../middlewares';
import { matchingService } from '../services';

const router = Router();

// ============================================
// Schemas
// ============================================

const MAX_VALUES = 10000;

const normalizeSchema = z.object({
  values: z.array(z.string()).min(1).max(MAX_VALUES),
});

// Range checks beyond type are left to the matcher's own validation
const matcherConfigSchema = z
  .object({
    ngramWeight: z.number().optional(),
    prefixWeight: z.number().optional(),
    editWeight: z.number().optional(),
    topN: z.number().int().optional(),
    minScoreThreshold: z.number().min(0).max(1).optional(),
  })
  .strict();

const rankSchema = z.object({
  query: z.string(),
  candidates: z.array(z.string()).max(MAX_VALUES),
  config: matcherConfigSchema.optional(),
});

type NormalizeBody = z.infer<typeof normalizeSchema>;
type RankBody = z.infer<typeof rankSchema>;

// ============================================
// Routes
// ============================================

/**
 * @route   POST /api/v1/matching/normalize
 * @desc    Normalize names
 * @access  Public
 *
 * Body: { values: string[] }
 *
 * Response:
 * - 200 OK: { results: [{ value, normalized }] }
 * - 400 Bad Request: Validation failed
 */
router.post(
  '/normalize',
  validateRequest({ body: normalizeSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body: NormalizeBody = req.body;
    const results = matchingService.normalizeMany(body.values);
    sendSuccess(res, { results }, `Normalized ${results.length} values`);
  })
);

/**
 * @route   POST /api/v1/matching/rank
 * @desc    Rank candidates for a query
 * @access  Public
 *
 * Body: { query: string, candidates: string[], config?: Partial<MatcherConfig> }
 *
 * Response:
 * - 200 OK: NameMatchResult
 * - 400 Bad Request: Validation failed or invalid matcher configuration
 */
router.post(
  '/rank',
  validateRequest({ body: rankSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body: RankBody = req.body;
    const result = matchingService.rank(body.query, body.candidates, body.config);
    sendSuccess(res, result, result.explanation);
  })
);

export default router;
