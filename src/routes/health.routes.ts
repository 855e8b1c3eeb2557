import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /api/v1/health
 * @desc    Uptime, environment and version
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /api/v1/health/ready
 * @desc    Readiness check (matcher self-check)
 * @access  Public
 *
 * Response:
 * - 200 OK: { ready, checks: { server, matcher } }
 * - 503 Service Unavailable: a check failed
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /api/v1/health/live
 * @desc    Liveness check
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;

