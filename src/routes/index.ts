import { Router } from 'express';
import healthRoutes from './health.routes';
import matchingRoutes from './matching.routes';
import reconciliationRoutes from './reconciliation.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Name normalization and ranking
router.use('/matching', matchingRoutes);

// Import check and finalization (CSV upload)
router.use('/reconciliation', reconciliationRoutes);

export default router;
