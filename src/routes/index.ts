import { Router } from 'express';
import healthRoutes from './health.routes';
import matchingRoutes from './matching.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Matching routes (preview + workbook batch)
router.use('/matching', matchingRoutes);

export default router;
