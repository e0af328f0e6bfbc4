import { Router } from 'express';
import { healthController } from '../controllers';

/**
 * Health Routes
 *
 * - GET /        - status, uptime, version
 * - GET /ready   - spreadsheet engine loaded and delivery keywords configured
 * - GET /live    - process is up
 */
const router = Router();

router.get('/', healthController.getHealth);
router.get('/ready', healthController.getReadiness);
router.get('/live', healthController.getLiveness);

export default router;
