import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /api/v1/health
 * @desc    Process health, Redis state and sweep mode
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /api/v1/health/ready
 * @desc    Readiness; Redis is informational only
 * @access  Public
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /api/v1/health/live
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;
