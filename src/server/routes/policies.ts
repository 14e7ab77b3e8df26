import { Router } from 'express';
import { POLICIES } from '../../scheduler/index.js';

const router = Router();

/**
 * GET /api/policies — Supported policy names in display order.
 */
router.get('/', (_req, res) => {
  res.json({ policies: POLICIES });
});

export default router;
