/**
 * Routes Module
 * Aggregates all route handlers
 */

import { Router } from 'express';
import filesRouter from './files.js';

const router = Router();

// Health check
router.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});

router.use('/files', filesRouter);

export default router;
