/**
 * Review Cycle Routes
 *
 * GET  /api/cycles/active        active cycle with its current phase (any employee)
 * GET  /api/cycles               all cycles, newest first (HR admin)
 * POST /api/cycles               create and activate a cycle (HR admin)
 * POST /api/cycles/active/sweep  run the deadline sweep now (HR admin)
 *
 * @module routes/cycle
 */

import { Router } from 'express';

import { cycleController, type CycleController } from '../controllers/cycle.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { ALL_ROLES, authorize } from '../middleware/authorize.js';
import { UserRole } from '../types/index.js';

export function createCycleRouter(controller: CycleController = cycleController): Router {
  const router = Router();

  console.log('[CYCLE_ROUTES] Initializing review cycle routes');

  router.use(authenticate);

  router.get('/active', authorize(ALL_ROLES), (req, res) => controller.getActive(req, res));

  router.get('/', authorize([UserRole.HRAdmin]), (req, res) => controller.list(req, res));

  router.post('/', authorize([UserRole.HRAdmin]), (req, res) => controller.create(req, res));

  router.post('/active/sweep', authorize([UserRole.HRAdmin]), (req, res) => controller.sweep(req, res));

  return router;
}
