/**
 * Nomination Routes
 *
 * POST /api/nominations            nominate reviewers in the active cycle
 * GET  /api/nominations/me         caller's nomination status (?cycleId=)
 * GET  /api/nominations/reviewers  colleagues annotated for the reviewer picker
 *
 * @module routes/nomination
 */

import { Router } from 'express';

import { nominationController, type NominationController } from '../controllers/nomination.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { ALL_ROLES, authorize } from '../middleware/authorize.js';

export function createNominationRouter(controller: NominationController = nominationController): Router {
  const router = Router();

  console.log('[NOMINATION_ROUTES] Initializing nomination routes');

  router.use(authenticate);
  router.use(authorize(ALL_ROLES));

  router.post('/', (req, res) => controller.create(req, res));

  router.get('/me', (req, res) => controller.status(req, res));

  router.get('/reviewers', (req, res) => controller.selectableReviewers(req, res));

  return router;
}
