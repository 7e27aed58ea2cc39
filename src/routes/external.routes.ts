/**
 * External Reviewer Routes
 *
 * Authenticated by the `x-external-email` and `x-external-token` headers and
 * rate-limited per client IP. Routes naming a request only accept a token
 * bound to that request.
 *
 * GET  /api/external/session                        token context
 * POST /api/external/requests/:requestId/accept     accept the request
 * POST /api/external/requests/:requestId/reject     decline with a reason
 * GET  /api/external/requests/:requestId/questions  questions and saved draft
 * PUT  /api/external/requests/:requestId/draft      save draft answers
 * POST /api/external/requests/:requestId/submit     submit feedback
 *
 * @module routes/external
 */

import { Router } from 'express';

import { externalController, type ExternalController } from '../controllers/external.controller.js';
import { authenticateExternal, createExternalRateLimiter } from '../middleware/external-access.js';
import { externalAccessService, type ExternalAccessService } from '../services/external-access.service.js';
import { requireUuidParam } from '../utils/http.js';

export function createExternalRouter(
  controller: ExternalController = externalController,
  gateway: ExternalAccessService = externalAccessService
): Router {
  const router = Router();
  const requireToken = authenticateExternal(gateway);

  console.log('[EXTERNAL_ROUTES] Initializing external reviewer routes');

  router.use(createExternalRateLimiter());
  router.param('requestId', requireUuidParam);

  router.get('/session', requireToken, (req, res) => controller.session(req, res));

  router.post('/requests/:requestId/accept', requireToken, (req, res) => controller.accept(req, res));
  router.post('/requests/:requestId/reject', requireToken, (req, res) => controller.reject(req, res));
  router.get('/requests/:requestId/questions', requireToken, (req, res) => controller.questions(req, res));
  router.put('/requests/:requestId/draft', requireToken, (req, res) => controller.saveDraft(req, res));
  router.post('/requests/:requestId/submit', requireToken, (req, res) => controller.submit(req, res));

  return router;
}
