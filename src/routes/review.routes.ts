/**
 * Feedback Request Routes
 *
 * GET  /api/requests/questions             active question catalog
 * GET  /api/requests/approvals             nominations awaiting the caller as manager
 * GET  /api/requests/reviews               requests the caller was asked to answer
 * GET  /api/requests/received              caller's completed feedback, anonymized (?cycleId=)
 * GET  /api/requests/:requestId            one request
 * POST /api/requests/:requestId/decision   manager approves or rejects
 * POST /api/requests/:requestId/response   reviewer accepts or declines
 * GET  /api/requests/:requestId/form       questions and saved draft
 * GET  /api/requests/:requestId/draft      saved draft
 * PUT  /api/requests/:requestId/draft      save draft answers
 * POST /api/requests/:requestId/complete   submit feedback
 *
 * Role checks only require an authenticated employee; the workflow decides
 * whether the caller is the manager or reviewer of a request.
 *
 * @module routes/review
 */

import { Router } from 'express';

import { reviewController, type ReviewController } from '../controllers/review.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { ALL_ROLES, authorize } from '../middleware/authorize.js';
import { requireUuidParam } from '../utils/http.js';

export function createReviewRouter(controller: ReviewController = reviewController): Router {
  const router = Router();

  console.log('[REVIEW_ROUTES] Initializing feedback request routes');

  router.use(authenticate);
  router.use(authorize(ALL_ROLES));
  router.param('requestId', requireUuidParam);

  router.get('/questions', (req, res) => controller.listQuestions(req, res));
  router.get('/approvals', (req, res) => controller.pendingApprovals(req, res));
  router.get('/reviews', (req, res) => controller.pendingReviews(req, res));
  router.get('/received', (req, res) => controller.receivedFeedback(req, res));

  router.get('/:requestId', (req, res) => controller.getRequest(req, res));
  router.post('/:requestId/decision', (req, res) => controller.decide(req, res));
  router.post('/:requestId/response', (req, res) => controller.respond(req, res));
  router.get('/:requestId/form', (req, res) => controller.getForm(req, res));
  router.get('/:requestId/draft', (req, res) => controller.getDraft(req, res));
  router.put('/:requestId/draft', (req, res) => controller.saveDraft(req, res));
  router.post('/:requestId/complete', (req, res) => controller.complete(req, res));

  return router;
}
