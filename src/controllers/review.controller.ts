/**
 * Review Controller Module
 *
 * HTTP handlers for employees acting on individual feedback requests: the
 * manager approval queue, the reviewer inbox, the feedback form with drafts,
 * completion, and the requester's anonymized results.
 *
 * Every handler acts as the authenticated employee; whether that employee may
 * act on a given request is decided by the workflow service.
 *
 * @module controllers/review
 */

import { type Response } from 'express';

import { feedbackRequestService, type FeedbackRequestService } from '../services/feedback-request.service.js';
import { questionService, type QuestionService } from '../services/question.service.js';
import { type AuthenticatedRequest, type JWTPayload } from '../types/auth.js';
import { type ReviewerActor } from '../types/feedback.js';
import {
  HTTP_STATUS,
  getCorrelationId,
  requireUser,
  routeParam,
  sendError,
  sendResult,
  sendUnexpectedError,
} from '../utils/http.js';
import { parseAnswers, parseManagerDecision, parseOptionalId, parseReviewerResponse } from '../utils/request-parsers.js';

const TAG = 'REVIEW_CONTROLLER';

function employeeActor(user: JWTPayload): ReviewerActor {
  return { kind: 'internal', userId: user.userId };
}

export class ReviewController {
  constructor(
    private readonly workflow: FeedbackRequestService = feedbackRequestService,
    private readonly questions: QuestionService = questionService
  ) {}

  /**
   * GET /api/requests/questions
   */
  async listQuestions(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    try {
      sendResult(res, await this.questions.listQuestions(correlationId));
    } catch (error) {
      sendUnexpectedError(res, TAG, 'List questions', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/requests/approvals
   *
   * Nominations waiting for the caller's decision as direct manager.
   */
  async pendingApprovals(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    try {
      sendResult(res, await this.workflow.getPendingApprovals(user.userId, correlationId));
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Pending approvals', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/requests/reviews
   *
   * Requests the caller has been asked to answer or is answering.
   */
  async pendingReviews(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    try {
      sendResult(res, await this.workflow.getPendingReviews(user.userId, correlationId));
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Pending reviews', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/requests/received?cycleId=
   */
  async receivedFeedback(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    const cycleId = parseOptionalId(req.query.cycleId, 'cycleId');
    if (!cycleId.ok) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', cycleId.error);
      return;
    }

    try {
      sendResult(res, await this.workflow.getReceivedFeedback(user.userId, cycleId.value, correlationId));
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Received feedback', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/requests/:requestId
   */
  async getRequest(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    try {
      const result = await this.workflow.getRequest(
        routeParam(req, 'requestId'),
        user.userId,
        user.role,
        correlationId
      );
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Get request', error, { correlationId, startTime });
    }
  }

  /**
   * POST /api/requests/:requestId/decision
   *
   * Request body: { decision: 'APPROVE' | 'REJECT', reason?: string }
   */
  async decide(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    const parsed = parseManagerDecision(req.body);
    if (!parsed.ok) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    const requestId = routeParam(req, 'requestId');

    console.log(`[${TAG}] Manager decision received:`, {
      correlationId,
      requestId,
      managerId: user.userId,
      decision: parsed.value.decision,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.workflow.decideAsManager(
        requestId,
        user.userId,
        parsed.value.decision,
        parsed.value.reason,
        correlationId
      );
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Manager decision', error, { correlationId, startTime });
    }
  }

  /**
   * POST /api/requests/:requestId/response
   *
   * Request body: { response: 'ACCEPT' | 'REJECT', reason?: string }
   */
  async respond(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    const parsed = parseReviewerResponse(req.body);
    if (!parsed.ok) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    const requestId = routeParam(req, 'requestId');

    console.log(`[${TAG}] Reviewer response received:`, {
      correlationId,
      requestId,
      reviewerId: user.userId,
      response: parsed.value.response,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.workflow.respondAsReviewer(
        requestId,
        employeeActor(user),
        parsed.value.response,
        parsed.value.reason,
        correlationId
      );
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Reviewer response', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/requests/:requestId/form
   */
  async getForm(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    try {
      const result = await this.workflow.getQuestionsForRequest(
        routeParam(req, 'requestId'),
        employeeActor(user),
        correlationId
      );
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Feedback form', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/requests/:requestId/draft
   */
  async getDraft(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    try {
      const result = await this.workflow.getDraft(routeParam(req, 'requestId'), employeeActor(user), correlationId);
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Get draft', error, { correlationId, startTime });
    }
  }

  /**
   * PUT /api/requests/:requestId/draft
   *
   * Request body: { answers: Array<{ questionId, rating?, text? }> }
   */
  async saveDraft(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    const parsed = parseAnswers(req.body);
    if (!parsed.ok) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    try {
      const result = await this.workflow.saveDraft(
        routeParam(req, 'requestId'),
        employeeActor(user),
        parsed.value,
        correlationId
      );
      sendResult(res, result, HTTP_STATUS.OK, 'Draft saved');
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Save draft', error, { correlationId, startTime });
    }
  }

  /**
   * POST /api/requests/:requestId/complete
   *
   * Request body: { answers: Array<{ questionId, rating?, text? }> }
   */
  async complete(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'review');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    const parsed = parseAnswers(req.body);
    if (!parsed.ok) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    const requestId = routeParam(req, 'requestId');

    console.log(`[${TAG}] Feedback submission received:`, {
      correlationId,
      requestId,
      reviewerId: user.userId,
      answerCount: parsed.value.length,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.workflow.completeFeedback(requestId, employeeActor(user), parsed.value, correlationId);
      sendResult(res, result, HTTP_STATUS.OK, 'Feedback submitted');
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Complete feedback', error, { correlationId, startTime });
    }
  }
}

export const reviewController = new ReviewController();
