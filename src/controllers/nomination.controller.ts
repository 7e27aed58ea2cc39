/**
 * Nomination Controller Module
 *
 * HTTP handlers for the requester side of the workflow: nominating reviewers,
 * reading nomination status and listing colleagues that can still be picked.
 *
 * @module controllers/nomination
 */

import { type Response } from 'express';

import { feedbackRequestService, type FeedbackRequestService } from '../services/feedback-request.service.js';
import { nominationService, type NominationService } from '../services/nomination.service.js';
import { type AuthenticatedRequest } from '../types/auth.js';
import {
  HTTP_STATUS,
  getCorrelationId,
  requireUser,
  sendError,
  sendResult,
  sendUnexpectedError,
} from '../utils/http.js';
import { parseOptionalId, parseReviewers } from '../utils/request-parsers.js';

const TAG = 'NOMINATION_CONTROLLER';

export class NominationController {
  constructor(
    private readonly workflow: FeedbackRequestService = feedbackRequestService,
    private readonly nominations: NominationService = nominationService
  ) {}

  /**
   * POST /api/nominations
   *
   * Request body:
   * {
   *   reviewers: Array<{ userId: string } | { email: string, name: string }>
   * }
   *
   * Response: 201 Created with the created requests
   */
  async create(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'nomination');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    const parsed = parseReviewers(req.body);
    if (!parsed.ok) {
      console.warn(`[${TAG}] Create nominations failed - invalid request body:`, {
        correlationId,
        userId: user.userId,
        error: parsed.error,
        timestamp: new Date().toISOString(),
      });
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    console.log(`[${TAG}] Create nominations request received:`, {
      correlationId,
      userId: user.userId,
      reviewerCount: parsed.value.length,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.workflow.createNominations(user.userId, parsed.value, correlationId);
      sendResult(res, result, HTTP_STATUS.CREATED, 'Nominations submitted for manager approval');
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Create nominations', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/nominations/me?cycleId=
   */
  async status(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'nomination');

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
      const result = await this.nominations.status(user.userId, cycleId.value, correlationId);
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Nomination status', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/nominations/reviewers
   */
  async selectableReviewers(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'nomination');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    try {
      const result = await this.nominations.listSelectableReviewers(user.userId, correlationId);
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Selectable reviewers', error, { correlationId, startTime });
    }
  }
}

export const nominationController = new NominationController();
