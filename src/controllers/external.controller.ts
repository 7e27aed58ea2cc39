/**
 * External Reviewer Controller Module
 *
 * HTTP handlers for reviewers outside the organisation. Each handler runs
 * after `authenticateExternal`, which leaves the validated token context on
 * the request.
 *
 * @module controllers/external
 */

import { type Response } from 'express';

import { externalAccessService, type ExternalAccessService } from '../services/external-access.service.js';
import { type ExternalAuthenticatedRequest, type ExternalRequestContext } from '../types/auth.js';
import { getStateLabel } from '../types/feedback.js';
import { HTTP_STATUS, getCorrelationId, sendError, sendResult, sendUnexpectedError } from '../utils/http.js';
import { optionalString, parseAnswers } from '../utils/request-parsers.js';

const TAG = 'EXTERNAL_CONTROLLER';

function requireContext(req: ExternalAuthenticatedRequest, res: Response): ExternalRequestContext | null {
  if (req.external) {
    return req.external;
  }
  sendError(res, HTTP_STATUS.UNAUTHORIZED, 'INVALID_TOKEN', 'Invalid or expired access token');
  return null;
}

export class ExternalController {
  constructor(private readonly gateway: ExternalAccessService = externalAccessService) {}

  /**
   * GET /api/external/session
   *
   * Describes the request the token is bound to.
   */
  session(req: ExternalAuthenticatedRequest, res: Response): void {
    const context = requireContext(req, res);
    if (!context) {
      return;
    }

    res.status(HTTP_STATUS.OK).json({
      success: true,
      data: {
        requestId: context.requestId,
        cycleId: context.cycleId,
        email: context.email,
        displayName: context.displayName,
        requesterName: context.requesterName,
        state: context.state,
        stateLabel: getStateLabel(context.state),
      },
    });
  }

  /**
   * POST /api/external/requests/:requestId/accept
   */
  async accept(req: ExternalAuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = req.correlationId ?? getCorrelationId(req, 'external');

    const context = requireContext(req, res);
    if (!context) {
      return;
    }

    console.log(`[${TAG}] External accept received:`, {
      correlationId,
      requestId: context.requestId,
      timestamp: new Date().toISOString(),
    });

    try {
      sendResult(res, await this.gateway.accept(context, correlationId));
    } catch (error) {
      sendUnexpectedError(res, TAG, 'External accept', error, { correlationId, startTime });
    }
  }

  /**
   * POST /api/external/requests/:requestId/reject
   *
   * Request body: { reason: string }
   */
  async reject(req: ExternalAuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = req.correlationId ?? getCorrelationId(req, 'external');

    const context = requireContext(req, res);
    if (!context) {
      return;
    }

    console.log(`[${TAG}] External decline received:`, {
      correlationId,
      requestId: context.requestId,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.gateway.reject(context, optionalString(req.body, 'reason') ?? '', correlationId);
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'External decline', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/external/requests/:requestId/questions
   */
  async questions(req: ExternalAuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = req.correlationId ?? getCorrelationId(req, 'external');

    const context = requireContext(req, res);
    if (!context) {
      return;
    }

    try {
      sendResult(res, await this.gateway.getQuestions(context, correlationId));
    } catch (error) {
      sendUnexpectedError(res, TAG, 'External questions', error, { correlationId, startTime });
    }
  }

  /**
   * PUT /api/external/requests/:requestId/draft
   */
  async saveDraft(req: ExternalAuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = req.correlationId ?? getCorrelationId(req, 'external');

    const context = requireContext(req, res);
    if (!context) {
      return;
    }

    const parsed = parseAnswers(req.body);
    if (!parsed.ok) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    try {
      sendResult(res, await this.gateway.saveDraft(context, parsed.value, correlationId), HTTP_STATUS.OK, 'Draft saved');
    } catch (error) {
      sendUnexpectedError(res, TAG, 'External draft', error, { correlationId, startTime });
    }
  }

  /**
   * POST /api/external/requests/:requestId/submit
   */
  async submit(req: ExternalAuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = req.correlationId ?? getCorrelationId(req, 'external');

    const context = requireContext(req, res);
    if (!context) {
      return;
    }

    const parsed = parseAnswers(req.body);
    if (!parsed.ok) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    console.log(`[${TAG}] External submission received:`, {
      correlationId,
      requestId: context.requestId,
      answerCount: parsed.value.length,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.gateway.submitFeedback(context, parsed.value, correlationId);
      sendResult(res, result, HTTP_STATUS.OK, 'Thank you, your feedback has been submitted');
    } catch (error) {
      sendUnexpectedError(res, TAG, 'External submission', error, { correlationId, startTime });
    }
  }
}

export const externalController = new ExternalController();
