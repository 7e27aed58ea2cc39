/**
 * External Access Service Module
 *
 * Gateway for reviewers outside the organisation. An email address plus the
 * opaque token issued at approval is the only credential; once validated it
 * yields a context bound to exactly one feedback request, and every action is
 * handed to the workflow with that context as the actor.
 *
 * @module services/external-access
 */

import { type ExternalRequestContext } from '../types/auth.js';
import { WorkflowError, WorkflowErrorCode } from '../types/errors.js';
import {
  isTerminalState,
  normalizeEmail,
  type FeedbackRequest,
  type ReviewerActor,
} from '../types/feedback.js';
import { type ServiceOperationResult } from '../types/index.js';
import { type Answer, type FeedbackForm } from '../types/question.js';
import { constantTimeEqual, maskToken } from '../utils/token.js';

import { accessTokenService, type AccessTokenService } from './access-token.service.js';
import { feedbackRequestService, type FeedbackRequestService } from './feedback-request.service.js';
import { fail, succeed } from './result.js';

const TAG = 'EXTERNAL_ACCESS';

function actorFor(context: ExternalRequestContext): ReviewerActor {
  return { kind: 'external', email: context.email, requestId: context.requestId };
}

export class ExternalAccessService {
  constructor(
    private readonly tokens: AccessTokenService = accessTokenService,
    private readonly workflow: FeedbackRequestService = feedbackRequestService
  ) {}

  /**
   * Validate an email and token pair
   *
   * With `requestId` the token must also be bound to that request.
   */
  async validate(
    email: string,
    token: string,
    requestId?: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<ExternalRequestContext>> {
    const startTime = Date.now();
    const cid = correlationId ?? `external_validate_${Date.now()}`;
    const normalizedEmail = normalizeEmail(email);

    try {
      if (normalizedEmail.length === 0 || token.length === 0) {
        throw new WorkflowError(WorkflowErrorCode.InvalidToken, 'Email and access token are required');
      }

      const candidates = await this.tokens.findActiveByEmail(normalizedEmail);
      const match = candidates.find((candidate) => constantTimeEqual(candidate.token, token));

      if (
        !match ||
        (requestId !== undefined && match.requestId !== requestId) ||
        isTerminalState(match.requestState) ||
        match.requestEmail === null ||
        normalizeEmail(match.requestEmail) !== normalizedEmail
      ) {
        console.warn(`[${TAG}] Access token rejected:`, {
          email: normalizedEmail,
          token: maskToken(token),
          requestId,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });
        throw new WorkflowError(WorkflowErrorCode.InvalidToken, 'Invalid or expired access token');
      }

      return succeed(
        {
          tokenId: match.id,
          requestId: match.requestId,
          cycleId: match.cycleId,
          email: normalizedEmail,
          displayName: match.displayName,
          requesterName: match.requesterName,
          state: match.requestState,
        },
        startTime
      );
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Token validation', correlationId: cid });
    }
  }

  async accept(
    context: ExternalRequestContext,
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackRequest>> {
    return this.workflow.respondAsReviewer(context.requestId, actorFor(context), 'ACCEPT', undefined, correlationId);
  }

  async reject(
    context: ExternalRequestContext,
    reason: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackRequest>> {
    return this.workflow.respondAsReviewer(context.requestId, actorFor(context), 'REJECT', reason, correlationId);
  }

  async getQuestions(
    context: ExternalRequestContext,
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackForm>> {
    return this.workflow.getQuestionsForRequest(context.requestId, actorFor(context), correlationId);
  }

  async saveDraft(
    context: ExternalRequestContext,
    answers: readonly Answer[],
    correlationId?: string
  ): Promise<ServiceOperationResult<{ savedCount: number }>> {
    return this.workflow.saveDraft(context.requestId, actorFor(context), answers, correlationId);
  }

  async submitFeedback(
    context: ExternalRequestContext,
    answers: readonly Answer[],
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackRequest>> {
    return this.workflow.completeFeedback(context.requestId, actorFor(context), answers, correlationId);
  }
}

export const externalAccessService = new ExternalAccessService();
