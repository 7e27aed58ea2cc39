/**
 * External Access Service Unit Tests
 *
 * @module tests/unit/services/external-access.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/db/index.js', () => ({
  executeTransaction: vi.fn(),
  queryMany: vi.fn(),
}));

import { AccessTokenService, type ActiveToken } from '../../../src/services/access-token.service.js';
import { CycleService } from '../../../src/services/cycle.service.js';
import { ExternalAccessService } from '../../../src/services/external-access.service.js';
import { FeedbackRequestService } from '../../../src/services/feedback-request.service.js';
import { WorkflowErrorCode } from '../../../src/types/errors.js';
import { WorkflowState } from '../../../src/types/feedback.js';

const TOKEN = 'test-token-value-0001';

function activeToken(overrides: Partial<ActiveToken> = {}): ActiveToken {
  return {
    id: 'tok-1',
    email: 'erin@partner.example',
    token: TOKEN,
    requestId: 'req-1',
    cycleId: 'cycle-1',
    requestState: WorkflowState.PendingReviewerAcceptance,
    requestEmail: 'erin@partner.example',
    displayName: 'Erin Ext',
    requesterName: 'Alice Smith',
    ...overrides,
  };
}

describe('ExternalAccessService', () => {
  let tokens: AccessTokenService;
  let workflow: FeedbackRequestService;
  let service: ExternalAccessService;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    tokens = new AccessTokenService();
    workflow = new FeedbackRequestService({ cycles: new CycleService(), dispatcher: { dispatch: vi.fn() } });
    service = new ExternalAccessService(tokens, workflow);

    vi.spyOn(tokens, 'findActiveByEmail').mockResolvedValue([activeToken()]);
  });

  describe('validate', () => {
    it('should return the context bound to the token', async () => {
      const result = await service.validate(' Erin@Partner.example', TOKEN);

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        tokenId: 'tok-1',
        requestId: 'req-1',
        cycleId: 'cycle-1',
        email: 'erin@partner.example',
        displayName: 'Erin Ext',
        requesterName: 'Alice Smith',
        state: WorkflowState.PendingReviewerAcceptance,
      });
      expect(tokens.findActiveByEmail).toHaveBeenCalledWith('erin@partner.example');
    });

    it('should require both credentials', async () => {
      const result = await service.validate('  ', TOKEN);

      expect(result.errorCode).toBe(WorkflowErrorCode.InvalidToken);
      expect(result.error).toBe('Email and access token are required');
      expect(tokens.findActiveByEmail).not.toHaveBeenCalled();
    });

    it('should reject a token that does not match', async () => {
      const result = await service.validate('erin@partner.example', 'test-token-value-0002');

      expect(result.errorCode).toBe(WorkflowErrorCode.InvalidToken);
      expect(result.error).toBe('Invalid or expired access token');
    });

    it('should reject a token bound to another request', async () => {
      const result = await service.validate('erin@partner.example', TOKEN, 'req-2');

      expect(result.errorCode).toBe(WorkflowErrorCode.InvalidToken);
    });

    it('should reject a token whose request is finished', async () => {
      vi.mocked(tokens.findActiveByEmail).mockResolvedValue([activeToken({ requestState: WorkflowState.Completed })]);

      const result = await service.validate('erin@partner.example', TOKEN);

      expect(result.error).toBe('Invalid or expired access token');
    });

    it('should reject a token whose request names another reviewer', async () => {
      vi.mocked(tokens.findActiveByEmail).mockResolvedValue([
        activeToken({ requestEmail: 'someone@partner.example' }),
      ]);

      const result = await service.validate('erin@partner.example', TOKEN);

      expect(result.error).toBe('Invalid or expired access token');
    });
  });

  describe('actions', () => {
    const context = {
      tokenId: 'tok-1',
      requestId: 'req-1',
      cycleId: 'cycle-1',
      email: 'erin@partner.example',
      displayName: 'Erin Ext',
      requesterName: 'Alice Smith',
      state: WorkflowState.PendingReviewerAcceptance,
    };
    const actor = { kind: 'external', email: 'erin@partner.example', requestId: 'req-1' };

    it('should act on the bound request as the external reviewer', async () => {
      const respond = vi.spyOn(workflow, 'respondAsReviewer').mockResolvedValue({ success: true, executionTimeMs: 0 });
      const complete = vi.spyOn(workflow, 'completeFeedback').mockResolvedValue({ success: true, executionTimeMs: 0 });

      await service.accept(context, 'cid-1');
      await service.reject(context, 'No time this quarter', 'cid-2');
      await service.submitFeedback(context, [{ questionId: 'q1', rating: 5 }], 'cid-3');

      expect(respond.mock.calls).toEqual([
        ['req-1', actor, 'ACCEPT', undefined, 'cid-1'],
        ['req-1', actor, 'REJECT', 'No time this quarter', 'cid-2'],
      ]);
      expect(complete).toHaveBeenCalledWith('req-1', actor, [{ questionId: 'q1', rating: 5 }], 'cid-3');
    });
  });
});
