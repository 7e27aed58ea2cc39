/**
 * Access Token Service Unit Tests
 *
 * @module tests/unit/services/access-token.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/db/index.js', () => ({
  queryMany: vi.fn(),
}));

import { queryMany } from '../../../src/db/index.js';
import { AccessTokenService } from '../../../src/services/access-token.service.js';
import { AccessTokenStatus } from '../../../src/types/auth.js';
import { WorkflowState } from '../../../src/types/feedback.js';
import { createFakeClient } from '../../helpers/fake-client.js';

describe('AccessTokenService', () => {
  let service: AccessTokenService;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    service = new AccessTokenService();
  });

  describe('issue', () => {
    it('should store a fresh pending token for the normalized email', async () => {
      const client = createFakeClient();

      const token = await service.issue(client, ' Erin@Partner.example ', 'req-1', 'cycle-1');

      expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(client.query.mock.calls[0]?.[1]).toEqual([
        'erin@partner.example',
        token,
        'req-1',
        'cycle-1',
        AccessTokenStatus.Pending,
      ]);
      expect(String(client.query.mock.calls[0]?.[0])).toContain('ON CONFLICT (request_id) DO UPDATE');
    });

    it('should issue a different token each time', async () => {
      const client = createFakeClient();

      const first = await service.issue(client, 'erin@partner.example', 'req-1', 'cycle-1');
      const second = await service.issue(client, 'erin@partner.example', 'req-1', 'cycle-1');

      expect(first).not.toBe(second);
    });
  });

  describe('updateStatus', () => {
    it('should pass the status and whether to deactivate', async () => {
      const client = createFakeClient();

      await service.updateStatus(client, 'req-1', AccessTokenStatus.Completed, true);

      expect(client.query.mock.calls[0]?.[1]).toEqual(['req-1', AccessTokenStatus.Completed, true]);
    });
  });

  describe('findActiveByEmail', () => {
    it('should map joined rows to active tokens', async () => {
      vi.mocked(queryMany).mockResolvedValue([
        {
          id: 'tok-1',
          email: 'erin@partner.example',
          token: 'test-token-value',
          request_id: 'req-1',
          cycle_id: 'cycle-1',
          status: 'PENDING',
          workflow_state: 'PENDING_REVIEWER_ACCEPTANCE',
          external_email: 'Erin@Partner.example',
          external_name: null,
          requester_first_name: 'Alice',
          requester_last_name: 'Smith',
        },
      ]);

      const tokens = await service.findActiveByEmail('ERIN@partner.example');

      expect(tokens).toEqual([
        {
          id: 'tok-1',
          email: 'erin@partner.example',
          token: 'test-token-value',
          requestId: 'req-1',
          cycleId: 'cycle-1',
          requestState: WorkflowState.PendingReviewerAcceptance,
          requestEmail: 'Erin@Partner.example',
          displayName: 'erin@partner.example',
          requesterName: 'Alice Smith',
        },
      ]);
      expect(vi.mocked(queryMany).mock.calls[0]?.[1]).toEqual(['erin@partner.example']);
    });
  });
});
