/**
 * Workflow state machine and relationship rules
 *
 * @module tests/unit/types/feedback
 */

import { describe, it, expect } from 'vitest';

import { WorkflowError, WorkflowErrorCode, statusForErrorCode } from '../../../src/types/errors.js';
import {
  RelationshipCategory,
  WorkflowState,
  assertTransition,
  canTransition,
  deriveRelationship,
  getRelationshipLabel,
  getStateLabel,
  isTerminalState,
  reviewerKey,
} from '../../../src/types/feedback.js';
import { getDesignationLevel } from '../../../src/types/index.js';
import { makeEntry } from '../../helpers/fixtures.js';

describe('workflow transitions', () => {
  it('should allow the forward path to completion', () => {
    expect(canTransition(WorkflowState.PendingManagerApproval, WorkflowState.PendingReviewerAcceptance)).toBe(true);
    expect(canTransition(WorkflowState.PendingReviewerAcceptance, WorkflowState.InProgress)).toBe(true);
    expect(canTransition(WorkflowState.InProgress, WorkflowState.Completed)).toBe(true);
  });

  it('should only expire requests that are still pending', () => {
    expect(canTransition(WorkflowState.PendingManagerApproval, WorkflowState.Expired)).toBe(true);
    expect(canTransition(WorkflowState.PendingReviewerAcceptance, WorkflowState.Expired)).toBe(true);
    expect(canTransition(WorkflowState.InProgress, WorkflowState.Expired)).toBe(false);
  });

  it('should not skip states', () => {
    expect(canTransition(WorkflowState.PendingManagerApproval, WorkflowState.InProgress)).toBe(false);
    expect(canTransition(WorkflowState.PendingReviewerAcceptance, WorkflowState.Completed)).toBe(false);
  });

  it('should treat rejections, completion and expiry as terminal', () => {
    const terminal = Object.values(WorkflowState).filter(isTerminalState);

    expect(terminal).toEqual([
      WorkflowState.ManagerRejected,
      WorkflowState.ReviewerRejected,
      WorkflowState.Completed,
      WorkflowState.Expired,
    ]);
  });

  it('should explain an illegal transition', () => {
    try {
      assertTransition(WorkflowState.Completed, WorkflowState.InProgress, 'req-1');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(WorkflowError);
      expect(error).toMatchObject({
        code: WorkflowErrorCode.InvalidTransition,
        statusCode: 409,
        message: 'Cannot move request from COMPLETED to IN_PROGRESS. Allowed transitions: none',
        details: { requestId: 'req-1', from: 'COMPLETED', to: 'IN_PROGRESS' },
      });
    }
  });
});

describe('labels', () => {
  it('should give readable state and relationship names', () => {
    expect(getStateLabel(WorkflowState.PendingReviewerAcceptance)).toBe('Awaiting Reviewer Response');
    expect(getRelationshipLabel(RelationshipCategory.DirectReportee)).toBe('Direct Reportee');
  });
});

describe('reviewerKey', () => {
  it('should key internal reviewers by id and external ones by email', () => {
    expect(reviewerKey({ kind: 'internal', userId: 'bob' })).toBe('user:bob');
    expect(reviewerKey({ kind: 'external', email: ' ERIN@partner.example ', displayName: 'Erin' })).toBe(
      'email:erin@partner.example'
    );
  });
});

describe('deriveRelationship', () => {
  const requester = makeEntry({
    id: 'alice',
    vertical: 'Engineering',
    managerId: 'mgr',
    managerEmail: 'Mgr@Example.com',
  });

  it('should classify a direct reportee', () => {
    const reviewer = makeEntry({ id: 'dave', vertical: 'Sales', managerId: 'alice' });

    expect(deriveRelationship(requester, { kind: 'internal', entry: reviewer })).toBe(
      RelationshipCategory.DirectReportee
    );
  });

  it('should classify a peer by vertical, ignoring case and spacing', () => {
    const reviewer = makeEntry({ id: 'bob', vertical: ' engineering ' });

    expect(deriveRelationship(requester, { kind: 'internal', entry: reviewer })).toBe(RelationshipCategory.Peer);
  });

  it('should classify anyone else inside the organisation as a collaborator', () => {
    const reviewer = makeEntry({ id: 'carol', vertical: 'Sales' });

    expect(deriveRelationship(requester, { kind: 'internal', entry: reviewer })).toBe(
      RelationshipCategory.InternalCollaborator
    );
    expect(
      deriveRelationship(makeEntry({ id: 'zed', vertical: null }), {
        kind: 'internal',
        entry: makeEntry({ id: 'yan', vertical: null }),
      })
    ).toBe(RelationshipCategory.InternalCollaborator);
  });

  it('should classify an external reviewer as a stakeholder', () => {
    expect(
      deriveRelationship(requester, { kind: 'external', email: 'erin@partner.example', displayName: 'Erin' })
    ).toBe(RelationshipCategory.ExternalStakeholder);
  });

  it('should refuse the direct manager, internally or by email', () => {
    const manager = makeEntry({ id: 'mgr' });

    expect(() => deriveRelationship(requester, { kind: 'internal', entry: manager })).toThrow(
      'Your direct manager cannot be nominated as a reviewer'
    );
    expect(() =>
      deriveRelationship(requester, { kind: 'external', email: 'mgr@example.com ', displayName: 'Morgan' })
    ).toThrow('Your manager cannot be nominated as an external stakeholder');
  });
});

describe('getDesignationLevel', () => {
  it('should match the most senior keyword first', () => {
    expect(getDesignationLevel('Co-Founder')).toBe(5);
    expect(getDesignationLevel('Associate Director, Sales')).toBe(4);
    expect(getDesignationLevel('Director')).toBe(3);
    expect(getDesignationLevel('Senior Engineering Manager')).toBe(2);
    expect(getDesignationLevel('Tech Lead')).toBe(1);
  });

  it('should give zero to everyone else', () => {
    expect(getDesignationLevel('Engineer')).toBe(0);
    expect(getDesignationLevel('')).toBe(0);
    expect(getDesignationLevel(null)).toBe(0);
  });
});

describe('statusForErrorCode', () => {
  it('should map workflow codes and fall back to 500', () => {
    expect(statusForErrorCode(WorkflowErrorCode.QuotaExceeded)).toBe(409);
    expect(statusForErrorCode(WorkflowErrorCode.InvalidToken)).toBe(401);
    expect(statusForErrorCode('SOMETHING_ELSE')).toBe(500);
    expect(statusForErrorCode(undefined)).toBe(500);
  });
});
