/**
 * Cycle Service Unit Tests
 *
 * @module tests/unit/services/cycle.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/db/index.js', () => ({
  executeTransaction: vi.fn(),
  queryMany: vi.fn(),
}));

import { executeTransaction, queryMany } from '../../../src/db/index.js';
import {
  CycleService,
  currentPhase,
  isNominationOpen,
  validateCycleRequest,
} from '../../../src/services/cycle.service.js';
import { CyclePhase } from '../../../src/types/cycle.js';
import { WorkflowErrorCode } from '../../../src/types/errors.js';
import { createFakeClient } from '../../helpers/fake-client.js';
import { CREATED_AT, makeCycle, makeCycleRecord } from '../../helpers/fixtures.js';

describe('cycle phases', () => {
  const cycle = makeCycle();

  it('should stay in nomination through the nomination deadline day', () => {
    expect(currentPhase(cycle, '2026-03-15')).toBe(CyclePhase.Nomination);
    expect(currentPhase(cycle, '2026-03-16')).toBe(CyclePhase.Feedback);
  });

  it('should complete the day after the feedback deadline', () => {
    expect(currentPhase(cycle, '2026-03-31')).toBe(CyclePhase.Feedback);
    expect(currentPhase(cycle, '2026-04-01')).toBe(CyclePhase.Complete);
  });

  it('should accept nominations only inside the nomination window', () => {
    expect(isNominationOpen(cycle, '2026-02-28')).toBe(false);
    expect(isNominationOpen(cycle, '2026-03-01')).toBe(true);
    expect(isNominationOpen(cycle, '2026-03-15')).toBe(true);
    expect(isNominationOpen(cycle, '2026-03-16')).toBe(false);
  });
});

describe('validateCycleRequest', () => {
  const valid = {
    name: 'H2 2026',
    nominationStartDate: '2026-09-01',
    nominationDeadline: '2026-09-15',
    feedbackDeadline: '2026-09-30',
  };

  it('should accept ordered calendar dates', () => {
    expect(validateCycleRequest(valid)).toEqual([]);
  });

  it('should report malformed dates and a blank name', () => {
    expect(validateCycleRequest({ ...valid, name: ' ', feedbackDeadline: '2026-02-30' })).toEqual([
      'Cycle name is required',
      'feedbackDeadline must be a date in YYYY-MM-DD format',
    ]);
  });

  it('should report deadlines out of order', () => {
    expect(validateCycleRequest({ ...valid, nominationDeadline: '2026-10-01' })).toEqual([
      'Nomination deadline must not be after the feedback deadline',
    ]);
    expect(validateCycleRequest({ ...valid, nominationStartDate: '2026-09-20' })).toEqual([
      'Nomination start date must not be after the nomination deadline',
    ]);
  });

  it('should allow all three dates on the same day', () => {
    expect(
      validateCycleRequest({
        name: 'Pilot',
        nominationStartDate: '2026-09-01',
        nominationDeadline: '2026-09-01',
        feedbackDeadline: '2026-09-01',
      })
    ).toEqual([]);
  });
});

describe('CycleService', () => {
  let service: CycleService;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    service = new CycleService();
  });

  describe('getActiveCycleWithPhase', () => {
    it('should return the active cycle and its phase', async () => {
      vi.mocked(queryMany).mockResolvedValue([makeCycleRecord()]);

      const result = await service.getActiveCycleWithPhase('2026-03-20');

      expect(result.data).toEqual({ cycle: makeCycle(), phase: CyclePhase.Feedback });
    });

    it('should report NO_ACTIVE_CYCLE when none is active', async () => {
      vi.mocked(queryMany).mockResolvedValue([]);

      const result = await service.getActiveCycleWithPhase('2026-03-20');

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(WorkflowErrorCode.NoActiveCycle);
    });
  });

  describe('createCycle', () => {
    const request = {
      name: '  H2 2026 ',
      nominationStartDate: '2026-09-01',
      nominationDeadline: '2026-09-15',
      feedbackDeadline: '2026-09-30',
    };

    it('should insert the cycle and deactivate the others in one transaction', async () => {
      const client = createFakeClient((sql) => {
        if (sql.startsWith('INSERT INTO review_cycles')) {
          return [
            makeCycleRecord({
              id: 'cycle-2',
              name: 'H2 2026',
              nomination_start_date: '2026-09-01',
              nomination_deadline: '2026-09-15',
              feedback_deadline: '2026-09-30',
            }),
          ];
        }
        if (sql.startsWith('UPDATE review_cycles')) {
          return [{}];
        }
        return undefined;
      });
      vi.mocked(executeTransaction).mockImplementation(async (callback) => callback(client));

      const result = await service.createCycle(request, 'hr-1');

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        id: 'cycle-2',
        name: 'H2 2026',
        nominationStartDate: '2026-09-01',
        nominationDeadline: '2026-09-15',
        feedbackDeadline: '2026-09-30',
        isActive: true,
        createdBy: 'hr-1',
        createdAt: CREATED_AT,
      });
      expect(client.query.mock.calls[0]?.[1]).toEqual(['H2 2026', '2026-09-01', '2026-09-15', '2026-09-30', 'hr-1']);
      expect(client.query.mock.calls[1]).toEqual([
        'UPDATE review_cycles SET is_active = FALSE WHERE is_active AND id <> $1',
        ['cycle-2'],
      ]);
    });

    it('should validate before touching the database', async () => {
      const result = await service.createCycle({ ...request, feedbackDeadline: '2026-09-10' }, 'hr-1');

      expect(result.errorCode).toBe(WorkflowErrorCode.ValidationError);
      expect(result.details).toEqual({ errors: ['Nomination deadline must not be after the feedback deadline'] });
      expect(executeTransaction).not.toHaveBeenCalled();
    });
  });

  describe('listCycles', () => {
    it('should map every cycle row', async () => {
      vi.mocked(queryMany).mockResolvedValue([makeCycleRecord({ id: 'cycle-2', is_active: false }), makeCycleRecord()]);

      const result = await service.listCycles();

      expect(result.data?.map((cycle) => [cycle.id, cycle.isActive])).toEqual([
        ['cycle-2', false],
        ['cycle-1', true],
      ]);
    });
  });
});
