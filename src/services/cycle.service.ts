/**
 * Cycle Service Module
 *
 * The cycle registry: which review cycle is active, which phase it is in,
 * and creation of a new cycle that supersedes the previous one.
 *
 * @module services/cycle
 */

import { executeTransaction, queryMany } from '../db/index.js';
import { CYCLE_COLUMNS, selectRows, toCycle, type CycleRecord, type Queryable } from '../db/records.js';
import {
  CyclePhase,
  type CreateCycleRequest,
  type Cycle,
  type CycleWithPhase,
} from '../types/cycle.js';
import { WorkflowError, WorkflowErrorCode } from '../types/errors.js';
import { type ServiceOperationResult } from '../types/index.js';
import { isCalendarDate, isDeadlinePassed, today } from '../utils/date.js';

import { fail, succeed } from './result.js';

const TAG = 'CYCLE_SERVICE';

/**
 * Phase of a cycle on a given day
 *
 * Up to and including the nomination deadline the cycle is in nomination;
 * up to and including the feedback deadline it is in feedback; afterwards it
 * is complete.
 */
export function currentPhase(cycle: Cycle, on: string = today()): CyclePhase {
  if (!isNominationDeadlinePassed(cycle, on)) {
    return CyclePhase.Nomination;
  }
  if (!isFeedbackDeadlinePassed(cycle, on)) {
    return CyclePhase.Feedback;
  }
  return CyclePhase.Complete;
}

export function isNominationDeadlinePassed(cycle: Cycle, on: string = today()): boolean {
  return isDeadlinePassed(cycle.nominationDeadline, on);
}

export function isFeedbackDeadlinePassed(cycle: Cycle, on: string = today()): boolean {
  return isDeadlinePassed(cycle.feedbackDeadline, on);
}

/**
 * Whether nominations are accepted on a given day
 */
export function isNominationOpen(cycle: Cycle, on: string = today()): boolean {
  return on >= cycle.nominationStartDate && !isNominationDeadlinePassed(cycle, on);
}

/**
 * Validate a create-cycle request
 *
 * @returns Validation errors, empty when valid
 */
export function validateCycleRequest(request: CreateCycleRequest): string[] {
  const errors: string[] = [];

  if (request.name.trim().length === 0) {
    errors.push('Cycle name is required');
  }

  const dates: ReadonlyArray<readonly [string, string]> = [
    ['nominationStartDate', request.nominationStartDate],
    ['nominationDeadline', request.nominationDeadline],
    ['feedbackDeadline', request.feedbackDeadline],
  ];

  for (const [field, value] of dates) {
    if (!isCalendarDate(value)) {
      errors.push(`${field} must be a date in YYYY-MM-DD format`);
    }
  }

  if (errors.length > 0) {
    return errors;
  }

  if (request.nominationStartDate > request.nominationDeadline) {
    errors.push('Nomination start date must not be after the nomination deadline');
  }

  if (request.nominationDeadline > request.feedbackDeadline) {
    errors.push('Nomination deadline must not be after the feedback deadline');
  }

  return errors;
}

export class CycleService {
  /**
   * The active cycle, if any
   */
  async getActiveCycle(client?: Queryable): Promise<Cycle | null> {
    const rows = await selectRows<CycleRecord>(
      client,
      `SELECT ${CYCLE_COLUMNS} FROM review_cycles WHERE is_active ORDER BY created_at DESC LIMIT 1`,
      [],
      { operation: 'get_active_cycle' }
    );
    const record = rows[0];
    return record ? toCycle(record) : null;
  }

  /**
   * The active cycle, or NO_ACTIVE_CYCLE
   */
  async requireActiveCycle(client?: Queryable): Promise<Cycle> {
    const cycle = await this.getActiveCycle(client);
    if (!cycle) {
      throw new WorkflowError(WorkflowErrorCode.NoActiveCycle, 'There is no active review cycle');
    }
    return cycle;
  }

  /**
   * A cycle by id, active or not
   */
  async getCycle(cycleId: string, client?: Queryable): Promise<Cycle | null> {
    const rows = await selectRows<CycleRecord>(
      client,
      `SELECT ${CYCLE_COLUMNS} FROM review_cycles WHERE id = $1`,
      [cycleId],
      { operation: 'get_cycle' }
    );
    const record = rows[0];
    return record ? toCycle(record) : null;
  }

  /**
   * Active cycle with its phase on the given day
   */
  async getActiveCycleWithPhase(
    on: string = today(),
    correlationId?: string
  ): Promise<ServiceOperationResult<CycleWithPhase>> {
    const startTime = Date.now();
    const cid = correlationId ?? `get_active_cycle_${Date.now()}`;

    try {
      const cycle = await this.requireActiveCycle();
      return succeed({ cycle, phase: currentPhase(cycle, on) }, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Get active cycle', correlationId: cid });
    }
  }

  /**
   * Create a cycle and make it the only active one
   *
   * Insert and deactivation of every other cycle commit together; if the
   * insert fails the previous active cycle stays active.
   */
  async createCycle(
    request: CreateCycleRequest,
    actorId: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<Cycle>> {
    const startTime = Date.now();
    const cid = correlationId ?? `create_cycle_${Date.now()}`;

    console.log(`[${TAG}] Creating review cycle:`, {
      name: request.name,
      nominationStartDate: request.nominationStartDate,
      nominationDeadline: request.nominationDeadline,
      feedbackDeadline: request.feedbackDeadline,
      actorId,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const errors = validateCycleRequest(request);
      if (errors.length > 0) {
        throw new WorkflowError(WorkflowErrorCode.ValidationError, errors.join(', '), { errors });
      }

      const { cycle, deactivated } = await executeTransaction(
        async (client) => {
          const inserted = await client.query<CycleRecord>(
            `INSERT INTO review_cycles (
              name, nomination_start_date, nomination_deadline, feedback_deadline, is_active, created_by
            ) VALUES ($1, $2, $3, $4, TRUE, $5)
            RETURNING ${CYCLE_COLUMNS}`,
            [
              request.name.trim(),
              request.nominationStartDate,
              request.nominationDeadline,
              request.feedbackDeadline,
              actorId,
            ]
          );

          const record = inserted.rows[0];
          if (!record) {
            throw new Error('Failed to create review cycle record');
          }

          const superseded = await client.query(
            'UPDATE review_cycles SET is_active = FALSE WHERE is_active AND id <> $1',
            [record.id]
          );

          return { cycle: toCycle(record), deactivated: superseded.rowCount ?? 0 };
        },
        { correlationId: cid, operation: 'create_cycle' }
      );

      console.log(`[${TAG}] Review cycle created:`, {
        cycleId: cycle.id,
        deactivatedCycles: deactivated,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
      });

      return succeed(cycle, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Cycle creation', correlationId: cid });
    }
  }

  /**
   * All cycles, newest first
   */
  async listCycles(correlationId?: string): Promise<ServiceOperationResult<Cycle[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `list_cycles_${Date.now()}`;

    try {
      const rows = await queryMany<CycleRecord>(
        `SELECT ${CYCLE_COLUMNS} FROM review_cycles ORDER BY created_at DESC`,
        [],
        { correlationId: cid, operation: 'list_cycles' }
      );
      return succeed(rows.map(toCycle), startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'List cycles', correlationId: cid });
    }
  }
}

export const cycleService = new CycleService();
