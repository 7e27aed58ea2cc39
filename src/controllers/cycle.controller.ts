/**
 * Cycle Controller Module
 *
 * HTTP handlers for review cycle administration: reading the active cycle
 * with its phase, creating and listing cycles, and triggering the deadline
 * sweep on demand.
 *
 * @module controllers/cycle
 */

import { type Response } from 'express';

import { cycleService, type CycleService } from '../services/cycle.service.js';
import { deadlineSweeperService, type DeadlineSweeperService } from '../services/deadline-sweeper.service.js';
import { type AuthenticatedRequest } from '../types/auth.js';
import {
  HTTP_STATUS,
  getCorrelationId,
  requireUser,
  sendError,
  sendResult,
  sendUnexpectedError,
} from '../utils/http.js';
import { parseCreateCycle } from '../utils/request-parsers.js';

const TAG = 'CYCLE_CONTROLLER';

export class CycleController {
  constructor(
    private readonly cycles: CycleService = cycleService,
    private readonly sweeper: DeadlineSweeperService = deadlineSweeperService
  ) {}

  /**
   * GET /api/cycles/active
   */
  async getActive(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'cycle');

    try {
      const result = await this.cycles.getActiveCycleWithPhase(undefined, correlationId);
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Get active cycle', error, { correlationId, startTime });
    }
  }

  /**
   * GET /api/cycles
   */
  async list(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'cycle');

    try {
      const result = await this.cycles.listCycles(correlationId);
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'List cycles', error, { correlationId, startTime });
    }
  }

  /**
   * POST /api/cycles
   *
   * Request body:
   * {
   *   name: string,
   *   nominationStartDate: string (YYYY-MM-DD),
   *   nominationDeadline: string (YYYY-MM-DD),
   *   feedbackDeadline: string (YYYY-MM-DD)
   * }
   *
   * The new cycle becomes the active one.
   */
  async create(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'cycle');

    const user = requireUser(req, res);
    if (!user) {
      return;
    }

    console.log(`[${TAG}] Create cycle request received:`, {
      correlationId,
      userId: user.userId,
      timestamp: new Date().toISOString(),
    });

    const parsed = parseCreateCycle(req.body);
    if (!parsed.ok) {
      console.warn(`[${TAG}] Create cycle failed - invalid request body:`, {
        correlationId,
        error: parsed.error,
        timestamp: new Date().toISOString(),
      });
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    try {
      const result = await this.cycles.createCycle(parsed.value, user.userId, correlationId);
      sendResult(res, result, HTTP_STATUS.CREATED, 'Review cycle created');
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Create cycle', error, { correlationId, startTime });
    }
  }

  /**
   * POST /api/cycles/active/sweep
   *
   * Runs the deadline sweep now and returns its report.
   */
  async sweep(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();
    const correlationId = getCorrelationId(req, 'sweep');

    console.log(`[${TAG}] Manual sweep requested:`, {
      correlationId,
      userId: req.user?.userId,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.sweeper.sweep({ correlationId });
      sendResult(res, result);
    } catch (error) {
      sendUnexpectedError(res, TAG, 'Sweep', error, { correlationId, startTime });
    }
  }
}

export const cycleController = new CycleController();
