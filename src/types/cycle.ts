/**
 * Review cycle type definitions
 *
 * A review cycle is a named time window with a nomination phase followed by a
 * feedback phase. At most one cycle is active at any time.
 *
 * @module types/cycle
 */

import { type BaseEntity } from './index.js';

/**
 * Cycle phase, derived from today's date and the cycle deadlines
 */
export enum CyclePhase {
  Nomination = 'NOMINATION',
  Feedback = 'FEEDBACK',
  Complete = 'COMPLETE',
}

/**
 * Review cycle entity
 *
 * Deadline fields are calendar dates in ISO `YYYY-MM-DD` form.
 */
export interface Cycle extends BaseEntity {
  /**
   * Display name, e.g. "H1 2026"
   */
  readonly name: string;

  /**
   * First day nominations are accepted
   */
  readonly nominationStartDate: string;

  /**
   * Last day nominations are accepted
   */
  readonly nominationDeadline: string;

  /**
   * Last day feedback can be submitted
   */
  readonly feedbackDeadline: string;

  /**
   * Whether this is the active cycle
   */
  readonly isActive: boolean;

  /**
   * Administrator who created the cycle
   */
  readonly createdBy: string | null;
}

/**
 * Create cycle request
 */
export interface CreateCycleRequest {
  readonly name: string;
  readonly nominationStartDate: string;
  readonly nominationDeadline: string;
  readonly feedbackDeadline: string;
}

/**
 * Active cycle together with its current phase
 */
export interface CycleWithPhase {
  readonly cycle: Cycle;
  readonly phase: CyclePhase;
}

