/**
 * Workflow Configuration Module
 *
 * Limits and policies of the feedback workflow: nomination quota, reviewer
 * capacity, the deadline policy applied by the sweep, who may nominate
 * external stakeholders, and the sweep schedule.
 *
 * @module config/workflow
 */

import { DeadlinePolicy } from '../types/feedback.js';

import { parseChoice, parseInteger, readEnv } from './env.js';

const TAG = 'WORKFLOW_CONFIG';

/**
 * Workflow configuration
 */
export interface WorkflowConfig {
  /**
   * Maximum counted nominations per requester and cycle
   */
  readonly requesterQuota: number;

  /**
   * Maximum counted incoming requests per reviewer and cycle
   */
  readonly reviewerCapacity: number;

  /**
   * What the sweep does with pending requests after the nomination deadline
   */
  readonly deadlinePolicy: DeadlinePolicy;

  /**
   * Minimum designation level allowed to nominate external stakeholders
   */
  readonly externalMinLevel: number;

  /**
   * Interval between scheduled sweeps in milliseconds, 0 disables the timer
   */
  readonly sweepIntervalMs: number;

  /**
   * Random bytes in an external access token
   */
  readonly externalTokenBytes: number;

  /**
   * Base URL of the web application, used in invitation links
   */
  readonly publicBaseUrl: string;
}

function loadWorkflowConfig(): WorkflowConfig {
  const config: WorkflowConfig = {
    requesterQuota: parseInteger(readEnv('WORKFLOW_REQUESTER_QUOTA'), 4, 1, 50, 'WORKFLOW_REQUESTER_QUOTA', TAG),
    reviewerCapacity: parseInteger(
      readEnv('WORKFLOW_REVIEWER_CAPACITY'),
      4,
      1,
      50,
      'WORKFLOW_REVIEWER_CAPACITY',
      TAG
    ),
    deadlinePolicy: parseChoice(
      readEnv('WORKFLOW_DEADLINE_POLICY'),
      Object.values(DeadlinePolicy),
      DeadlinePolicy.AutoApprove,
      'WORKFLOW_DEADLINE_POLICY',
      TAG
    ),
    externalMinLevel: parseInteger(readEnv('WORKFLOW_EXTERNAL_MIN_LEVEL'), 2, 0, 5, 'WORKFLOW_EXTERNAL_MIN_LEVEL', TAG),
    sweepIntervalMs: parseInteger(
      readEnv('SWEEP_INTERVAL_MS'),
      60 * 60 * 1000,
      0,
      7 * 24 * 60 * 60 * 1000,
      'SWEEP_INTERVAL_MS',
      TAG
    ),
    externalTokenBytes: parseInteger(readEnv('EXTERNAL_TOKEN_BYTES'), 32, 16, 128, 'EXTERNAL_TOKEN_BYTES', TAG),
    publicBaseUrl: (readEnv('PUBLIC_BASE_URL') ?? 'http://localhost:3000').replace(/\/+$/, ''),
  };

  console.log(`[${TAG}] Workflow configuration loaded:`, config);

  return config;
}

let workflowConfigInstance: WorkflowConfig | null = null;

/**
 * Get workflow configuration singleton
 */
export function getWorkflowConfig(): WorkflowConfig {
  if (!workflowConfigInstance) {
    workflowConfigInstance = loadWorkflowConfig();
  }
  return workflowConfigInstance;
}

/**
 * Reset workflow configuration singleton (for testing)
 *
 * @internal
 */
export function resetWorkflowConfig(): void {
  workflowConfigInstance = null;
}
