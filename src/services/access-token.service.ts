/**
 * Access Token Service Module
 *
 * Persistence of external access tokens. Issuing and status changes run on
 * the caller's transaction client so a token always moves together with the
 * request it belongs to.
 *
 * @module services/access-token
 */

import { getWorkflowConfig } from '../config/workflow.js';
import { parseWorkflowState, selectRows, type Queryable } from '../db/records.js';
import { AccessTokenStatus } from '../types/auth.js';
import { normalizeEmail, type WorkflowState } from '../types/feedback.js';
import { randomToken } from '../utils/token.js';

/**
 * Active token row joined with its request and requester
 */
export interface ActiveTokenRecord {
  readonly id: string;
  readonly email: string;
  readonly token: string;
  readonly request_id: string;
  readonly cycle_id: string;
  readonly status: string;
  readonly workflow_state: string;
  readonly external_email: string | null;
  readonly external_name: string | null;
  readonly requester_first_name: string;
  readonly requester_last_name: string;
}

/**
 * Active token as read for validation
 */
export interface ActiveToken {
  readonly id: string;
  readonly email: string;
  readonly token: string;
  readonly requestId: string;
  readonly cycleId: string;
  readonly requestState: WorkflowState;
  readonly requestEmail: string | null;
  readonly displayName: string;
  readonly requesterName: string;
}

function toActiveToken(record: ActiveTokenRecord): ActiveToken {
  return {
    id: record.id,
    email: record.email,
    token: record.token,
    requestId: record.request_id,
    cycleId: record.cycle_id,
    requestState: parseWorkflowState(record.workflow_state),
    requestEmail: record.external_email,
    displayName: record.external_name ?? record.email,
    requesterName: `${record.requester_first_name} ${record.requester_last_name}`.trim(),
  };
}

export class AccessTokenService {
  /**
   * Issue a token for a request, rotating and re-activating any earlier one
   *
   * @returns The new token value
   */
  async issue(client: Queryable, email: string, requestId: string, cycleId: string): Promise<string> {
    const token = randomToken(getWorkflowConfig().externalTokenBytes);

    await client.query(
      `INSERT INTO external_access_tokens (email, token, request_id, cycle_id, status, is_active)
       VALUES ($1, $2, $3, $4, $5, TRUE)
       ON CONFLICT (request_id) DO UPDATE
       SET email = EXCLUDED.email,
           token = EXCLUDED.token,
           status = EXCLUDED.status,
           is_active = TRUE,
           issued_at = now(),
           consumed_at = NULL`,
      [normalizeEmail(email), token, requestId, cycleId, AccessTokenStatus.Pending]
    );

    return token;
  }

  /**
   * Move the token of a request to a new status
   *
   * With `deactivate` the token stops authorizing anything from now on.
   * Requests without a token are left alone.
   */
  async updateStatus(
    client: Queryable,
    requestId: string,
    status: AccessTokenStatus,
    deactivate: boolean
  ): Promise<void> {
    await client.query(
      `UPDATE external_access_tokens
       SET status = $2,
           is_active = is_active AND NOT $3::boolean,
           consumed_at = CASE WHEN $3::boolean THEN now() ELSE consumed_at END
       WHERE request_id = $1`,
      [requestId, status, deactivate]
    );
  }

  /**
   * Active tokens issued to an email address
   */
  async findActiveByEmail(email: string, client?: Queryable): Promise<ActiveToken[]> {
    const rows = await selectRows<ActiveTokenRecord>(
      client,
      `SELECT t.id, t.email, t.token, t.request_id, t.cycle_id, t.status,
              fr.workflow_state, fr.external_email, fr.external_name,
              u.first_name AS requester_first_name, u.last_name AS requester_last_name
       FROM external_access_tokens t
       JOIN feedback_requests fr ON fr.id = t.request_id
       JOIN users u ON u.id = fr.requester_id
       WHERE lower(t.email) = $1 AND t.is_active`,
      [normalizeEmail(email)],
      { operation: 'find_active_tokens' }
    );
    return rows.map(toActiveToken);
  }
}

export const accessTokenService = new AccessTokenService();
