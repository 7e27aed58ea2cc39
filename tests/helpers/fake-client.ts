/**
 * In-process stand-ins for a pg transaction client
 *
 * @module tests/helpers/fake-client
 */

import { vi } from 'vitest';

import { type FeedbackRequestRecord } from '../../src/db/records.js';

import { makeRequestRecord } from './fixtures.js';

/**
 * Timestamp written wherever the SQL says now()
 */
export const NOW = new Date('2026-03-20T12:00:00.000Z');

export type Row = Record<string, unknown>;

/**
 * Returns rows for statements it recognizes, undefined to fall through
 *
 * Rows are plain objects so typed records such as UserRecord fit without an
 * index signature.
 */
export type QueryHandler = (sql: string, params: readonly unknown[]) => readonly object[] | undefined;

function text(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Client whose query() answers from a handler; unknown statements return no rows
 */
export function createFakeClient(handler: QueryHandler = () => undefined) {
  const query = vi.fn();
  query.mockImplementation(async (sql: string, params: unknown[] = []) => {
    const rows = handler(sql, params) ?? [];
    return { rows, rowCount: rows.length };
  });
  return { query };
}

/**
 * Client holding feedback_requests rows in memory
 *
 * Answers the row lock, the state-guarded UPDATE and the INSERT the workflow
 * issues. `override` sees every statement first.
 */
export function createRequestStore(initial: readonly FeedbackRequestRecord[], override?: QueryHandler) {
  const rows = new Map<string, Row>(initial.map((record): [string, Row] => [record.id, { ...record }]));
  let insertedCount = 0;

  function applyUpdate(sql: string, params: readonly unknown[]): Row[] {
    const current = rows.get(String(params[0]));
    if (!current || current.workflow_state !== params[1]) {
      return [];
    }

    const next: Row = { ...current, workflow_state: params[2] };

    for (const match of sql.matchAll(/(\w+) = \$(\d+)/g)) {
      const position = Number(match[2]);
      if (position >= 4) {
        next[match[1]] = params[position - 1];
      }
    }

    for (const match of sql.matchAll(/(\w+) = now\(\)/g)) {
      if (match[1] !== 'updated_at') {
        next[match[1]] = NOW;
      }
    }

    rows.set(String(params[0]), next);
    return [next];
  }

  function applyInsert(params: readonly unknown[]): Row[] {
    insertedCount++;
    const record: Row = {
      ...makeRequestRecord({
        id: `req-new-${insertedCount}`,
        cycle_id: String(params[0]),
        requester_id: String(params[1]),
        reviewer_id: text(params[2]),
        external_email: text(params[3]),
        external_name: text(params[4]),
        relationship: String(params[5]),
        workflow_state: String(params[6]),
      }),
    };
    rows.set(String(record.id), record);
    return [record];
  }

  const client = createFakeClient((sql, params) => {
    const overridden = override?.(sql, params);
    if (overridden) {
      return overridden;
    }

    const statement = sql.trimStart();

    if (statement.startsWith('SELECT') && statement.includes('FROM feedback_requests') && statement.includes('FOR UPDATE')) {
      const row = rows.get(String(params[0]));
      return row ? [row] : [];
    }
    if (statement.startsWith('UPDATE feedback_requests')) {
      return applyUpdate(sql, params);
    }
    if (statement.startsWith('INSERT INTO feedback_requests')) {
      return applyInsert(params);
    }
    return undefined;
  });

  /**
   * SQL and parameters of every statement starting with the given text
   */
  function statements(prefix: string): unknown[][] {
    return client.query.mock.calls
      .filter((call) => String(call[0]).trimStart().startsWith(prefix))
      .map((call) => (Array.isArray(call[1]) ? call[1] : []));
  }

  return { client, rows, statements };
}
