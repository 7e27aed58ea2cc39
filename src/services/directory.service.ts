/**
 * Directory Service Module
 *
 * Read-only lookups over the organisation directory (`users`): who a user is,
 * who their manager is, and which employees exist.
 *
 * @module services/directory
 */

import {
  USER_COLUMNS,
  USER_FROM,
  selectRows,
  toDirectoryEntry,
  type Queryable,
  type UserRecord,
} from '../db/records.js';
import { type DirectoryEntry } from '../types/index.js';
import { normalizeEmail } from '../types/feedback.js';

/**
 * Full display name of a directory entry
 */
export function fullName(entry: Pick<DirectoryEntry, 'firstName' | 'lastName'>): string {
  return `${entry.firstName} ${entry.lastName}`.trim();
}

export class DirectoryService {
  /**
   * Look up one user by id
   */
  async getEntry(userId: string, client?: Queryable): Promise<DirectoryEntry | null> {
    const rows = await selectRows<UserRecord>(
      client,
      `SELECT ${USER_COLUMNS} FROM ${USER_FROM} WHERE u.id = $1`,
      [userId],
      { operation: 'directory_get_entry' }
    );
    const record = rows[0];
    return record ? toDirectoryEntry(record) : null;
  }

  /**
   * Look up several users by id; unknown ids are absent from the map
   */
  async getEntries(userIds: readonly string[], client?: Queryable): Promise<Map<string, DirectoryEntry>> {
    if (userIds.length === 0) {
      return new Map();
    }

    const rows = await selectRows<UserRecord>(
      client,
      `SELECT ${USER_COLUMNS} FROM ${USER_FROM} WHERE u.id = ANY($1::uuid[])`,
      [[...userIds]],
      { operation: 'directory_get_entries' }
    );

    return new Map(rows.map((record) => [record.id, toDirectoryEntry(record)]));
  }

  /**
   * All active users, ordered by name
   */
  async listActive(client?: Queryable): Promise<DirectoryEntry[]> {
    const rows = await selectRows<UserRecord>(
      client,
      `SELECT ${USER_COLUMNS} FROM ${USER_FROM} WHERE u.is_active ORDER BY u.first_name, u.last_name`,
      [],
      { operation: 'directory_list_active' }
    );
    return rows.map(toDirectoryEntry);
  }

  /**
   * Look up a user by email, case-insensitively
   */
  async findByEmail(email: string, client?: Queryable): Promise<DirectoryEntry | null> {
    const rows = await selectRows<UserRecord>(
      client,
      `SELECT ${USER_COLUMNS} FROM ${USER_FROM} WHERE lower(u.email) = $1`,
      [normalizeEmail(email)],
      { operation: 'directory_find_by_email' }
    );
    const record = rows[0];
    return record ? toDirectoryEntry(record) : null;
  }
}

export const directoryService = new DirectoryService();
