/**
 * Directory Service Unit Tests
 *
 * @module tests/unit/services/directory.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/db/index.js', () => ({
  queryMany: vi.fn(),
}));

import { type UserRecord } from '../../../src/db/records.js';
import { queryMany } from '../../../src/db/index.js';
import { DirectoryService, fullName } from '../../../src/services/directory.service.js';
import { UserRole } from '../../../src/types/index.js';
import { createFakeClient } from '../../helpers/fake-client.js';

const bob: UserRecord = {
  id: 'bob',
  email: 'Bob.Jones@example.com',
  first_name: 'Bob',
  last_name: 'Jones',
  vertical: 'Engineering',
  designation: 'Senior Engineer',
  manager_id: 'mgr',
  manager_email: 'morgan@example.com',
  role: 'EMPLOYEE',
  is_active: true,
};

describe('DirectoryService', () => {
  let service: DirectoryService;

  beforeEach(() => {
    service = new DirectoryService();
  });

  it('should map a user row with its manager email', async () => {
    vi.mocked(queryMany).mockResolvedValue([bob]);

    const entry = await service.getEntry('bob');

    expect(entry).toEqual({
      id: 'bob',
      email: 'Bob.Jones@example.com',
      firstName: 'Bob',
      lastName: 'Jones',
      vertical: 'Engineering',
      designation: 'Senior Engineer',
      managerId: 'mgr',
      managerEmail: 'morgan@example.com',
      role: UserRole.Employee,
      isActive: true,
    });
  });

  it('should return null for an unknown user', async () => {
    vi.mocked(queryMany).mockResolvedValue([]);

    await expect(service.getEntry('nobody')).resolves.toBeNull();
  });

  it('should find users by email case-insensitively', async () => {
    vi.mocked(queryMany).mockResolvedValue([bob]);

    const entry = await service.findByEmail('  BOB.JONES@example.com ');

    expect(entry?.id).toBe('bob');
    expect(vi.mocked(queryMany).mock.calls[0]?.[1]).toEqual(['bob.jones@example.com']);
  });

  it('should query on the transaction client when one is given', async () => {
    const client = createFakeClient(() => [bob, { ...bob, id: 'carol', first_name: 'Carol' }]);

    const entries = await service.getEntries(['bob', 'carol'], client);

    expect([...entries.keys()]).toEqual(['bob', 'carol']);
    expect(client.query.mock.calls[0]?.[1]).toEqual([['bob', 'carol']]);
    expect(queryMany).not.toHaveBeenCalled();
  });

  it('should skip the query for an empty id list', async () => {
    await expect(service.getEntries([])).resolves.toEqual(new Map());
    expect(queryMany).not.toHaveBeenCalled();
  });

  it('should fail on a role the application does not know', async () => {
    vi.mocked(queryMany).mockResolvedValue([{ ...bob, role: 'CONTRACTOR' }]);

    await expect(service.listActive()).rejects.toThrow('Unknown user role in database: CONTRACTOR');
  });
});

describe('fullName', () => {
  it('should join first and last names', () => {
    expect(fullName({ firstName: 'Bob', lastName: 'Jones' })).toBe('Bob Jones');
    expect(fullName({ firstName: 'Cher', lastName: '' })).toBe('Cher');
  });
});
