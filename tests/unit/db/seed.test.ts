/**
 * Seed Module Unit Tests
 *
 * @module tests/unit/db/seed
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/db/index.js', () => ({
  executeTransaction: vi.fn(),
  shutdown: vi.fn(),
}));

import { executeTransaction } from '../../../src/db/index.js';
import {
  parseDirectorySeed,
  parseQuestionSeed,
  seed,
  seedDirectory,
  seedQuestions,
} from '../../../src/db/seed.js';
import { RelationshipCategory } from '../../../src/types/feedback.js';
import { UserRole } from '../../../src/types/index.js';
import { QuestionType } from '../../../src/types/question.js';
import { createFakeClient } from '../../helpers/fake-client.js';

describe('parseQuestionSeed', () => {
  it('should trim text and default required to true', () => {
    expect(
      parseQuestionSeed([
        { relationship: 'PEER', type: 'RATING', text: '  How well do they collaborate? ' },
        { relationship: 'PEER', type: 'TEXT', text: 'Anything else?', required: false },
      ])
    ).toEqual([
      {
        relationship: RelationshipCategory.Peer,
        type: QuestionType.Rating,
        text: 'How well do they collaborate?',
        required: true,
      },
      {
        relationship: RelationshipCategory.Peer,
        type: QuestionType.Text,
        text: 'Anything else?',
        required: false,
      },
    ]);
  });

  it('should name the first malformed question', () => {
    expect(() =>
      parseQuestionSeed([
        { relationship: 'PEER', type: 'RATING', text: 'Fine' },
        { relationship: 'FRIEND', type: 'RATING', text: 'Odd' },
      ])
    ).toThrow('[SEED] Invalid question at index 1');
    expect(() => parseQuestionSeed({})).toThrow('[SEED] Question catalog must be a JSON array');
  });
});

describe('parseDirectorySeed', () => {
  it('should normalize emails and blank optional fields', () => {
    expect(
      parseDirectorySeed([
        {
          email: ' Alice@Example.com',
          firstName: 'Alice',
          lastName: 'Smith',
          designation: 'Engineering Manager',
          vertical: ' ',
          role: 'EMPLOYEE',
          managerEmail: 'MGR@example.com',
        },
      ])
    ).toEqual([
      {
        email: 'alice@example.com',
        firstName: 'Alice',
        lastName: 'Smith',
        designation: 'Engineering Manager',
        vertical: null,
        role: UserRole.Employee,
        managerEmail: 'mgr@example.com',
      },
    ]);
  });

  it('should reject an unknown role', () => {
    expect(() =>
      parseDirectorySeed([{ email: 'a@example.com', firstName: 'A', lastName: 'B', role: 'OWNER' }])
    ).toThrow('[SEED] Invalid directory entry at index 0');
  });
});

describe('seeding', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should number questions per relationship in file order', async () => {
    const client = createFakeClient();

    await seedQuestions(client, [
      { relationship: RelationshipCategory.Peer, type: QuestionType.Rating, text: 'P1', required: true },
      { relationship: RelationshipCategory.Manager, type: QuestionType.Rating, text: 'M1', required: true },
      { relationship: RelationshipCategory.Peer, type: QuestionType.Text, text: 'P2', required: false },
    ]);

    expect(client.query.mock.calls.map((call) => call[1])).toEqual([
      ['P1', 'RATING', 'PEER', true, 1],
      ['M1', 'RATING', 'MANAGER', true, 1],
      ['P2', 'TEXT', 'PEER', false, 2],
    ]);
  });

  it('should insert users before linking managers', async () => {
    const client = createFakeClient();
    const users = [
      {
        email: 'mgr@example.com',
        firstName: 'Morgan',
        lastName: 'Lee',
        designation: 'Director',
        vertical: 'Engineering',
        role: UserRole.Employee,
        managerEmail: null,
      },
      {
        email: 'alice@example.com',
        firstName: 'Alice',
        lastName: 'Smith',
        designation: 'Engineering Manager',
        vertical: 'Engineering',
        role: UserRole.Employee,
        managerEmail: 'mgr@example.com',
      },
    ];

    const result = await seedDirectory(client, users);

    expect(result.recordsUpserted).toBe(2);
    expect(client.query.mock.calls.slice(2).map((call) => call[1])).toEqual([
      ['mgr@example.com', null],
      ['alice@example.com', 'mgr@example.com'],
    ]);
  });

  it('should load the bundled catalog in one transaction', async () => {
    const client = createFakeClient();
    vi.mocked(executeTransaction).mockImplementation(async (callback) => callback(client));

    const result = await seed({ includeDirectory: false, correlationId: 'seed-test' });

    expect(result.success).toBe(true);
    expect(result.results.map((entry) => entry.name)).toEqual(['questions']);
    expect(executeTransaction).toHaveBeenCalledTimes(1);
    expect(client.query).toHaveBeenCalledTimes(result.results[0]?.recordsUpserted ?? -1);
  });

  it('should report a failed transaction', async () => {
    vi.mocked(executeTransaction).mockRejectedValue(new Error('relation "feedback_questions" does not exist'));

    const result = await seed({ includeDirectory: false });

    expect(result).toMatchObject({
      success: false,
      results: [],
      error: 'relation "feedback_questions" does not exist',
    });
  });
});
