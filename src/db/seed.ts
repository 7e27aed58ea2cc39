/**
 * Database Seeding Module
 *
 * Loads the feedback question catalog from `data/questions.json` and, outside
 * production, a small demo directory from `data/directory.json`. Every seed
 * is an upsert, so running it twice changes nothing.
 *
 * @module db/seed
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { getEnvironment } from '../config/env.js';
import { isRelationshipCategory, type RelationshipCategory } from '../types/feedback.js';
import { isUserRole, type UserRole } from '../types/index.js';
import { isQuestionType, type QuestionType } from '../types/question.js';
import { executeTransaction, shutdown } from './index.js';
import { type Queryable } from './records.js';

const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export interface QuestionSeed {
  readonly relationship: RelationshipCategory;
  readonly type: QuestionType;
  readonly text: string;
  readonly required: boolean;
}

export interface DirectorySeed {
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly designation: string | null;
  readonly vertical: string | null;
  readonly role: UserRole;
  readonly managerEmail: string | null;
}

/**
 * Seed operation result
 */
export interface SeedResult {
  readonly name: string;
  readonly recordsUpserted: number;
  readonly executionTimeMs: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Validate the question catalog file contents
 *
 * @throws Error naming the first malformed entry
 */
export function parseQuestionSeed(raw: unknown): QuestionSeed[] {
  if (!Array.isArray(raw)) {
    throw new Error('[SEED] Question catalog must be a JSON array');
  }

  return raw.map((entry: unknown, index) => {
    if (
      !isObject(entry) ||
      !isRelationshipCategory(entry.relationship) ||
      !isQuestionType(entry.type) ||
      typeof entry.text !== 'string' ||
      entry.text.trim().length === 0
    ) {
      throw new Error(`[SEED] Invalid question at index ${index}`);
    }

    return {
      relationship: entry.relationship,
      type: entry.type,
      text: entry.text.trim(),
      required: entry.required !== false,
    };
  });
}

/**
 * Validate the demo directory file contents
 *
 * @throws Error naming the first malformed entry
 */
export function parseDirectorySeed(raw: unknown): DirectorySeed[] {
  if (!Array.isArray(raw)) {
    throw new Error('[SEED] Directory must be a JSON array');
  }

  return raw.map((entry: unknown, index) => {
    if (
      !isObject(entry) ||
      typeof entry.email !== 'string' ||
      typeof entry.firstName !== 'string' ||
      typeof entry.lastName !== 'string' ||
      !isUserRole(entry.role)
    ) {
      throw new Error(`[SEED] Invalid directory entry at index ${index}`);
    }

    return {
      email: entry.email.trim().toLowerCase(),
      firstName: entry.firstName,
      lastName: entry.lastName,
      designation: nullableString(entry.designation),
      vertical: nullableString(entry.vertical),
      role: entry.role,
      managerEmail: nullableString(entry.managerEmail)?.toLowerCase() ?? null,
    };
  });
}

async function readJson(fileName: string): Promise<unknown> {
  const contents = await readFile(resolve(DATA_DIR, fileName), 'utf8');
  const parsed: unknown = JSON.parse(contents);
  return parsed;
}

/**
 * Upsert the question catalog; sort order follows file order per relationship
 */
export async function seedQuestions(client: Queryable, questions: readonly QuestionSeed[]): Promise<SeedResult> {
  const startTime = Date.now();
  const positions = new Map<RelationshipCategory, number>();

  for (const question of questions) {
    const sortOrder = (positions.get(question.relationship) ?? 0) + 1;
    positions.set(question.relationship, sortOrder);

    await client.query(
      `INSERT INTO feedback_questions (question_text, question_type, relationship, is_required, sort_order, is_active)
       VALUES ($1, $2, $3, $4, $5, TRUE)
       ON CONFLICT (relationship, question_text) DO UPDATE
       SET question_type = EXCLUDED.question_type,
           is_required = EXCLUDED.is_required,
           sort_order = EXCLUDED.sort_order,
           is_active = TRUE`,
      [question.text, question.type, question.relationship, question.required, sortOrder]
    );
  }

  console.log('[SEED_QUESTIONS] Question catalog seeded:', {
    count: questions.length,
    timestamp: new Date().toISOString(),
  });

  return { name: 'questions', recordsUpserted: questions.length, executionTimeMs: Date.now() - startTime };
}

/**
 * Upsert demo users, then link managers by email
 */
export async function seedDirectory(client: Queryable, users: readonly DirectorySeed[]): Promise<SeedResult> {
  const startTime = Date.now();

  for (const user of users) {
    await client.query(
      `INSERT INTO users (email, first_name, last_name, designation, vertical, role, is_active)
       VALUES ($1, $2, $3, $4, $5, $6, TRUE)
       ON CONFLICT ((lower(email))) DO UPDATE
       SET first_name = EXCLUDED.first_name,
           last_name = EXCLUDED.last_name,
           designation = EXCLUDED.designation,
           vertical = EXCLUDED.vertical,
           role = EXCLUDED.role,
           is_active = TRUE`,
      [user.email, user.firstName, user.lastName, user.designation, user.vertical, user.role]
    );
  }

  for (const user of users) {
    await client.query(
      `UPDATE users u
       SET manager_id = (SELECT m.id FROM users m WHERE lower(m.email) = $2)
       WHERE lower(u.email) = $1`,
      [user.email, user.managerEmail]
    );
  }

  console.log('[SEED_DIRECTORY] Demo directory seeded:', {
    count: users.length,
    timestamp: new Date().toISOString(),
  });

  return { name: 'directory', recordsUpserted: users.length, executionTimeMs: Date.now() - startTime };
}

/**
 * Seed the database in one transaction
 */
export async function seed(options?: { readonly includeDirectory?: boolean; readonly correlationId?: string }): Promise<{
  readonly success: boolean;
  readonly results: SeedResult[];
  readonly totalExecutionTimeMs: number;
  readonly error?: string;
}> {
  const startTime = Date.now();
  const correlationId = options?.correlationId ?? `seed_${Date.now()}`;
  const includeDirectory = options?.includeDirectory ?? getEnvironment() !== 'production';

  console.log('[SEED] Starting database seeding...', {
    correlationId,
    includeDirectory,
    timestamp: new Date().toISOString(),
  });

  try {
    const questions = parseQuestionSeed(await readJson('questions.json'));
    const users = includeDirectory ? parseDirectorySeed(await readJson('directory.json')) : [];

    const results = await executeTransaction(
      async (client) => {
        const seeded = [await seedQuestions(client, questions)];
        if (includeDirectory) {
          seeded.push(await seedDirectory(client, users));
        }
        return seeded;
      },
      { correlationId, operation: 'seed_database' }
    );

    const totalExecutionTimeMs = Date.now() - startTime;

    console.log('[SEED] Database seeding completed successfully:', {
      correlationId,
      totalExecutionTimeMs,
      totalRecordsUpserted: results.reduce((sum, result) => sum + result.recordsUpserted, 0),
      timestamp: new Date().toISOString(),
    });

    return { success: true, results, totalExecutionTimeMs };
  } catch (error) {
    const totalExecutionTimeMs = Date.now() - startTime;
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[SEED] Database seeding failed:', {
      correlationId,
      error: errorMessage,
      totalExecutionTimeMs,
      timestamp: new Date().toISOString(),
    });

    return { success: false, results: [], totalExecutionTimeMs, error: errorMessage };
  }
}

const isMainModule = process.argv[1] ? resolve(fileURLToPath(import.meta.url)) === resolve(process.argv[1]) : false;

if (isMainModule) {
  seed()
    .then(async (result) => {
      await shutdown();
      process.exit(result.success ? 0 : 1);
    })
    .catch((error: unknown) => {
      console.error('[SEED] Unhandled error:', error);
      process.exit(1);
    });
}
