/**
 * Request body parsers
 *
 * Turn untrusted JSON bodies into typed service inputs. Shape problems are
 * reported as messages; business rules stay in the services.
 *
 * @module utils/request-parsers
 */

import { type CreateCycleRequest } from '../types/cycle.js';
import { type ManagerDecision, type Reviewer, type ReviewerResponse } from '../types/feedback.js';
import { type Answer } from '../types/question.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type ParseResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

function invalid<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

/**
 * Canonical 8-4-4-4-12 hex form, the shape of every row id
 */
export function isUuid(value: unknown): value is string {
  return typeof value === 'string' && UUID_PATTERN.test(value);
}

/**
 * Optional id from a query string; absent is fine, anything else must be a UUID
 */
export function parseOptionalId(value: unknown, name: string): ParseResult<string | undefined> {
  if (value === undefined) {
    return ok(undefined);
  }
  return isUuid(value) ? ok(value) : invalid(`${name} must be a UUID`);
}

/**
 * Optional trimmed string field
 */
export function optionalString(body: unknown, key: string): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * `{ reviewers: [{ userId } | { email, name }] }`
 */
export function parseReviewers(body: unknown): ParseResult<Reviewer[]> {
  if (!isRecord(body) || !Array.isArray(body.reviewers)) {
    return invalid('reviewers must be an array');
  }

  const reviewers: Reviewer[] = [];

  for (const [index, item] of body.reviewers.entries()) {
    if (!isRecord(item)) {
      return invalid(`reviewers[${index}] must be an object`);
    }

    if (item.userId !== undefined) {
      if (!isUuid(item.userId)) {
        return invalid(`reviewers[${index}].userId must be a UUID`);
      }
      reviewers.push({ kind: 'internal', userId: item.userId });
    } else if (typeof item.email === 'string') {
      reviewers.push({
        kind: 'external',
        email: item.email,
        displayName: typeof item.name === 'string' ? item.name : '',
      });
    } else {
      return invalid(`reviewers[${index}] needs either userId or email`);
    }
  }

  return ok(reviewers);
}

/**
 * `{ answers: [{ questionId, rating?, text? }] }`
 */
export function parseAnswers(body: unknown): ParseResult<Answer[]> {
  if (!isRecord(body) || !Array.isArray(body.answers)) {
    return invalid('answers must be an array');
  }

  const answers: Answer[] = [];

  for (const [index, item] of body.answers.entries()) {
    if (!isRecord(item) || typeof item.questionId !== 'string') {
      return invalid(`answers[${index}] needs a questionId`);
    }

    const { rating, text } = item;

    if (rating !== undefined && rating !== null && typeof rating !== 'number') {
      return invalid(`answers[${index}].rating must be a number`);
    }
    if (text !== undefined && text !== null && typeof text !== 'string') {
      return invalid(`answers[${index}].text must be a string`);
    }

    answers.push({
      questionId: item.questionId,
      rating: rating ?? null,
      text: text ?? null,
    });
  }

  return ok(answers);
}

export function parseCreateCycle(body: unknown): ParseResult<CreateCycleRequest> {
  if (!isRecord(body)) {
    return invalid('Invalid request body');
  }

  const { name, nominationStartDate, nominationDeadline, feedbackDeadline } = body;

  if (
    typeof name !== 'string' ||
    typeof nominationStartDate !== 'string' ||
    typeof nominationDeadline !== 'string' ||
    typeof feedbackDeadline !== 'string'
  ) {
    return invalid('name, nominationStartDate, nominationDeadline and feedbackDeadline are required strings');
  }

  return ok({ name, nominationStartDate, nominationDeadline, feedbackDeadline });
}

export function parseManagerDecision(body: unknown): ParseResult<{ decision: ManagerDecision; reason?: string }> {
  const decision = optionalString(body, 'decision');
  if (decision !== 'APPROVE' && decision !== 'REJECT') {
    return invalid('decision must be APPROVE or REJECT');
  }
  return ok({ decision, reason: optionalString(body, 'reason') });
}

export function parseReviewerResponse(
  body: unknown
): ParseResult<{ response: ReviewerResponse; reason?: string }> {
  const response = optionalString(body, 'response');
  if (response !== 'ACCEPT' && response !== 'REJECT') {
    return invalid('response must be ACCEPT or REJECT');
  }
  return ok({ response, reason: optionalString(body, 'reason') });
}
