/**
 * Question Service Module
 *
 * Question catalog per relationship category and validation of submitted
 * answers against it.
 *
 * @module services/question
 */

import { queryMany } from '../db/index.js';
import { parseRelationship, selectRows, type Queryable } from '../db/records.js';
import { WorkflowError, WorkflowErrorCode } from '../types/errors.js';
import { type RelationshipCategory } from '../types/feedback.js';
import { type ServiceOperationResult } from '../types/index.js';
import {
  MAX_RATING,
  MIN_RATING,
  QuestionType,
  isQuestionType,
  type Answer,
  type AnswerValidationResult,
  type FeedbackQuestion,
} from '../types/question.js';

import { fail, succeed } from './result.js';

const TAG = 'QUESTION_SERVICE';

interface QuestionRecord {
  readonly id: string;
  readonly question_text: string;
  readonly question_type: string;
  readonly relationship: string;
  readonly is_required: boolean;
  readonly sort_order: number;
}

const QUESTION_COLUMNS = 'id, question_text, question_type, relationship, is_required, sort_order';

function toQuestion(record: QuestionRecord): FeedbackQuestion {
  if (!isQuestionType(record.question_type)) {
    throw new Error(`Unknown question type in database: ${record.question_type}`);
  }

  return {
    id: record.id,
    text: record.question_text,
    type: record.question_type,
    relationship: parseRelationship(record.relationship),
    isRequired: record.is_required,
    sortOrder: record.sort_order,
  };
}

/**
 * Whether a value is an acceptable rating
 */
export function isValidRating(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= MIN_RATING && value <= MAX_RATING;
}

function hasText(value: string | null | undefined): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Check final answers against the catalog for a relationship
 *
 * Every rating question needs an integer rating. A text question needs
 * non-blank text when it is required, or when `requireAllText` is set.
 */
export function validateAnswers(
  questions: readonly FeedbackQuestion[],
  answers: readonly Answer[],
  options: { readonly requireAllText: boolean }
): AnswerValidationResult {
  const known = new Set(questions.map((question) => question.id));
  const byQuestion = new Map(answers.map((answer) => [answer.questionId, answer]));

  const unknownQuestionIds = answers
    .map((answer) => answer.questionId)
    .filter((questionId) => !known.has(questionId));

  const missingQuestionIds = questions
    .filter((question) => {
      const answer = byQuestion.get(question.id);

      if (question.type === QuestionType.Rating) {
        return !isValidRating(answer?.rating);
      }

      const textRequired = question.isRequired || options.requireAllText;
      return textRequired && !hasText(answer?.text);
    })
    .map((question) => question.id);

  return {
    isValid: unknownQuestionIds.length === 0 && missingQuestionIds.length === 0,
    missingQuestionIds,
    unknownQuestionIds,
  };
}

/**
 * Check draft answers: partial is fine, but every id must be known and any
 * rating given must be in range
 *
 * @throws WorkflowError VALIDATION_ERROR
 */
export function assertDraftAnswers(questions: readonly FeedbackQuestion[], answers: readonly Answer[]): void {
  const known = new Set(questions.map((question) => question.id));

  const unknownQuestionIds = answers
    .map((answer) => answer.questionId)
    .filter((questionId) => !known.has(questionId));

  if (unknownQuestionIds.length > 0) {
    throw new WorkflowError(
      WorkflowErrorCode.ValidationError,
      'Answers refer to questions that are not part of this feedback form',
      { unknownQuestionIds }
    );
  }

  const invalidRatings = answers
    .filter((answer) => answer.rating !== undefined && answer.rating !== null && !isValidRating(answer.rating))
    .map((answer) => answer.questionId);

  if (invalidRatings.length > 0) {
    throw new WorkflowError(
      WorkflowErrorCode.ValidationError,
      `Ratings must be whole numbers from ${MIN_RATING} to ${MAX_RATING}`,
      { questionIds: invalidRatings }
    );
  }
}

export class QuestionService {
  /**
   * Active questions for a relationship category, in display order
   */
  async getQuestions(relationship: RelationshipCategory, client?: Queryable): Promise<FeedbackQuestion[]> {
    const rows = await selectRows<QuestionRecord>(
      client,
      `SELECT ${QUESTION_COLUMNS}
       FROM feedback_questions
       WHERE relationship = $1 AND is_active
       ORDER BY sort_order, question_text`,
      [relationship],
      { operation: 'get_questions' }
    );
    return rows.map(toQuestion);
  }

  /**
   * Whole active catalog
   */
  async listQuestions(correlationId?: string): Promise<ServiceOperationResult<FeedbackQuestion[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `list_questions_${Date.now()}`;

    try {
      const rows = await queryMany<QuestionRecord>(
        `SELECT ${QUESTION_COLUMNS}
         FROM feedback_questions
         WHERE is_active
         ORDER BY relationship, sort_order, question_text`,
        [],
        { correlationId: cid, operation: 'list_questions' }
      );
      return succeed(rows.map(toQuestion), startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'List questions', correlationId: cid });
    }
  }
}

export const questionService = new QuestionService();
