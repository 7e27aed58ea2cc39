/**
 * Question catalog and answer type definitions
 *
 * @module types/question
 */

import { type RelationshipCategory, type WorkflowState } from './feedback.js';

/**
 * Question answer type
 */
export enum QuestionType {
  /**
   * Integer rating from 1 to 5
   */
  Rating = 'RATING',

  /**
   * Free text
   */
  Text = 'TEXT',
}

/**
 * Lowest accepted rating
 */
export const MIN_RATING = 1;

/**
 * Highest accepted rating
 */
export const MAX_RATING = 5;

/**
 * Catalog question
 */
export interface FeedbackQuestion {
  readonly id: string;
  readonly text: string;
  readonly type: QuestionType;
  readonly relationship: RelationshipCategory;
  readonly isRequired: boolean;
  readonly sortOrder: number;
}

/**
 * Answer to one question, as submitted or saved as a draft
 */
export interface Answer {
  readonly questionId: string;
  readonly rating?: number | null;
  readonly text?: string | null;
}

/**
 * Saved draft answer
 */
export interface DraftAnswer {
  readonly questionId: string;
  readonly rating: number | null;
  readonly text: string | null;
  readonly savedAt: Date;
}

/**
 * Result of checking answers against the catalog
 */
export interface AnswerValidationResult {
  readonly isValid: boolean;

  /**
   * Required questions without an acceptable answer
   */
  readonly missingQuestionIds: readonly string[];

  /**
   * Answered question ids that are not in the catalog for the relationship
   */
  readonly unknownQuestionIds: readonly string[];
}

/**
 * One answered question inside received feedback
 */
export interface ReceivedAnswer {
  readonly questionText: string;
  readonly type: QuestionType;
  readonly rating: number | null;
  readonly text: string | null;
}

/**
 * Completed feedback as shown to the requester, without reviewer identity
 */
export interface ReceivedFeedback {
  readonly requestId: string;
  readonly relationship: RelationshipCategory;
  readonly completedAt: Date;
  readonly answers: readonly ReceivedAnswer[];
}

/**
 * Questions of a request together with any saved draft
 */
export interface FeedbackForm {
  readonly requestId: string;
  readonly relationship: RelationshipCategory;
  readonly state: WorkflowState;
  readonly questions: readonly FeedbackQuestion[];
  readonly draft: readonly DraftAnswer[];
}

/**
 * Type guard for QuestionType
 */
export function isQuestionType(value: unknown): value is QuestionType {
  return (
    typeof value === 'string' &&
    Object.values<string>(QuestionType).includes(value)
  );
}
