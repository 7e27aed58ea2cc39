/**
 * Question Service Unit Tests
 *
 * @module tests/unit/services/question.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/db/index.js', () => ({
  queryMany: vi.fn(),
}));

import { queryMany } from '../../../src/db/index.js';
import {
  QuestionService,
  assertDraftAnswers,
  isValidRating,
  validateAnswers,
} from '../../../src/services/question.service.js';
import { WorkflowError, WorkflowErrorCode } from '../../../src/types/errors.js';
import { RelationshipCategory } from '../../../src/types/feedback.js';
import { QuestionType, type FeedbackQuestion } from '../../../src/types/question.js';

const questions: FeedbackQuestion[] = [
  {
    id: 'q1',
    text: 'How well do they collaborate?',
    type: QuestionType.Rating,
    relationship: RelationshipCategory.Peer,
    isRequired: true,
    sortOrder: 1,
  },
  {
    id: 'q2',
    text: 'What should they keep doing?',
    type: QuestionType.Text,
    relationship: RelationshipCategory.Peer,
    isRequired: true,
    sortOrder: 2,
  },
  {
    id: 'q3',
    text: 'Anything else?',
    type: QuestionType.Text,
    relationship: RelationshipCategory.Peer,
    isRequired: false,
    sortOrder: 3,
  },
];

describe('isValidRating', () => {
  it('should accept whole numbers from 1 to 5', () => {
    expect([1, 3, 5].every(isValidRating)).toBe(true);
  });

  it('should reject everything else', () => {
    expect([0, 6, 2.5, '4', null, undefined, Number.NaN].some(isValidRating)).toBe(false);
  });
});

describe('validateAnswers', () => {
  it('should pass when every required question is answered', () => {
    const result = validateAnswers(
      questions,
      [
        { questionId: 'q1', rating: 4 },
        { questionId: 'q2', text: 'Clear code reviews' },
      ],
      { requireAllText: false }
    );

    expect(result).toEqual({ isValid: true, missingQuestionIds: [], unknownQuestionIds: [] });
  });

  it('should treat blank text and an out-of-range rating as missing', () => {
    const result = validateAnswers(
      questions,
      [
        { questionId: 'q1', rating: 7 },
        { questionId: 'q2', text: '   ' },
      ],
      { requireAllText: false }
    );

    expect(result.isValid).toBe(false);
    expect(result.missingQuestionIds).toEqual(['q1', 'q2']);
  });

  it('should require optional text questions when asked to', () => {
    const result = validateAnswers(
      questions,
      [
        { questionId: 'q1', rating: 4 },
        { questionId: 'q2', text: 'Clear code reviews' },
      ],
      { requireAllText: true }
    );

    expect(result.missingQuestionIds).toEqual(['q3']);
  });

  it('should report answers to questions outside the catalog', () => {
    const result = validateAnswers(
      questions,
      [
        { questionId: 'q1', rating: 4 },
        { questionId: 'q2', text: 'Clear code reviews' },
        { questionId: 'q9', text: 'Stray' },
      ],
      { requireAllText: false }
    );

    expect(result.isValid).toBe(false);
    expect(result.unknownQuestionIds).toEqual(['q9']);
  });
});

describe('assertDraftAnswers', () => {
  it('should accept partial drafts', () => {
    expect(() => assertDraftAnswers(questions, [{ questionId: 'q2', text: 'Half a thought' }])).not.toThrow();
    expect(() => assertDraftAnswers(questions, [{ questionId: 'q1', rating: null }])).not.toThrow();
  });

  it('should reject unknown question ids', () => {
    try {
      assertDraftAnswers(questions, [{ questionId: 'q9', text: 'Stray' }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(WorkflowError);
      expect(error).toMatchObject({
        code: WorkflowErrorCode.ValidationError,
        details: { unknownQuestionIds: ['q9'] },
      });
    }
  });

  it('should reject a rating outside the scale', () => {
    expect(() => assertDraftAnswers(questions, [{ questionId: 'q1', rating: 0 }])).toThrow(
      'Ratings must be whole numbers from 1 to 5'
    );
  });
});

describe('QuestionService', () => {
  let service: QuestionService;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    service = new QuestionService();
  });

  it('should map catalog rows for a relationship', async () => {
    vi.mocked(queryMany).mockResolvedValue([
      {
        id: 'q1',
        question_text: 'How well do they collaborate?',
        question_type: 'RATING',
        relationship: 'PEER',
        is_required: true,
        sort_order: 1,
      },
    ]);

    const result = await service.getQuestions(RelationshipCategory.Peer);

    expect(result).toEqual([questions[0]]);
    expect(vi.mocked(queryMany).mock.calls[0]?.[1]).toEqual(['PEER']);
  });

  it('should fail listing on an unknown question type', async () => {
    vi.mocked(queryMany).mockResolvedValue([
      {
        id: 'q1',
        question_text: 'Odd',
        question_type: 'SLIDER',
        relationship: 'PEER',
        is_required: true,
        sort_order: 1,
      },
    ]);

    const result = await service.listQuestions();

    expect(result).toMatchObject({ success: false, errorCode: 'INTERNAL_ERROR', error: 'An unexpected error occurred' });
    expect(console.error).toHaveBeenCalledWith(
      '[QUESTION_SERVICE] List questions failed:',
      expect.objectContaining({ error: 'Unknown question type in database: SLIDER' })
    );
  });
});
