import { describe, it, expect, beforeEach } from 'vitest';
import { registerDependencies } from '../../src/container.js';
import { MemoryCacheStore } from '../../src/infra/cache/MemoryCacheStore.js';
import { InMemoryEntityManager } from '../../src/infra/db/managers/InMemoryEntityManager.js';
import {
  QuestionModel,
  QuestionnaireItemModel,
  QuestionnaireModel,
  SubmissionModel,
} from '../../src/domain/models/index.js';
import type { AdminQuestionnaireService } from '../../src/application/services/AdminQuestionnaireService.js';
import type { SubmissionReviewService } from '../../src/application/services/SubmissionReviewService.js';
import type { QuestionRepository } from '../../src/infra/db/repositories/QuestionRepository.js';
import {
  BusinessRuleError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../../src/shared/errors/index.js';

let admin: AdminQuestionnaireService;
let review: SubmissionReviewService;
let questionRepository: QuestionRepository;

beforeEach(() => {
  QuestionnaireModel.bindManager(new InMemoryEntityManager(QuestionnaireModel));
  QuestionModel.bindManager(new InMemoryEntityManager(QuestionModel));
  QuestionnaireItemModel.bindManager(new InMemoryEntityManager(QuestionnaireItemModel));
  SubmissionModel.bindManager(new InMemoryEntityManager(SubmissionModel));

  const container = registerDependencies({ cacheStore: new MemoryCacheStore(), cacheEnabled: true });
  admin = container.resolve('adminQuestionnaireService');
  review = container.resolve('submissionReviewService');
  questionRepository = container.resolve('questionRepository');
});

const addQuestion = (referenceCode: string) =>
  questionRepository.create({ questionType: 'text', referenceCode, text: `About ${referenceCode}` });

describe('AdminQuestionnaireService', () => {
  describe('createQuestionnaire', () => {
    it('should create a draft with defaults', async () => {
      const questionnaire = await admin.createQuestionnaire({
        name: 'KYC Basic',
        questionnaireType: 'verification',
      });

      expect(questionnaire.id).toBe(1);
      expect(questionnaire.questionnaireScope).toBe('draft');
      expect(questionnaire.about).toBeNull();
      expect(questionnaire.isOpenForSubmissions()).toBe(false);
    });

    it('should reject duplicate names', async () => {
      await admin.createQuestionnaire({ name: 'KYC Basic', questionnaireType: 'verification' });

      const attempt = admin.createQuestionnaire({ name: 'KYC Basic', questionnaireType: 'regular' });
      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(
        admin.createQuestionnaire({ name: 'KYC Basic', questionnaireType: 'regular' })
      ).rejects.toThrow('Questionnaire with name "KYC Basic" already exists');
    });

    it('should validate input', async () => {
      const error = await admin
        .createQuestionnaire({ name: ' ', questionnaireType: 'verification' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Invalid questionnaire');
        expect(error.details).toEqual([
          { field: 'name', constraint: expect.any(String) },
        ]);
      }
    });
  });

  describe('listQuestionnaires', () => {
    beforeEach(async () => {
      await admin.createQuestionnaire({
        name: 'A',
        questionnaireType: 'regular',
        questionnaireScope: 'public',
      });
      await admin.createQuestionnaire({
        name: 'B',
        questionnaireType: 'verification',
        questionnaireScope: 'public',
      });
      await admin.createQuestionnaire({ name: 'C', questionnaireType: 'verification' });
    });

    it('should list everything without filters', async () => {
      const list = await admin.listQuestionnaires();

      expect(list.count).toBe(3);
      expect(list.results.map((q) => q.name)).toEqual(['A', 'B', 'C']);
    });

    it('should filter by scope or type', async () => {
      expect((await admin.listQuestionnaires({ scope: 'public' })).results.map((q) => q.name)).toEqual([
        'A',
        'B',
      ]);
      expect(
        (await admin.listQuestionnaires({ type: 'verification' })).results.map((q) => q.name)
      ).toEqual(['B', 'C']);
    });

    it('should let scope win over type', async () => {
      const list = await admin.listQuestionnaires({ scope: 'draft', type: 'regular' });

      expect(list).toMatchObject({ count: 1 });
      expect(list.results.map((q) => q.name)).toEqual(['C']);
    });
  });

  describe('addQuestion', () => {
    beforeEach(async () => {
      await admin.createQuestionnaire({ name: 'KYC', questionnaireType: 'verification' });
      await addQuestion('full_name');
      await addQuestion('birth_date');
      await addQuestion('address');
    });

    it('should append at the next free position', async () => {
      const first = await admin.addQuestion(1, 1);
      const second = await admin.addQuestion(1, 2);

      expect(first.orderIndex).toBe(0);
      expect(second.orderIndex).toBe(1);
    });

    it('should reject a question already linked', async () => {
      await admin.addQuestion(1, 1);

      await expect(admin.addQuestion(1, 1)).rejects.toThrow(
        'Question 1 is already part of questionnaire 1'
      );
    });

    it('should reject a taken position', async () => {
      await admin.addQuestion(1, 1, 0);

      await expect(admin.addQuestion(1, 2, 0)).rejects.toThrow('Order index 0 is already used');
    });

    it('should require both sides to exist', async () => {
      await expect(admin.addQuestion(5, 1)).rejects.toBeInstanceOf(NotFoundError);
      await expect(admin.addQuestion(1, 99)).rejects.toThrow("Question with ID '99' not found");
    });

    it('should list questions in display order', async () => {
      await admin.addQuestion(1, 2, 5);
      await admin.addQuestion(1, 3, 2);
      await admin.addQuestion(1, 1);

      const questions = await admin.listQuestions(1);

      expect(questions.map((q) => q.referenceCode)).toEqual(['address', 'birth_date', 'full_name']);
    });
  });
});

describe('SubmissionReviewService', () => {
  beforeEach(async () => {
    await admin.createQuestionnaire({ name: 'Draft', questionnaireType: 'regular' });
    await admin.createQuestionnaire({
      name: 'Open',
      questionnaireType: 'verification',
      questionnaireScope: 'public',
    });
  });

  const submit = (userId = 7) =>
    review.submit({ questionnaireId: 2, userId, payload: { full_name: 'Test User' } });

  describe('submit', () => {
    it('should copy type and scope from the questionnaire', async () => {
      const submission = await submit();

      expect(submission.submissionStatus).toBe('submitted');
      expect(submission.questionnaireType).toBe('verification');
      expect(submission.questionnaireScope).toBe('public');
      expect(submission.responseSummary()).toBe('Test User');
    });

    it('should refuse drafts', async () => {
      await expect(
        review.submit({ questionnaireId: 1, userId: 7, payload: {} })
      ).rejects.toBeInstanceOf(BusinessRuleError);
    });

    it('should accept one submission per user', async () => {
      await submit();

      await expect(submit()).rejects.toThrow('User 7 has already submitted questionnaire 2');
      expect((await submit(8)).id).toBe(2);
    });

    it('should require the questionnaire', async () => {
      await expect(
        review.submit({ questionnaireId: 9, userId: 7, payload: {} })
      ).rejects.toThrow("Questionnaire with ID '9' not found");
    });
  });

  describe('transition', () => {
    it('should walk the review path', async () => {
      const submission = await submit();

      expect((await review.transition(submission.id, 'pending')).submissionStatus).toBe('pending');

      const approved = await review.approve(submission.id, 3);
      expect(approved.submissionStatus).toBe('approved');
      expect(approved.staffId).toBe(3);

      expect((await review.transition(submission.id, 'completed')).submissionStatus).toBe(
        'completed'
      );
    });

    it('should refuse moves outside the workflow', async () => {
      const submission = await submit();
      await review.transition(submission.id, 'pending');

      await expect(review.transition(submission.id, 'completed')).rejects.toThrow(
        "Cannot move submission from 'pending' to 'completed'"
      );
      await review.reject(submission.id);
      await expect(review.approve(submission.id)).rejects.toBeInstanceOf(BusinessRuleError);
    });

    it('should flag failures and clear the flag on resubmission', async () => {
      const submission = await submit();

      const failed = await review.transition(submission.id, 'failed');
      expect(failed.isFailed).toBe(true);

      const resubmitted = await review.transition(submission.id, 'submitted');
      expect(resubmitted.isFailed).toBe(false);
    });

    it('should report unknown submissions', async () => {
      await expect(review.transition(99, 'pending')).rejects.toThrow(
        "Submission with ID '99' not found"
      );
    });
  });

  it('should page submissions by status', async () => {
    const first = await submit(7);
    await submit(8);
    await submit(9);
    await review.transition(first.id, 'pending');

    const page = await review.listByStatus('submitted', 1, 1);

    expect(page.totalCount).toBe(2);
    expect(page.totalPages).toBe(2);
    expect(page.entities.map((s) => s.userId)).toEqual([8]);
  });
});
