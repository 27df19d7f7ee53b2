import { z } from 'zod';
import { BaseService } from './BaseService.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { QuestionnaireRepository } from '../../infra/db/repositories/QuestionnaireRepository.js';
import type { SubmissionRepository } from '../../infra/db/repositories/SubmissionRepository.js';
import {
  SUBMISSION_STATUSES,
  type Submission,
  type SubmissionFields,
  type SubmissionStatus,
} from '../../domain/models/index.js';
import type { PaginationResult } from '../../domain/repositories/index.js';
import { BusinessRuleError, ConflictError, NotFoundError } from '../../shared/errors/index.js';
import { parseInput } from '../../shared/utils/schema.js';
import { validateId } from '../../shared/utils/validation.js';

export const submitSchema = z.object({
  questionnaireId: z.number().int().positive(),
  userId: z.number().int().positive(),
  payload: z.record(z.string(), z.unknown()),
});

export type SubmitInput = z.input<typeof submitSchema>;

/**
 * Moves a review may make from each status
 */
export const SUBMISSION_TRANSITIONS: Readonly<Record<SubmissionStatus, readonly SubmissionStatus[]>> =
  {
    submitted: ['pending', 'approved', 'rejected', 'failed'],
    pending: ['approved', 'rejected', 'failed'],
    approved: ['completed'],
    failed: ['submitted'],
    completed: [],
    rejected: [],
  };

/**
 * Submission Review Service
 * Accepts answers and walks submissions through review
 */
export class SubmissionReviewService extends BaseService {
  constructor(
    private readonly submissionRepository: SubmissionRepository,
    private readonly questionnaireRepository: QuestionnaireRepository,
    logger: Logger
  ) {
    super(logger);
  }

  /**
   * Record a user's answers to an open questionnaire
   */
  async submit(input: SubmitInput): Promise<Submission> {
    const data = parseInput(submitSchema, input, 'submission');
    this.logStart('submit', { questionnaireId: data.questionnaireId, userId: data.userId });

    const questionnaire = await this.questionnaireRepository.getById(data.questionnaireId);
    if (!questionnaire) {
      throw new NotFoundError('Questionnaire', data.questionnaireId);
    }

    const scope = questionnaire.questionnaireScope;
    if (scope === 'draft') {
      this.logRejected('submit', 'questionnaire is a draft');
      throw new BusinessRuleError(`Questionnaire ${questionnaire.id} is not open for submissions`, {
        field: 'questionnaireId',
        value: questionnaire.id,
      });
    }

    // Business rule: one submission per user and questionnaire
    const existing = await this.submissionRepository.findForUser(data.userId, questionnaire.id);
    if (existing) {
      this.logRejected('submit', 'already submitted');
      throw new ConflictError(
        `User ${data.userId} has already submitted questionnaire ${questionnaire.id}`,
        { field: 'userId', value: data.userId }
      );
    }

    const submission = await this.submissionRepository.create({
      submissionStatus: 'submitted',
      questionnaireId: questionnaire.id,
      questionnaireType: questionnaire.questionnaireType,
      questionnaireScope: scope,
      userId: data.userId,
      payload: data.payload,
    });

    this.logSuccess('submit', { id: submission.id });
    return submission;
  }

  /**
   * Move a submission to a new status
   */
  async transition(
    submissionId: number,
    status: SubmissionStatus,
    staffId?: number
  ): Promise<Submission> {
    const id = validateId(submissionId);
    const target = parseInput(z.enum(SUBMISSION_STATUSES), status, 'submission status');
    this.logStart('transition', { id, status: target, staffId });

    const submission = await this.submissionRepository.getById(id);
    if (!submission) {
      throw new NotFoundError('Submission', id);
    }

    const current = submission.submissionStatus;
    if (!SUBMISSION_TRANSITIONS[current].includes(target)) {
      this.logRejected('transition', `${current} -> ${target}`);
      throw new BusinessRuleError(`Cannot move submission from '${current}' to '${target}'`, {
        field: 'submissionStatus',
        value: target,
      });
    }

    const fields: Partial<SubmissionFields> = {
      submissionStatus: target,
      isFailed: target === 'failed',
      patchedAt: new Date(),
    };
    if (staffId !== undefined) {
      fields.staffId = validateId(staffId);
    }

    const updated = await this.submissionRepository.update(id, fields);
    if (!updated) {
      throw new NotFoundError('Submission', id);
    }

    this.logSuccess('transition', { id, from: current, to: target });
    return updated;
  }

  approve(submissionId: number, staffId?: number): Promise<Submission> {
    return this.transition(submissionId, 'approved', staffId);
  }

  reject(submissionId: number, staffId?: number): Promise<Submission> {
    return this.transition(submissionId, 'rejected', staffId);
  }

  listByStatus(
    status: SubmissionStatus,
    page = 1,
    perPage = 20
  ): Promise<PaginationResult<Submission>> {
    return this.submissionRepository.paginate(page, perPage, { submissionStatus: status });
  }
}
