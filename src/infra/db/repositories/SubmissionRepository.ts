import { BaseRepository } from './BaseRepository.js';
import type { RepositoryOptions } from './types/repository.js';
import { sanitizeLogData } from '../../../shared/utils/logSanitizer.js';
import {
  SubmissionModel,
  type ModelDescriptor,
  type Submission,
  type SubmissionFields,
} from '../../../domain/models/index.js';

export class SubmissionRepository extends BaseRepository<Submission, SubmissionFields> {
  constructor(
    options: RepositoryOptions = {},
    model: ModelDescriptor<Submission, SubmissionFields> = SubmissionModel
  ) {
    super(model, options);
  }

  /**
   * A user's submission for one questionnaire, if any
   */
  async findForUser(userId: number, questionnaireId: number): Promise<Submission | null> {
    return this.run(
      'Find for user',
      `Failed to find ${this.name} for user`,
      { userId: sanitizeLogData(userId), questionnaireId: sanitizeLogData(questionnaireId) },
      () => this.manager.filterBy({ userId, questionnaireId }).first()
    );
  }
}
