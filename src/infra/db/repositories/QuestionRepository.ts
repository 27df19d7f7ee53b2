import { BaseRepository } from './BaseRepository.js';
import type { RepositoryOptions } from './types/repository.js';
import { sanitizeLogData } from '../../../shared/utils/logSanitizer.js';
import {
  QuestionModel,
  type ModelDescriptor,
  type Question,
  type QuestionFields,
} from '../../../domain/models/index.js';

export class QuestionRepository extends BaseRepository<Question, QuestionFields> {
  constructor(
    options: RepositoryOptions = {},
    model: ModelDescriptor<Question, QuestionFields> = QuestionModel
  ) {
    super(model, options);
  }

  async findByReferenceCode(referenceCode: string): Promise<Question | null> {
    return this.run(
      'Find by reference code',
      `Failed to find ${this.name} by reference code`,
      { referenceCode: sanitizeLogData(referenceCode) },
      () => this.manager.filterBy({ referenceCode }).first()
    );
  }
}
