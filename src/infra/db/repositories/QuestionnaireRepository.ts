import { BaseRepository } from './BaseRepository.js';
import type { RepositoryOptions } from './types/repository.js';
import { sanitizeLogData } from '../../../shared/utils/logSanitizer.js';
import {
  QuestionnaireModel,
  type ModelDescriptor,
  type Questionnaire,
  type QuestionnaireFields,
  type QuestionnaireScope,
  type QuestionnaireType,
} from '../../../domain/models/index.js';
import type { Filters } from '../../../domain/repositories/index.js';

export class QuestionnaireRepository extends BaseRepository<Questionnaire, QuestionnaireFields> {
  constructor(
    options: RepositoryOptions = {},
    model: ModelDescriptor<Questionnaire, QuestionnaireFields> = QuestionnaireModel
  ) {
    super(model, options);
  }

  async findByName(name: string): Promise<Questionnaire | null> {
    return this.run(
      'Find by name',
      `Failed to find ${this.name} by name`,
      { name: sanitizeLogData(name) },
      () => this.manager.filterBy({ name }).first()
    );
  }

  /**
   * Every questionnaire of one scope or type, oldest first
   */
  async listBy(criteria: {
    questionnaireScope?: QuestionnaireScope;
    questionnaireType?: QuestionnaireType;
  }): Promise<Questionnaire[]> {
    const filters: Filters<QuestionnaireFields> = this.normalizeFilters(criteria);
    return this.run(
      'List',
      `Failed to list ${this.name} instances`,
      { filters: sanitizeLogData(filters) },
      () => this.manager.filterBy(filters).slice(0)
    );
  }
}
