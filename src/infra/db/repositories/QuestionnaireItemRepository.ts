import { BaseRepository } from './BaseRepository.js';
import type { RepositoryOptions } from './types/repository.js';
import { sanitizeLogData } from '../../../shared/utils/logSanitizer.js';
import {
  QuestionnaireItemModel,
  type ModelDescriptor,
  type QuestionnaireItem,
  type QuestionnaireItemFields,
} from '../../../domain/models/index.js';

export class QuestionnaireItemRepository extends BaseRepository<
  QuestionnaireItem,
  QuestionnaireItemFields
> {
  constructor(
    options: RepositoryOptions = {},
    model: ModelDescriptor<QuestionnaireItem, QuestionnaireItemFields> = QuestionnaireItemModel
  ) {
    super(model, options);
  }

  /**
   * Items of one questionnaire in display order
   */
  async listForQuestionnaire(questionnaireId: number): Promise<QuestionnaireItem[]> {
    const items = await this.run(
      'List for questionnaire',
      `Failed to list ${this.name} instances for questionnaire ID=${questionnaireId}`,
      { questionnaireId: sanitizeLogData(questionnaireId) },
      () => this.manager.filterBy({ questionnaireId }).slice(0)
    );
    return items.sort((a, b) => a.orderIndex - b.orderIndex || a.id - b.id);
  }

  /**
   * First free position after the last item; 0 for an empty questionnaire
   */
  async nextOrderIndex(questionnaireId: number): Promise<number> {
    const items = await this.listForQuestionnaire(questionnaireId);
    const last = items[items.length - 1];
    return last ? last.orderIndex + 1 : 0;
  }
}
