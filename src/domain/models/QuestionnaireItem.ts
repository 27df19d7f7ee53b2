import { z } from 'zod';
import { BaseModel } from './BaseModel.js';
import { ModelDescriptor } from './ModelDescriptor.js';

export const questionnaireItemFieldsSchema = z.object({
  questionnaireId: z.number().int().positive(),
  questionId: z.number().int().positive(),
  orderIndex: z.number().int().min(0),
});

export type QuestionnaireItemFields = z.output<typeof questionnaireItemFieldsSchema>;

/**
 * Position of a question within a questionnaire
 */
export class QuestionnaireItem extends BaseModel<QuestionnaireItemFields> {
  get questionnaireId(): number {
    return this.data.questionnaireId;
  }

  get questionId(): number {
    return this.data.questionId;
  }

  get orderIndex(): number {
    return this.data.orderIndex;
  }

  toString(): string {
    return `${this.questionnaireId} – ${this.questionId} @ ${this.orderIndex}`;
  }
}

export const QuestionnaireItemModel = new ModelDescriptor<QuestionnaireItem, QuestionnaireItemFields>(
  'QuestionnaireItem',
  QuestionnaireItem,
  (input) => questionnaireItemFieldsSchema.parse(input),
  'questionnaire'
);
