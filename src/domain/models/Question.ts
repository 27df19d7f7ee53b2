import { z } from 'zod';
import { BaseModel } from './BaseModel.js';
import { ModelDescriptor } from './ModelDescriptor.js';

export const QUESTION_TYPES = [
  'text',
  'checkbox',
  'dropdown',
  'file',
  'date',
  'number',
  'boolean',
  'url',
  'multiple_choice',
  'rating',
  'datetime',
  'time',
  'paragraph',
  'slider',
  'signature',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export const questionFieldsSchema = z.object({
  questionType: z.enum(QUESTION_TYPES),
  referenceCode: z.string().trim().min(1).max(50),
  text: z.string().min(1).max(255),
  validationRules: z.record(z.string(), z.unknown()).default(() => ({})),
  staffId: z.number().int().positive().nullable().default(null),
  createdAt: z.coerce.date().default(() => new Date()),
});

export type QuestionFields = z.output<typeof questionFieldsSchema>;

/**
 * Question Domain Model
 * A reusable question that can appear in many questionnaires
 */
export class Question extends BaseModel<QuestionFields> {
  get questionType(): QuestionType {
    return this.data.questionType;
  }

  get referenceCode(): string {
    return this.data.referenceCode;
  }

  get text(): string {
    return this.data.text;
  }

  get validationRules(): Record<string, unknown> {
    return this.data.validationRules;
  }

  get staffId(): number | null {
    return this.data.staffId;
  }

  get createdAt(): Date {
    return this.data.createdAt;
  }

  toString(): string {
    return `Question [${this.referenceCode}] (${this.questionType})`;
  }
}

export const QuestionModel = new ModelDescriptor<Question, QuestionFields>(
  'Question',
  Question,
  (input) => questionFieldsSchema.parse(input),
  'questionnaire'
);
