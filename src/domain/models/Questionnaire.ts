import { z } from 'zod';
import { BaseModel } from './BaseModel.js';
import { ModelDescriptor } from './ModelDescriptor.js';

export const QUESTIONNAIRE_TYPES = ['regular', 'verification', 'mandatory'] as const;
export const QUESTIONNAIRE_SCOPES = ['draft', 'public', 'assigned'] as const;

export type QuestionnaireType = (typeof QUESTIONNAIRE_TYPES)[number];
export type QuestionnaireScope = (typeof QUESTIONNAIRE_SCOPES)[number];

export const questionnaireFieldsSchema = z.object({
  name: z.string().trim().min(1).max(255),
  about: z.string().max(255).nullable().default(null),
  questionnaireType: z.enum(QUESTIONNAIRE_TYPES),
  questionnaireScope: z.enum(QUESTIONNAIRE_SCOPES).default('draft'),
  staffId: z.number().int().positive().nullable().default(null),
  createdAt: z.coerce.date().default(() => new Date()),
});

export type QuestionnaireFields = z.output<typeof questionnaireFieldsSchema>;

/**
 * Questionnaire Domain Model
 * A form made of ordered questions
 */
export class Questionnaire extends BaseModel<QuestionnaireFields> {
  get name(): string {
    return this.data.name;
  }

  get about(): string | null {
    return this.data.about;
  }

  get questionnaireType(): QuestionnaireType {
    return this.data.questionnaireType;
  }

  get questionnaireScope(): QuestionnaireScope {
    return this.data.questionnaireScope;
  }

  get staffId(): number | null {
    return this.data.staffId;
  }

  get createdAt(): Date {
    return this.data.createdAt;
  }

  // Drafts are invisible to respondents
  isOpenForSubmissions(): boolean {
    return this.data.questionnaireScope !== 'draft';
  }

  toString(): string {
    return `${this.name} (Type: ${this.questionnaireType}, Scope: ${this.questionnaireScope})`;
  }
}

export const QuestionnaireModel = new ModelDescriptor<Questionnaire, QuestionnaireFields>(
  'Questionnaire',
  Questionnaire,
  (input) => questionnaireFieldsSchema.parse(input),
  'questionnaire'
);
