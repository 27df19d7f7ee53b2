import { z } from 'zod';
import { BaseModel } from './BaseModel.js';
import { ModelDescriptor } from './ModelDescriptor.js';
import { QUESTIONNAIRE_TYPES, type QuestionnaireType } from './Questionnaire.js';

export const SUBMISSION_STATUSES = [
  'submitted',
  'completed',
  'failed',
  'pending',
  'approved',
  'rejected',
] as const;

export const SUBMISSION_SCOPES = ['public', 'assigned'] as const;

export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];
export type SubmissionScope = (typeof SUBMISSION_SCOPES)[number];

// Drivers without a boolean type hand back 0/1
const booleanish = z.union([z.boolean(), z.number()]).transform((value) => Boolean(value));

export const submissionFieldsSchema = z.object({
  submissionStatus: z.enum(SUBMISSION_STATUSES).default('submitted'),
  questionnaireId: z.number().int().positive().nullable(),
  questionnaireType: z.enum(QUESTIONNAIRE_TYPES),
  questionnaireScope: z.enum(SUBMISSION_SCOPES),
  userId: z.number().int().positive().nullable(),
  payload: z.record(z.string(), z.unknown()).default(() => ({})),
  isFailed: booleanish.default(false),
  isOrphan: booleanish.default(false),
  staffId: z.number().int().positive().nullable().default(null),
  submittedAt: z.coerce.date().default(() => new Date()),
  patchedAt: z.coerce.date().default(() => new Date()),
});

export type SubmissionFields = z.output<typeof submissionFieldsSchema>;

/**
 * Submission Domain Model
 * A user's answers to one questionnaire, moving through review
 */
export class Submission extends BaseModel<SubmissionFields> {
  get submissionStatus(): SubmissionStatus {
    return this.data.submissionStatus;
  }

  get questionnaireId(): number | null {
    return this.data.questionnaireId;
  }

  get questionnaireType(): QuestionnaireType {
    return this.data.questionnaireType;
  }

  get questionnaireScope(): SubmissionScope {
    return this.data.questionnaireScope;
  }

  get userId(): number | null {
    return this.data.userId;
  }

  get payload(): Record<string, unknown> {
    return this.data.payload;
  }

  get isFailed(): boolean {
    return this.data.isFailed;
  }

  get isOrphan(): boolean {
    return this.data.isOrphan;
  }

  get staffId(): number | null {
    return this.data.staffId;
  }

  get submittedAt(): Date {
    return this.data.submittedAt;
  }

  get patchedAt(): Date {
    return this.data.patchedAt;
  }

  /**
   * Short, log-safe view of the first answer
   */
  responseSummary(): string {
    const [first] = Object.values(this.data.payload);
    const text = first === undefined ? '' : typeof first === 'string' ? first : JSON.stringify(first);
    return text.slice(0, 100);
  }

  toString(): string {
    return `Submission#${this.id}. Type: ${this.questionnaireType}. submission_status: ${this.submissionStatus}`;
  }
}

export const SubmissionModel = new ModelDescriptor<Submission, SubmissionFields>(
  'Submission',
  Submission,
  (input) => submissionFieldsSchema.parse(input),
  'submission'
);
