import { z } from 'zod';
import { BaseService } from './BaseService.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { QuestionnaireRepository } from '../../infra/db/repositories/QuestionnaireRepository.js';
import type { QuestionRepository } from '../../infra/db/repositories/QuestionRepository.js';
import type { QuestionnaireItemRepository } from '../../infra/db/repositories/QuestionnaireItemRepository.js';
import {
  QUESTIONNAIRE_SCOPES,
  QUESTIONNAIRE_TYPES,
  type Question,
  type Questionnaire,
  type QuestionnaireItem,
} from '../../domain/models/index.js';
import { ConflictError, NotFoundError } from '../../shared/errors/index.js';
import { parseInput } from '../../shared/utils/schema.js';
import { validateId } from '../../shared/utils/validation.js';

export const listQuestionnairesSchema = z.object({
  scope: z.enum(QUESTIONNAIRE_SCOPES).optional(),
  type: z.enum(QUESTIONNAIRE_TYPES).optional(),
});

export const createQuestionnaireSchema = z.object({
  name: z.string().trim().min(1).max(255),
  about: z.string().max(255).nullable().optional(),
  questionnaireType: z.enum(QUESTIONNAIRE_TYPES),
  questionnaireScope: z.enum(QUESTIONNAIRE_SCOPES).optional(),
  staffId: z.number().int().positive().nullable().optional(),
});

export type ListQuestionnairesInput = z.input<typeof listQuestionnairesSchema>;
export type CreateQuestionnaireInput = z.input<typeof createQuestionnaireSchema>;

export interface QuestionnaireList {
  count: number;
  results: Questionnaire[];
}

/**
 * Admin Questionnaire Service
 * Staff-facing management of questionnaires and their questions
 */
export class AdminQuestionnaireService extends BaseService {
  constructor(
    private readonly questionnaireRepository: QuestionnaireRepository,
    private readonly questionRepository: QuestionRepository,
    private readonly questionnaireItemRepository: QuestionnaireItemRepository,
    logger: Logger
  ) {
    super(logger);
  }

  /**
   * List questionnaires narrowed by scope, or else by type
   * When both are given only the scope applies
   */
  async listQuestionnaires(input: ListQuestionnairesInput = {}): Promise<QuestionnaireList> {
    const { scope, type } = parseInput(listQuestionnairesSchema, input, 'questionnaire filters');

    let results: Questionnaire[];
    if (scope) {
      results = await this.questionnaireRepository.listBy({ questionnaireScope: scope });
    } else if (type) {
      results = await this.questionnaireRepository.listBy({ questionnaireType: type });
    } else {
      results = await this.questionnaireRepository.getAll();
    }

    return { count: results.length, results };
  }

  async createQuestionnaire(input: CreateQuestionnaireInput): Promise<Questionnaire> {
    const data = parseInput(createQuestionnaireSchema, input, 'questionnaire');
    this.logStart('createQuestionnaire', { name: data.name });

    // Business rule: name must be unique
    const existing = await this.questionnaireRepository.findByName(data.name);
    if (existing) {
      this.logRejected('createQuestionnaire', 'duplicate name');
      throw new ConflictError(`Questionnaire with name "${data.name}" already exists`, {
        field: 'name',
        value: data.name,
      });
    }

    const questionnaire = await this.questionnaireRepository.create(data);

    this.logSuccess('createQuestionnaire', { id: questionnaire.id });
    return questionnaire;
  }

  /**
   * Attach a question at the given position, or after the last one
   */
  async addQuestion(
    questionnaireId: number,
    questionId: number,
    orderIndex?: number
  ): Promise<QuestionnaireItem> {
    this.logStart('addQuestion', { questionnaireId, questionId, orderIndex });

    const questionnaire = await this.requireQuestionnaire(questionnaireId);
    const question = await this.questionRepository.getById(questionId);
    if (!question) {
      throw new NotFoundError('Question', questionId);
    }

    const linked = await this.questionnaireItemRepository.exists({
      questionnaireId: questionnaire.id,
      questionId: question.id,
    });
    if (linked) {
      this.logRejected('addQuestion', 'question already linked');
      throw new ConflictError(
        `Question ${question.id} is already part of questionnaire ${questionnaire.id}`,
        { field: 'questionId', value: question.id }
      );
    }

    let position: number;
    if (orderIndex === undefined) {
      position = await this.questionnaireItemRepository.nextOrderIndex(questionnaire.id);
    } else {
      position = parseInput(z.number().int().min(0), orderIndex, 'order index');
      const taken = await this.questionnaireItemRepository.exists({
        questionnaireId: questionnaire.id,
        orderIndex: position,
      });
      if (taken) {
        this.logRejected('addQuestion', 'order index taken');
        throw new ConflictError(`Order index ${position} is already used`, {
          field: 'orderIndex',
          value: position,
        });
      }
    }

    const item = await this.questionnaireItemRepository.create({
      questionnaireId: questionnaire.id,
      questionId: question.id,
      orderIndex: position,
    });

    this.logSuccess('addQuestion', { id: item.id, orderIndex: position });
    return item;
  }

  /**
   * Questions of a questionnaire in display order
   */
  async listQuestions(questionnaireId: number): Promise<Question[]> {
    const questionnaire = await this.requireQuestionnaire(questionnaireId);
    const items = await this.questionnaireItemRepository.listForQuestionnaire(questionnaire.id);

    const questions: Question[] = [];
    for (const item of items) {
      const question = await this.questionRepository.getById(item.questionId);
      if (question) {
        questions.push(question);
      }
    }
    return questions;
  }

  private async requireQuestionnaire(questionnaireId: number): Promise<Questionnaire> {
    const id = validateId(questionnaireId);
    const questionnaire = await this.questionnaireRepository.getById(id);
    if (!questionnaire) {
      throw new NotFoundError('Questionnaire', id);
    }
    return questionnaire;
  }
}
