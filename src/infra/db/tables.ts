import type { TableMapping } from './managers/KnexEntityManager.js';
import type {
  QuestionFields,
  QuestionnaireFields,
  QuestionnaireItemFields,
  SubmissionFields,
} from '../../domain/models/index.js';

/**
 * Table layouts for each model
 */

export const questionnairesTable: TableMapping<QuestionnaireFields> = {
  tableName: 'questionnaires',
  columns: {
    name: 'name',
    about: 'about',
    questionnaireType: 'questionnaire_type',
    questionnaireScope: 'questionnaire_scope',
    staffId: 'staff_id',
    createdAt: 'created_at',
  },
};

export const questionsTable: TableMapping<QuestionFields> = {
  tableName: 'questions',
  columns: {
    questionType: 'question_type',
    referenceCode: 'reference_code',
    text: 'text',
    validationRules: 'validation_rules',
    staffId: 'staff_id',
    createdAt: 'created_at',
  },
  jsonFields: ['validationRules'],
};

export const questionnaireItemsTable: TableMapping<QuestionnaireItemFields> = {
  tableName: 'questionnaire_items',
  columns: {
    questionnaireId: 'questionnaire_id',
    questionId: 'question_id',
    orderIndex: 'order_index',
  },
};

export const submissionsTable: TableMapping<SubmissionFields> = {
  tableName: 'submissions',
  columns: {
    submissionStatus: 'submission_status',
    questionnaireId: 'questionnaire_id',
    questionnaireType: 'questionnaire_type',
    questionnaireScope: 'questionnaire_scope',
    userId: 'user_id',
    payload: 'payload',
    isFailed: 'is_failed',
    isOrphan: 'is_orphan',
    staffId: 'staff_id',
    submittedAt: 'submitted_at',
    patchedAt: 'patched_at',
  },
  jsonFields: ['payload'],
};
