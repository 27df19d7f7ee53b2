export { BaseService } from './BaseService.js';
export {
  AdminQuestionnaireService,
  createQuestionnaireSchema,
  listQuestionnairesSchema,
  type CreateQuestionnaireInput,
  type ListQuestionnairesInput,
  type QuestionnaireList,
} from './AdminQuestionnaireService.js';
export {
  SubmissionReviewService,
  SUBMISSION_TRANSITIONS,
  submitSchema,
  type SubmitInput,
} from './SubmissionReviewService.js';
