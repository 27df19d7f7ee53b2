export { BaseModel, type ModelClass } from './BaseModel.js';
export { ModelDescriptor } from './ModelDescriptor.js';
export * from './Questionnaire.js';
export * from './Question.js';
export * from './QuestionnaireItem.js';
export * from './Submission.js';
