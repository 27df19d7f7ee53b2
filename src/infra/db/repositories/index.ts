export { BaseRepository, paginationResult } from './BaseRepository.js';
export { QuestionnaireRepository } from './QuestionnaireRepository.js';
export { QuestionRepository } from './QuestionRepository.js';
export { QuestionnaireItemRepository } from './QuestionnaireItemRepository.js';
export { SubmissionRepository } from './SubmissionRepository.js';
export type { RepositoryOptions, EntitySnapshot } from './types/repository.js';
