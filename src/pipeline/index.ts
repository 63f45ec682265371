export * from './IngestionService.js';
export * from './QuestionService.js';
