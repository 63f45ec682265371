export { AnswerSynthesizer, APOLOGY_MESSAGE, stripReasoning, type GenerateOptions } from './AnswerSynthesizer.js';
