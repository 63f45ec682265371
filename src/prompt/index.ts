export * from './templates.js';
export { PromptAssembler, type AssembledPrompt, type PromptAssemblerOptions } from './PromptAssembler.js';
