export * from './types.js';
export { AiSdkCompletionClient, classifyError } from './client.js';
