export * from './types.js';
export { extractVideoId } from './videoId.js';
export { FileTranscriptSource } from './FileTranscriptSource.js';
export { fetchTranscript, transcriptToText } from './fetchTranscript.js';
