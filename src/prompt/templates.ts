export const FALLBACK_MARKER = 'NO RELEVANT INFORMATION';
export const PASSAGE_DELIMITER = '\n\n---\n\n';
export const EMPTY_HISTORY = 'No previous conversation.';

export interface RagTemplateInput {
  history: string;
  context: string;
  question: string;
}

export function renderRagPrompt({ history, context, question }: RagTemplateInput): string {
  return `You are an assistant specialised in analysing the content of YouTube videos. Answer the question precisely, in a structured and useful way, using only the context extracted from the video.

**Instructions:**
- Use ONLY the information in the video context below.
- If the context does not contain the information needed, say so explicitly instead of guessing.
- Organise the answer logically and keep it concise but complete.
- Quote specific parts of the context when asked to.

**Conversation so far:**
${history}

**Context extracted from the video:**
${context}

**Current question:**
${question}

**Answer:**
`;
}

export function renderFallbackPrompt(question: string): string {
  return `You are a helpful assistant. ${FALLBACK_MARKER} was found in the video transcript for this question.

Tell the user plainly that the transcript does not contain relevant information to answer it, and suggest asking something about the content of the video. Do not invent an answer.

Question: ${question}

Answer:
`;
}
