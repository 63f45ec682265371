import { z } from 'zod';

export const TURN_ROLES = ['user', 'assistant'] as const;
export type TurnRole = typeof TURN_ROLES[number];

export const ConversationTurnSchema = z.object({
  role: z.enum(TURN_ROLES),
  content: z.string(),
  timestamp: z.string()
});
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export const ConversationSchema = z.object({
  sessionId: z.string().min(1),
  videoId: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
  metadata: z.record(z.unknown()),
  turns: z.array(ConversationTurnSchema)
});
export type Conversation = z.infer<typeof ConversationSchema>;

export function turn(role: TurnRole, content: string, at: Date = new Date()): ConversationTurn {
  return { role, content, timestamp: at.toISOString() };
}
