import type { ChatMessage, ChatRole } from '@hemascope/shared/src/types/chat.types.js';

export interface AppendMessageInput {
  readonly role: ChatRole;
  readonly content: string;
  readonly modelId?: string;
}

export interface ChatHistoryRepository {
  appendMessage(sessionId: string, input: AppendMessageInput): Promise<ChatMessage>;
  /** The most recent `limit` messages of a session, oldest first. */
  listMessages(sessionId: string, limit?: number): Promise<readonly ChatMessage[]>;
}
