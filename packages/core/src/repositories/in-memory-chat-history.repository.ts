import { randomUUID } from 'node:crypto';
import type { ChatMessage } from '@hemascope/shared/src/types/chat.types.js';
import type { AppendMessageInput, ChatHistoryRepository } from './chat-history.repository.js';

export function createInMemoryChatHistoryRepository(): ChatHistoryRepository {
  const messages = new Map<string, ChatMessage[]>();

  return {
    appendMessage(sessionId: string, input: AppendMessageInput): Promise<ChatMessage> {
      const message: ChatMessage = {
        id: randomUUID(),
        sessionId,
        role: input.role,
        content: input.content,
        ...(input.modelId !== undefined && { modelId: input.modelId }),
        createdAt: new Date(),
      };
      const sessionMessages = messages.get(sessionId) ?? [];
      sessionMessages.push(message);
      messages.set(sessionId, sessionMessages);
      return Promise.resolve(message);
    },

    listMessages(sessionId: string, limit?: number): Promise<readonly ChatMessage[]> {
      const sessionMessages = messages.get(sessionId) ?? [];
      const start = limit === undefined ? 0 : Math.max(0, sessionMessages.length - limit);
      return Promise.resolve(sessionMessages.slice(start));
    },
  };
}
