export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  readonly id: string;
  readonly sessionId: string;
  readonly role: ChatRole;
  readonly content: string;
  readonly modelId?: string;
  readonly createdAt: Date;
}

/** One user message and the assistant reply that followed it. */
export interface ContextExchange {
  readonly user: string;
  readonly assistant: string;
}
