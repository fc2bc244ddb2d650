import type { ChatMessage, ContextExchange } from '@hemascope/shared/src/types/chat.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import type { ChatHistoryRepository } from '../repositories/chat-history.repository.js';

const log = createChildLogger('session:prior-context');

const ELLIPSIS = '...';

export interface PriorContextConfig {
  readonly maxExchanges: number;
  readonly maxMessageChars: number;
}

export interface PriorContextResolver {
  /** Never rejects: a failing store yields no context. */
  resolve(sessionId: string): Promise<readonly ContextExchange[]>;
}

export function clipMessage(content: string, maxChars: number): string {
  if (content.length <= maxChars) {
    return content;
  }
  return `${content.slice(0, maxChars - ELLIPSIS.length)}${ELLIPSIS}`;
}

/** Pairs each assistant reply with the user message right before it, newest pairs kept. */
export function collectExchanges(
  messages: readonly ChatMessage[],
  config: PriorContextConfig,
): ContextExchange[] {
  const exchanges: ContextExchange[] = [];
  let index = messages.length - 1;

  while (index >= 1 && exchanges.length < config.maxExchanges) {
    const reply = messages[index];
    const question = messages[index - 1];
    if (reply?.role === 'assistant' && question?.role === 'user') {
      exchanges.push({
        user: clipMessage(question.content, config.maxMessageChars),
        assistant: clipMessage(reply.content, config.maxMessageChars),
      });
      index -= 2;
    } else {
      index -= 1;
    }
  }

  return exchanges.reverse();
}

export function createPriorContextResolver(
  repository: ChatHistoryRepository,
  config: PriorContextConfig,
): PriorContextResolver {
  return {
    async resolve(sessionId: string): Promise<readonly ContextExchange[]> {
      try {
        const messages = await repository.listMessages(sessionId, config.maxExchanges * 4);
        const exchanges = collectExchanges(messages, config);
        log.debug({ sessionId, exchanges: exchanges.length }, 'Resolved prior context');
        return exchanges;
      } catch (error) {
        log.warn(
          { sessionId, error: error instanceof Error ? error.message : String(error) },
          'Chat history unavailable, continuing without prior context',
        );
        return [];
      }
    },
  };
}
