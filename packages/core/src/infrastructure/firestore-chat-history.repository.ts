import type { Firestore, QueryDocumentSnapshot } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import { z } from 'zod';
import type { ChatMessage } from '@hemascope/shared/src/types/chat.types.js';
import { PersistenceError } from '@hemascope/shared/src/utils/errors.js';
import type { AppendMessageInput, ChatHistoryRepository } from '../repositories/chat-history.repository.js';

const SESSIONS_COLLECTION = 'sessions';
const MESSAGES_SUBCOLLECTION = 'messages';

const SessionCounterSchema = z.object({
  messageCount: z.number().int().nonnegative().default(0),
});

// `sequence` orders messages within a session; `createdAt` can tie.
const MessageDocumentSchema = z.object({
  sequence: z.number().int().positive(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  modelId: z.string().optional(),
  createdAt: z.instanceof(Timestamp),
});

type MessageDocument = z.infer<typeof MessageDocumentSchema>;

function messageFromDoc(sessionId: string, snapshot: QueryDocumentSnapshot): ChatMessage {
  const parsed = MessageDocumentSchema.safeParse(snapshot.data());
  if (!parsed.success) {
    throw new PersistenceError(
      `Malformed chat message ${snapshot.id} in session ${sessionId}: ${parsed.error.message}`,
    );
  }
  const data = parsed.data;
  return {
    id: snapshot.id,
    sessionId,
    role: data.role,
    content: data.content,
    ...(data.modelId !== undefined && { modelId: data.modelId }),
    createdAt: data.createdAt.toDate(),
  };
}

function toPersistenceError(action: string, error: unknown): PersistenceError {
  return new PersistenceError(
    `Failed to ${action}: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error : undefined,
  );
}

export function createFirestoreChatHistoryRepository(db: Firestore): ChatHistoryRepository {
  const sessionRef = (sessionId: string) => db.collection(SESSIONS_COLLECTION).doc(sessionId);
  const messagesRef = (sessionId: string) =>
    sessionRef(sessionId).collection(MESSAGES_SUBCOLLECTION);

  return {
    async appendMessage(sessionId: string, input: AppendMessageInput): Promise<ChatMessage> {
      const docRef = messagesRef(sessionId).doc();

      let docData: MessageDocument;
      try {
        docData = await db.runTransaction(async (tx) => {
          const session = await tx.get(sessionRef(sessionId));
          const counter = SessionCounterSchema.safeParse(session.data() ?? {});
          if (!counter.success) {
            throw new PersistenceError(
              `Malformed message counter in session ${sessionId}: ${counter.error.message}`,
            );
          }
          const data: MessageDocument = {
            sequence: counter.data.messageCount + 1,
            role: input.role,
            content: input.content,
            ...(input.modelId !== undefined && { modelId: input.modelId }),
            createdAt: Timestamp.now(),
          };
          tx.set(sessionRef(sessionId), { messageCount: data.sequence }, { merge: true });
          tx.set(docRef, data);
          return data;
        });
      } catch (error) {
        if (error instanceof PersistenceError) {
          throw error;
        }
        throw toPersistenceError(`append message to session ${sessionId}`, error);
      }

      return {
        id: docRef.id,
        sessionId,
        role: docData.role,
        content: docData.content,
        ...(docData.modelId !== undefined && { modelId: docData.modelId }),
        createdAt: docData.createdAt.toDate(),
      };
    },

    async listMessages(sessionId: string, limit?: number): Promise<readonly ChatMessage[]> {
      let query = messagesRef(sessionId).orderBy('sequence', 'desc');
      if (limit !== undefined) {
        query = query.limit(limit);
      }

      try {
        const snapshot = await query.get();
        return snapshot.docs.map((doc) => messageFromDoc(sessionId, doc)).reverse();
      } catch (error) {
        if (error instanceof PersistenceError) {
          throw error;
        }
        throw toPersistenceError(`list messages of session ${sessionId}`, error);
      }
    },
  };
}
