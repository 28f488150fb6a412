import type { IDocumentStore, StoreHandle } from '../../core/interfaces/IDocumentStore.js';
import type { Conversation, Message, MessageRole } from '../../core/entities/Conversation.js';
import type { CreateConversationInput } from '../../core/validation.js';
import {
  ConversationNotFoundError,
  InvalidIdentifierError,
  StoreUnavailableError,
} from '../../core/errors.js';
import { generateReply } from '../../core/reply/index.js';

export const CONVERSATION_LIST_LIMIT = 100;

export interface StoreDiagnostics {
  status: 'connected' | 'unavailable' | 'error';
  location: string | null;
  collections: string[];
  documentCounts: Record<string, number>;
  sizeBytes: number | null;
  error: string | null;
}

/**
 * Service for conversations and their messages, including the
 * user-message / assistant-reply exchange
 */
export class ChatService {
  constructor(
    private storeHandle: StoreHandle,
    private debugLog: (message: string) => void = () => {}
  ) {}

  createConversation(input: CreateConversationInput): Conversation {
    const store = this.requireStore();
    const data = {
      title: input.title,
      ...(input.createdBy !== undefined ? { createdBy: input.createdBy } : {}),
    };
    const id = store.insert('conversation', data);
    this.debugLog(`Created conversation ${id}`);
    return { id, ...data };
  }

  /**
   * Newest first, capped at {@link CONVERSATION_LIST_LIMIT}
   */
  listConversations(): Conversation[] {
    return this.requireStore().find(
      'conversation',
      {},
      { sort: { field: 'id', direction: 'desc' }, limit: CONVERSATION_LIST_LIMIT }
    );
  }

  /**
   * Messages in insertion order (by id, so a clock step between two writes
   * cannot reorder them). An unknown conversation has no messages.
   */
  listMessages(conversationId: string): Message[] {
    const store = this.requireStore();
    this.requireValidId(store, conversationId);
    return store.find(
      'message',
      { conversationId },
      { sort: { field: 'id', direction: 'asc' } }
    );
  }

  addMessage(conversationId: string, role: MessageRole, content: string): Message {
    const store = this.requireStore();
    this.requireValidId(store, conversationId);

    if (!store.findById('conversation', conversationId)) {
      throw new ConversationNotFoundError(conversationId);
    }

    const data = { conversationId, role, content };
    const id = store.insert('message', data);
    this.debugLog(`Stored ${role} message ${id} in conversation ${conversationId}`);
    return { id, ...data };
  }

  /**
   * Store the user's message, generate the assistant's reply and store it.
   *
   * The two writes are independent: if the reply cannot be stored the user
   * message stays. Returns the assistant message.
   */
  sendMessage(conversationId: string, content: string): Message {
    this.addMessage(conversationId, 'user', content);
    const reply = generateReply(content);
    return this.addMessage(conversationId, 'assistant', reply);
  }

  getDiagnostics(): StoreDiagnostics {
    if (this.storeHandle.status === 'unavailable') {
      return {
        status: 'unavailable',
        location: null,
        collections: [],
        documentCounts: {},
        sizeBytes: null,
        error: this.storeHandle.reason,
      };
    }

    try {
      const description = this.storeHandle.store.describe();
      return {
        status: 'connected',
        location: description.location,
        collections: description.collections,
        documentCounts: description.documentCounts,
        sizeBytes: description.sizeBytes,
        error: null,
      };
    } catch (error) {
      console.error('[ChatService] Store diagnostics failed:', error);
      return {
        status: 'error',
        location: null,
        collections: [],
        documentCounts: {},
        sizeBytes: null,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private requireStore(): IDocumentStore {
    if (this.storeHandle.status === 'unavailable') {
      throw new StoreUnavailableError(this.storeHandle.reason);
    }
    return this.storeHandle.store;
  }

  private requireValidId(store: IDocumentStore, id: string): void {
    if (!store.isValidId(id)) {
      throw new InvalidIdentifierError(id);
    }
  }
}
