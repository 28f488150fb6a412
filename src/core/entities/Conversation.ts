/**
 * Conversation domain entities
 */

/** Opaque identifier issued by the document store */
export type DocumentId = string;

export const MESSAGE_ROLES = ['user', 'assistant'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export interface ConversationData {
  title: string;
  createdBy?: string;
}

export interface MessageData {
  conversationId: DocumentId;
  role: MessageRole;
  content: string;
}

export interface Conversation extends ConversationData {
  id: DocumentId;
}

export interface Message extends MessageData {
  id: DocumentId;
}
