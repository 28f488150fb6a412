import type {
  ConversationData,
  DocumentId,
  MessageData,
} from '../entities/Conversation.js';

/**
 * Documents held by each collection, before the store assigns an id
 */
export interface CollectionSchema {
  conversation: ConversationData;
  message: MessageData;
}

export type CollectionName = keyof CollectionSchema;

export type StoredDocument<C extends CollectionName> = CollectionSchema[C] & { id: DocumentId };

export type DocumentFilter<C extends CollectionName> = Partial<CollectionSchema[C]>;

/** `createdAt` is maintained by the store and is not part of the document */
export type SortField = 'id' | 'createdAt';

export interface FindOptions {
  sort?: { field: SortField; direction: 'asc' | 'desc' };
  limit?: number;
}

export interface StoreDescription {
  location: string;
  collections: string[];
  documentCounts: Record<CollectionName, number>;
  sizeBytes: number;
}

/**
 * Interface for document persistence over named collections
 */
export interface IDocumentStore {
  isValidId(id: string): boolean;

  insert<C extends CollectionName>(collection: C, doc: CollectionSchema[C]): DocumentId;

  findById<C extends CollectionName>(collection: C, id: DocumentId): StoredDocument<C> | null;

  find<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<C>,
    options?: FindOptions
  ): StoredDocument<C>[];

  describe(): StoreDescription;

  close(): void;
}

/**
 * Result of opening the store once at startup
 */
export type StoreHandle =
  | { status: 'available'; store: IDocumentStore }
  | { status: 'unavailable'; reason: string };
