import { z } from 'zod';
import type {
  CollectionName,
  CollectionSchema,
  DocumentFilter,
  FindOptions,
  IDocumentStore,
  SortField,
  StoreDescription,
  StoredDocument,
} from '../../core/interfaces/IDocumentStore.js';
import { MESSAGE_ROLES, type DocumentId } from '../../core/entities/Conversation.js';
import { DatabaseConnection } from './DatabaseConnection.js';

type SqlValue = string | number | null;

interface CollectionMapping<C extends CollectionName> {
  table: string;
  toColumns(doc: DocumentFilter<C>): Record<string, SqlValue | undefined>;
  fromRow(row: unknown): StoredDocument<C>;
}

type CollectionMappings = { [C in CollectionName]: CollectionMapping<C> };

const ConversationRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  created_by: z.string().nullable(),
});

const MessageRowSchema = z.object({
  id: z.number().int(),
  conversation_id: z.number().int(),
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
});

const MAPPINGS: CollectionMappings = {
  conversation: {
    table: 'conversations',
    toColumns: (doc) => ({
      title: doc.title,
      created_by: doc.createdBy,
    }),
    fromRow: (row) => {
      const parsed = ConversationRowSchema.parse(row);
      return {
        id: String(parsed.id),
        title: parsed.title,
        ...(parsed.created_by !== null ? { createdBy: parsed.created_by } : {}),
      };
    },
  },
  message: {
    table: 'messages',
    toColumns: (doc) => ({
      conversation_id: doc.conversationId,
      role: doc.role,
      content: doc.content,
    }),
    fromRow: (row) => {
      const parsed = MessageRowSchema.parse(row);
      return {
        id: String(parsed.id),
        conversationId: String(parsed.conversation_id),
        role: parsed.role,
        content: parsed.content,
      };
    },
  },
};

const SORT_COLUMNS: Record<SortField, string> = {
  id: 'id',
  createdAt: 'created_at',
};

const ROW_ID_PATTERN = /^[1-9][0-9]*$/;

/**
 * SQLite implementation of the document store.
 *
 * Ids are the tables' integer row ids rendered as decimal strings.
 */
export class SqliteDocumentStore implements IDocumentStore {
  constructor(private connection: DatabaseConnection) {}

  isValidId(id: string): boolean {
    return ROW_ID_PATTERN.test(id) && Number.isSafeInteger(Number(id));
  }

  insert<C extends CollectionName>(collection: C, doc: CollectionSchema[C]): DocumentId {
    const mapping: CollectionMapping<C> = MAPPINGS[collection];
    const columns = Object.entries(mapping.toColumns(doc));
    columns.push(['created_at', new Date().toISOString()]);

    const names = columns.map(([name]) => name).join(', ');
    const placeholders = columns.map(() => '?').join(', ');
    const values = columns.map(([, value]) => value ?? null);

    const result = this.connection
      .getDatabase()
      .prepare(`INSERT INTO ${mapping.table} (${names}) VALUES (${placeholders})`)
      .run(...values);

    return String(result.lastInsertRowid);
  }

  findById<C extends CollectionName>(collection: C, id: DocumentId): StoredDocument<C> | null {
    if (!this.isValidId(id)) {
      return null;
    }

    const mapping: CollectionMapping<C> = MAPPINGS[collection];
    const row: unknown = this.connection
      .getDatabase()
      .prepare(`SELECT * FROM ${mapping.table} WHERE id = ?`)
      .get(Number(id));

    return row === undefined ? null : mapping.fromRow(row);
  }

  find<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<C>,
    options: FindOptions = {}
  ): StoredDocument<C>[] {
    const mapping: CollectionMapping<C> = MAPPINGS[collection];
    const conditions = Object.entries(mapping.toColumns(filter)).flatMap(([name, value]) =>
      value === undefined ? [] : [{ name, value }]
    );

    let sql = `SELECT * FROM ${mapping.table}`;
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.map(({ name }) => `${name} = ?`).join(' AND ')}`;
    }

    if (options.sort) {
      const direction = options.sort.direction === 'desc' ? 'DESC' : 'ASC';
      const column = SORT_COLUMNS[options.sort.field];
      // Rows written within the same millisecond keep insertion order
      sql += column === 'id' ? ` ORDER BY id ${direction}` : ` ORDER BY ${column} ${direction}, id ${direction}`;
    } else {
      sql += ' ORDER BY id ASC';
    }

    const params: SqlValue[] = conditions.map(({ value }) => value);
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    const rows: unknown[] = this.connection.getDatabase().prepare(sql).all(...params);
    return rows.map((row) => mapping.fromRow(row));
  }

  describe(): StoreDescription {
    const stats = this.connection.getStatistics();
    return {
      location: this.connection.getDatabasePath(),
      collections: this.connection.listTables(),
      documentCounts: {
        conversation: stats.totalConversations,
        message: stats.totalMessages,
      },
      sizeBytes: stats.databaseSize,
    };
  }

  close(): void {
    this.connection.close();
  }
}
