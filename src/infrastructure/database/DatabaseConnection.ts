import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/chat.db') {
    this.dbPath = dbPath === IN_MEMORY_DATABASE ? dbPath : path.resolve(process.cwd(), dbPath);

    if (this.dbPath !== IN_MEMORY_DATABASE) {
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    // Enable WAL mode for better concurrency
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        created_by TEXT,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id INTEGER NOT NULL REFERENCES conversations(id),
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_message_conversation_created
        ON messages(conversation_id, created_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  listTables(): string[] {
    const rows: unknown[] = this.db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all();

    return rows.flatMap((row) =>
      typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string'
        ? [row.name]
        : []
    );
  }

  getStatistics(): {
    totalConversations: number;
    totalMessages: number;
    databaseSize: number;
  } {
    const count = (table: string): number => {
      const value: unknown = this.db.prepare(`SELECT COUNT(*) FROM ${table}`).pluck().get();
      return typeof value === 'number' ? value : 0;
    };

    const databaseSize =
      this.dbPath !== IN_MEMORY_DATABASE && fs.existsSync(this.dbPath)
        ? fs.statSync(this.dbPath).size
        : 0;

    return {
      totalConversations: count('conversations'),
      totalMessages: count('messages'),
      databaseSize,
    };
  }
}
