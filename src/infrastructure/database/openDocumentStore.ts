import type { StoreHandle } from '../../core/interfaces/IDocumentStore.js';
import { DatabaseConnection } from './DatabaseConnection.js';
import { SqliteDocumentStore } from './SqliteDocumentStore.js';

/**
 * Open the SQLite store. A failure is reported as an unavailable handle
 * so the API can still start and answer with StoreUnavailable.
 */
export function openDocumentStore(dbPath: string): StoreHandle {
  try {
    const connection = new DatabaseConnection(dbPath);
    console.error(`[Database] Connected to ${connection.getDatabasePath()}`);
    return { status: 'available', store: new SqliteDocumentStore(connection) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[Database] Failed to open ${dbPath}: ${reason}`);
    return { status: 'unavailable', reason };
  }
}
