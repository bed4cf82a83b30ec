import type { Book, Isbn } from '../types';

export type SqlRow = Record<string, unknown>;

/** The slice of a database client the storage layer needs. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlRow[]>;
}

/** Read/insert access to the books table. */
export interface BookStorage {
  listAll(): Promise<Book[]>;
  getByIsbn(isbn: Isbn): Promise<Book>;
  create(book: Book): Promise<void>;
}

/** Database connectivity probe backing /healthz and /readyz. */
export interface HealthCheck {
  checkConnection(): Promise<void>;
}
