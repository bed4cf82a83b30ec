import { z } from 'zod';
import type { BookStorage, SqlExecutor, SqlRow } from '../contracts/bookStorage';
import { DataAccessError, NotFoundError, errorMessage } from '../errors';
import type { Book, Isbn } from '../types';

const SELECT_ALL = 'SELECT * FROM books';
const SELECT_BY_ISBN = 'SELECT * FROM books WHERE isbn=$1;';
const INSERT_BOOK = 'INSERT INTO books (isbn, title, author, price) VALUES ($1, $2, $3, $4);';

// pg returns numeric columns as strings
const bookRowSchema = z.object({
  isbn: z.string(),
  title: z.string(),
  author: z.string(),
  price: z.union([z.number(), z.string().min(1)]).pipe(z.coerce.number().finite()),
});

/**
 * Implements `BookStorage` with parameterised statements against the `books` table.
 */
export class PgBookStorage implements BookStorage {
  constructor(private readonly db: SqlExecutor) {}

  async listAll(): Promise<Book[]> {
    const rows = await this.run('list books', SELECT_ALL);
    return rows.map((row) => this.toBook(row));
  }

  async getByIsbn(isbn: Isbn): Promise<Book> {
    const rows = await this.run('get book', SELECT_BY_ISBN, [isbn]);
    const [row] = rows;
    if (!row) {
      throw new NotFoundError(`no book with isbn ${isbn}`);
    }
    return this.toBook(row);
  }

  async create(book: Book): Promise<void> {
    await this.run('create book', INSERT_BOOK, [book.isbn, book.title, book.author, book.price]);
  }

  private async run(op: string, text: string, values?: unknown[]): Promise<SqlRow[]> {
    try {
      return await this.db.query(text, values);
    } catch (err) {
      throw new DataAccessError(`${op}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private toBook(row: SqlRow): Book {
    const parsed = bookRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new DataAccessError(`unable to scan book row: ${parsed.error.issues.map((i) => i.message).join('; ')}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
