import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { BookStorage } from '../contracts/bookStorage';
import { DecodeError, errorMessage } from '../errors';
import { fromWire, toWire, type Book } from '../types';
import { sendStatusText } from './respond';

// ---------- Schemas ----------
// Absent fields fall back to zero values; extra fields are dropped.
const bookBodySchema = z.object({
  ISBN: z.string().default(''),
  Title: z.string().default(''),
  Author: z.string().default(''),
  Price: z.number().finite().default(0),
});

const BOOK_FIELDS = ['ISBN', 'Title', 'Author', 'Price'] as const;

const isbnParamsSchema = z.object({
  isbn: z.string(),
});

// ---------- Helper ----------
/**
 * Renames body keys onto the wire field names, ignoring case. An exact-case key
 * wins; otherwise the last case-insensitive match does.
 */
function canonicalizeFields(json: unknown): unknown {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) return json;

  const entries = Object.entries(json);
  const out: Record<string, unknown> = {};
  for (const field of BOOK_FIELDS) {
    const exact = entries.find(([key]) => key === field);
    const folded = entries.filter(([key]) => key.toLowerCase() === field.toLowerCase()).pop();
    const hit = exact ?? folded;
    if (hit) out[field] = hit[1];
  }
  return out;
}

export function decodeBook(raw: unknown): Book {
  const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
  if (typeof text !== 'string' || text.trim() === '') {
    throw new DecodeError('request body is empty');
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`invalid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = bookBodySchema.safeParse(canonicalizeFields(json));
  if (!parsed.success) {
    throw new DecodeError(`body is not a book: ${parsed.error.issues.map((i) => i.message).join('; ')}`, {
      cause: parsed.error,
    });
  }
  return fromWire(parsed.data);
}

// ---------- Routes ----------
export async function registerBookRoutes(app: FastifyInstance, books: BookStorage) {
  // List
  app.get('/books', async (req, reply) => {
    try {
      const all = await books.listAll();
      return reply.send(all.map(toWire));
    } catch (err) {
      req.log.error({ err }, 'Listing books failed');
      return sendStatusText(reply, 500);
    }
  });

  // Create
  app.post('/books', async (req, reply) => {
    let book: Book;
    try {
      book = decodeBook(req.body);
    } catch (err) {
      req.log.error({ err }, 'Decoding book failed');
      return sendStatusText(reply, 400);
    }

    try {
      await books.create(book);
    } catch (err) {
      req.log.error({ err, isbn: book.isbn }, 'Creating book failed');
      return sendStatusText(reply, 500);
    }
    return reply.send(toWire(book));
  });

  // Read one; a missing book is reported like any other data error
  app.get('/books/:isbn', async (req, reply) => {
    const parsed = isbnParamsSchema.safeParse(req.params);
    if (!parsed.success) return sendStatusText(reply, 400);

    const { isbn } = parsed.data;
    try {
      const book = await books.getByIsbn(isbn);
      return reply.send(toWire(book));
    } catch (err) {
      req.log.error({ err, isbn }, 'Fetching book failed');
      return sendStatusText(reply, 500);
    }
  });
}
