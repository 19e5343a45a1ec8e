import type { Database } from "@server/db/client";
import { book } from "@server/db/schema";
import {
  assertBookExists,
  getBook,
  loadAggregates,
  type BookAggregate,
} from "@server/lib/aggregates";
import {
  ConflictError,
  isUniqueViolation,
  NotFoundError,
  parseOrThrow,
} from "@server/lib/errors";
import { and, eq, ne } from "drizzle-orm";
import { randomUUID } from "node:crypto";
import { z } from "zod";

const optionalText = (max: number) =>
  z.string().trim().min(1).max(max).nullish();

// Zod schemas for validation
export const bookFieldsSchema = z.strictObject({
  title: z
    .string({ error: "Title is required" })
    .trim()
    .min(1, "Title is required")
    .max(500),
  author: z
    .string({ error: "Author is required" })
    .trim()
    .min(1, "Author is required")
    .max(300),
  isbn13: z
    .string()
    .trim()
    .regex(/^\d{13}$/, "ISBN-13 must be exactly 13 digits")
    .nullish(),
  pageCount: z.number().int().min(0).nullish(),
  coverRef: optionalText(500),
  publisher: optionalText(200),
  yearPublished: z.number().int().min(1000).max(2100).nullish(),
  // Required column: null is rejected rather than coerced to the epoch
  dateAdded: z
    .union([z.date(), z.iso.datetime({ offset: true }), z.iso.date()], {
      error: "Date added must be an ISO 8601 date or timestamp",
    })
    .pipe(z.coerce.date())
    .optional(),
});

export const bookUpdateSchema = bookFieldsSchema.partial();

export type BookFields = z.input<typeof bookFieldsSchema>;
export type BookUpdate = z.input<typeof bookUpdateSchema>;

/**
 * Throws ConflictError if another book already carries this ISBN-13.
 */
function assertIsbnAvailable(
  db: Database,
  isbn13: string,
  exceptId?: string,
): void {
  const conditions = [eq(book.isbn13, isbn13)];
  if (exceptId) {
    conditions.push(ne(book.id, exceptId));
  }

  const existing = db
    .select({ id: book.id })
    .from(book)
    .where(and(...conditions))
    .get();

  if (existing) {
    throw new ConflictError(
      `A book with ISBN-13 ${isbn13} already exists`,
      "book",
      "isbn13",
    );
  }
}

/**
 * Create a book. The new book has no reading record, review or categories.
 */
export function createBook(db: Database, fields: BookFields): BookAggregate {
  const data = parseOrThrow(bookFieldsSchema, fields);
  const now = new Date();
  const id = randomUUID();

  return db.transaction((tx) => {
    if (data.isbn13) {
      assertIsbnAvailable(tx, data.isbn13);
    }

    try {
      tx.insert(book)
        .values({
          id,
          title: data.title,
          author: data.author,
          isbn13: data.isbn13 ?? null,
          pageCount: data.pageCount ?? null,
          coverRef: data.coverRef ?? null,
          publisher: data.publisher ?? null,
          yearPublished: data.yearPublished ?? null,
          dateAdded: data.dateAdded ?? now,
          createdAt: now,
          updatedAt: now,
        })
        .run();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(
          "A book with this ISBN-13 already exists",
          "book",
          "isbn13",
        );
      }
      throw error;
    }

    const [created] = loadAggregates(tx, [id]);
    return created;
  });
}

/**
 * Apply a partial update. Fields set to null are cleared; omitted fields are
 * left alone. Every field is validated before anything is written.
 */
export function updateBook(
  db: Database,
  id: string,
  fields: BookUpdate,
): BookAggregate {
  const data = parseOrThrow(bookUpdateSchema, fields);

  return db.transaction((tx) => {
    assertBookExists(tx, id);

    if (data.isbn13) {
      assertIsbnAvailable(tx, data.isbn13, id);
    }

    const changes: Partial<typeof book.$inferInsert> = {
      updatedAt: new Date(),
    };
    if (data.title !== undefined) changes.title = data.title;
    if (data.author !== undefined) changes.author = data.author;
    if (data.isbn13 !== undefined) changes.isbn13 = data.isbn13;
    if (data.pageCount !== undefined) changes.pageCount = data.pageCount;
    if (data.coverRef !== undefined) changes.coverRef = data.coverRef;
    if (data.publisher !== undefined) changes.publisher = data.publisher;
    if (data.yearPublished !== undefined) {
      changes.yearPublished = data.yearPublished;
    }
    if (data.dateAdded !== undefined) changes.dateAdded = data.dateAdded;

    tx.update(book).set(changes).where(eq(book.id, id)).run();

    return getBook(tx, id);
  });
}

/**
 * Delete a book. Its reading record, review and category links go with it
 * (ON DELETE CASCADE); the categories themselves stay.
 */
export function deleteBook(db: Database, id: string): void {
  const result = db.delete(book).where(eq(book.id, id)).run();
  if (result.changes === 0) {
    throw new NotFoundError("book", id);
  }
}
