import type { Database } from "@server/db/client";
import {
  book,
  bookCategory,
  category,
  readingRecord,
  review,
  type BookRow,
  type ReadingRecordRow,
  type ReadingStatus,
  type ReviewRow,
} from "@server/db/schema";
import { NotFoundError } from "@server/lib/errors";
import { eq, inArray } from "drizzle-orm";

export type Book = {
  id: string;
  title: string;
  author: string;
  isbn13: string | null;
  pageCount: number | null;
  coverRef: string | null;
  publisher: string | null;
  yearPublished: number | null;
  dateAdded: string;
  createdAt: string;
  updatedAt: string;
};

export type ReadingRecord = {
  status: ReadingStatus;
  dateStarted: string | null;
  dateFinished: string | null;
  readCount: number;
  updatedAt: string;
};

export type Review = {
  rating: number | null;
  reviewText: string | null;
  privateNotes: string | null;
  highlights: string[];
  isSpoiler: boolean;
  updatedAt: string;
};

export type CategorySummary = {
  id: string;
  name: string;
  color: string | null;
};

/**
 * A book joined with its reading record, review and categories
 * (categories in the order they were linked).
 */
export type BookAggregate = Book & {
  readingRecord: ReadingRecord | null;
  review: Review | null;
  categories: CategorySummary[];
};

export function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    isbn13: row.isbn13,
    pageCount: row.pageCount,
    coverRef: row.coverRef,
    publisher: row.publisher,
    yearPublished: row.yearPublished,
    dateAdded: row.dateAdded.toISOString(),
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function toReadingRecord(row: ReadingRecordRow): ReadingRecord {
  return {
    status: row.status,
    dateStarted: row.dateStarted,
    dateFinished: row.dateFinished,
    readCount: row.readCount,
    updatedAt: row.updatedAt.toISOString(),
  };
}

function toReview(row: ReviewRow): Review {
  return {
    rating: row.rating,
    reviewText: row.reviewText,
    privateNotes: row.privateNotes,
    highlights: row.highlights ?? [],
    isSpoiler: row.isSpoiler,
    updatedAt: row.updatedAt.toISOString(),
  };
}

/**
 * Load aggregates for the given book ids, returned in the order of `ids`.
 * Ids that do not exist are skipped.
 */
export function loadAggregates(db: Database, ids: string[]): BookAggregate[] {
  if (ids.length === 0) {
    return [];
  }

  const rows = db
    .select({ book, readingRecord, review })
    .from(book)
    .leftJoin(readingRecord, eq(readingRecord.bookId, book.id))
    .leftJoin(review, eq(review.bookId, book.id))
    .where(inArray(book.id, ids))
    .all();

  const links = db
    .select({
      bookId: bookCategory.bookId,
      id: category.id,
      name: category.name,
      color: category.color,
    })
    .from(bookCategory)
    .innerJoin(category, eq(category.id, bookCategory.categoryId))
    .where(inArray(bookCategory.bookId, ids))
    .orderBy(bookCategory.bookId, bookCategory.position)
    .all();

  const categoriesByBook = new Map<string, CategorySummary[]>();
  for (const link of links) {
    const list = categoriesByBook.get(link.bookId) ?? [];
    list.push({ id: link.id, name: link.name, color: link.color });
    categoriesByBook.set(link.bookId, list);
  }

  const byId = new Map(
    rows.map((row) => [
      row.book.id,
      {
        ...toBook(row.book),
        readingRecord: row.readingRecord
          ? toReadingRecord(row.readingRecord)
          : null,
        review: row.review ? toReview(row.review) : null,
        categories: categoriesByBook.get(row.book.id) ?? [],
      },
    ]),
  );

  return ids.flatMap((id) => {
    const aggregate = byId.get(id);
    return aggregate ? [aggregate] : [];
  });
}

/**
 * Read one book aggregate. Throws NotFoundError if the id is unknown.
 */
export function getBook(db: Database, id: string): BookAggregate {
  const [aggregate] = db.transaction((tx) => loadAggregates(tx, [id]));
  if (!aggregate) {
    throw new NotFoundError("book", id);
  }
  return aggregate;
}

/**
 * Throws NotFoundError unless a book with `id` exists.
 */
export function assertBookExists(db: Database, id: string): void {
  const found = db
    .select({ id: book.id })
    .from(book)
    .where(eq(book.id, id))
    .get();
  if (!found) {
    throw new NotFoundError("book", id);
  }
}
