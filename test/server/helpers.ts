import { openDatabase, type Database } from "@server/db/client";
import type { BookAggregate } from "@server/lib/aggregates";
import { createBook, type BookFields } from "@server/lib/books";

/**
 * Fresh in-memory database with the schema applied.
 */
export function createTestDb(): Database {
  return openDatabase(":memory:");
}

let counter = 0;

/**
 * Creates a book with a unique title unless one is given.
 */
export function createTestBook(
  db: Database,
  fields: Partial<BookFields> = {},
): BookAggregate {
  counter += 1;
  return createBook(db, {
    title: `Test Book ${counter}`,
    author: "Test Author",
    ...fields,
  });
}
