import { sql } from "drizzle-orm";
import {
  index,
  integer,
  primaryKey,
  sqliteTable,
  text,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";

export const READING_STATUSES = [
  "to-read",
  "currently-reading",
  "read",
] as const;

export type ReadingStatus = (typeof READING_STATUSES)[number];

/**
 * Books in the library.
 * The DDL that actually creates these tables lives in schema.sql; keep both in step.
 */
export const book = sqliteTable(
  "books",
  {
    id: text("id").primaryKey(), // UUID generated server-side
    title: text("title").notNull(),
    author: text("author").notNull(),
    isbn13: text("isbn13"),
    pageCount: integer("page_count"),
    coverRef: text("cover_ref"), // Opaque path or URL, never dereferenced here
    publisher: text("publisher"),
    yearPublished: integer("year_published"),
    dateAdded: integer("date_added", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    uniqueIndex("books_isbn13_unique").on(t.isbn13),
    index("idx_books_title").on(t.title),
    index("idx_books_author").on(t.author),
    index("idx_books_date_added").on(t.dateAdded),
  ],
);

/**
 * Current reading state of a book. At most one row per book.
 */
export const readingRecord = sqliteTable(
  "reading_records",
  {
    id: text("id").primaryKey(),
    bookId: text("book_id")
      .notNull()
      .references(() => book.id, { onDelete: "cascade" }),
    status: text("status", { enum: READING_STATUSES }).notNull(),
    dateStarted: text("date_started"), // YYYY-MM-DD
    dateFinished: text("date_finished"), // YYYY-MM-DD
    readCount: integer("read_count").default(1).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    uniqueIndex("reading_records_book_unique").on(t.bookId),
    index("idx_reading_records_status").on(t.status),
    index("idx_reading_records_finished").on(t.dateFinished),
  ],
);

export const review = sqliteTable(
  "reviews",
  {
    id: text("id").primaryKey(),
    bookId: text("book_id")
      .notNull()
      .references(() => book.id, { onDelete: "cascade" }),
    rating: integer("rating"),
    reviewText: text("review_text"),
    privateNotes: text("private_notes"), // Never part of a shared view
    highlights: text("highlights", { mode: "json" }).$type<string[]>(),
    isSpoiler: integer("is_spoiler", { mode: "boolean" })
      .default(false)
      .notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    uniqueIndex("reviews_book_unique").on(t.bookId),
    index("idx_reviews_rating").on(t.rating),
  ],
);

export const category = sqliteTable(
  "categories",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    nameKey: text("name_key").notNull(), // foldCase(name)
    color: text("color"), // #RRGGBB
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    // Names are unique regardless of case
    uniqueIndex("categories_name_key_unique").on(t.nameKey),
  ],
);

/**
 * Book <-> category links. A link is just the pair; position keeps the order
 * in which categories were attached to the book.
 */
export const bookCategory = sqliteTable(
  "book_categories",
  {
    bookId: text("book_id")
      .notNull()
      .references(() => book.id, { onDelete: "cascade" }),
    categoryId: text("category_id")
      .notNull()
      .references(() => category.id, { onDelete: "cascade" }),
    position: integer("position").default(0).notNull(),
  },
  (t) => [
    primaryKey({ columns: [t.bookId, t.categoryId] }),
    index("idx_book_categories_category").on(t.categoryId),
  ],
);

export type BookRow = typeof book.$inferSelect;
export type ReadingRecordRow = typeof readingRecord.$inferSelect;
export type ReviewRow = typeof review.$inferSelect;
export type CategoryRow = typeof category.$inferSelect;
