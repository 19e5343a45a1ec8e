import { foldCase, type Database } from "@server/db/client";
import {
  book,
  bookCategory,
  READING_STATUSES,
  readingRecord,
  review,
} from "@server/db/schema";
import { loadAggregates, type BookAggregate } from "@server/lib/aggregates";
import { parseOrThrow } from "@server/lib/errors";
import {
  and,
  asc,
  count,
  desc,
  eq,
  gte,
  inArray,
  isNull,
  lte,
  or,
  sql,
  type SQL,
} from "drizzle-orm";
import { z } from "zod";

export const SORT_KEYS = [
  "title",
  "author",
  "dateAdded",
  "dateRead",
  "rating",
] as const;

const ratingBound = z
  .number()
  .int("Rating bounds must be whole numbers")
  .min(1, "Rating bounds must be between 1 and 5")
  .max(5, "Rating bounds must be between 1 and 5");

// Zod schemas for validation
export const bookFilterSchema = z
  .strictObject({
    status: z.enum(READING_STATUSES).optional(),
    minRating: ratingBound.optional(),
    maxRating: ratingBound.optional(),
    categoryId: z.string().min(1).optional(),
    searchText: z.string().optional(),
  })
  .refine(
    (f) =>
      f.minRating === undefined ||
      f.maxRating === undefined ||
      f.minRating <= f.maxRating,
    {
      message: "minRating must not be greater than maxRating",
      path: ["minRating"],
    },
  );

export const bookSortSchema = z.strictObject({
  key: z.enum(SORT_KEYS),
  direction: z.enum(["asc", "desc"]).default("asc"),
});

export const pageSchema = z.strictObject({
  pageNumber: z.number().int().min(1),
  pageSize: z.number().int().min(1),
});

export type BookFilter = z.input<typeof bookFilterSchema>;
export type BookSort = z.input<typeof bookSortSchema>;
export type Page = z.input<typeof pageSchema>;

export type BookListResult = {
  items: BookAggregate[];
  total: number;
};

export const DEFAULT_SORT = {
  key: "dateAdded",
  direction: "desc",
} as const satisfies BookSort;

const DEFAULT_PAGE = { pageNumber: 1, pageSize: 24 } satisfies Page;

function filterConditions(filter: z.output<typeof bookFilterSchema>): SQL[] {
  const conditions: SQL[] = [];

  if (filter.status) {
    conditions.push(eq(readingRecord.status, filter.status));
  }
  if (filter.minRating !== undefined) {
    conditions.push(gte(review.rating, filter.minRating));
  }
  if (filter.maxRating !== undefined) {
    conditions.push(lte(review.rating, filter.maxRating));
  }
  if (filter.categoryId) {
    conditions.push(
      inArray(
        book.id,
        sql`(select ${bookCategory.bookId} from ${bookCategory} where ${bookCategory.categoryId} = ${filter.categoryId})`,
      ),
    );
  }

  const trimmed = filter.searchText?.trim();
  if (trimmed) {
    // fold() is foldCase registered on the connection, so both sides match
    const needle = foldCase(trimmed);
    const search = or(
      sql`instr(fold(${book.title}), ${needle}) > 0`,
      sql`instr(fold(${book.author}), ${needle}) > 0`,
      sql`instr(fold(${book.isbn13}), ${needle}) > 0`,
    );
    if (search) {
      conditions.push(search);
    }
  }

  return conditions;
}

/**
 * ORDER BY terms for a sort. Absent values go last ascending and first
 * descending; the book id breaks every tie.
 */
function orderTerms(sort: z.output<typeof bookSortSchema>): SQL[] {
  const direction = sort.direction === "asc" ? asc : desc;

  switch (sort.key) {
    case "title":
      return [direction(sql`fold(${book.title})`), asc(book.id)];
    case "author":
      return [direction(sql`fold(${book.author})`), asc(book.id)];
    case "dateAdded":
      return [direction(book.dateAdded), asc(book.id)];
    case "dateRead":
      return [
        direction(isNull(readingRecord.dateFinished)),
        direction(readingRecord.dateFinished),
        asc(book.id),
      ];
    case "rating":
      return [
        direction(isNull(review.rating)),
        direction(review.rating),
        asc(book.id),
      ];
  }
}

/**
 * List books matching `filter`, ordered by `sort`, sliced to `page`.
 * `total` counts every match, not just the page. The count and the page are
 * read in one transaction so they agree with each other.
 */
export function listBooks(
  db: Database,
  filter: BookFilter = {},
  sort: BookSort = DEFAULT_SORT,
  page: Page = DEFAULT_PAGE,
): BookListResult {
  const parsed = parseOrThrow(
    z.object({
      filter: bookFilterSchema,
      sort: bookSortSchema,
      page: pageSchema,
    }),
    { filter, sort, page },
  );

  const where = and(...filterConditions(parsed.filter));
  const offset = (parsed.page.pageNumber - 1) * parsed.page.pageSize;

  return db.transaction((tx) => {
    const totalRow = tx
      .select({ total: count() })
      .from(book)
      .leftJoin(readingRecord, eq(readingRecord.bookId, book.id))
      .leftJoin(review, eq(review.bookId, book.id))
      .where(where)
      .get();
    const total = totalRow?.total ?? 0;

    if (total === 0 || offset >= total) {
      return { items: [], total };
    }

    const ids = tx
      .select({ id: book.id })
      .from(book)
      .leftJoin(readingRecord, eq(readingRecord.bookId, book.id))
      .leftJoin(review, eq(review.bookId, book.id))
      .where(where)
      .orderBy(...orderTerms(parsed.sort))
      .limit(parsed.page.pageSize)
      .offset(offset)
      .all()
      .map((row) => row.id);

    return { items: loadAggregates(tx, ids), total };
  });
}
