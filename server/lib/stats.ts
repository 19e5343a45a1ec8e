import type { Database } from "@server/db/client";
import { book, readingRecord, review } from "@server/db/schema";
import { and, asc, count, eq, isNotNull, sql } from "drizzle-orm";

export type LibraryStats = {
  totalBooks: number;
  readCount: number;
  currentlyReadingCount: number;
  readThisYear: number;
  /** Number of reviews per rating; every rating 1-5 is present. */
  ratingDistribution: Record<1 | 2 | 3 | 4 | 5, number>;
  /** Read books per finishing month, oldest month first. */
  booksPerMonth: Array<{ month: string; count: number }>;
};

/**
 * Dashboard aggregates. `now` decides which calendar year counts as current.
 */
export function computeStats(
  db: Database,
  now: Date = new Date(),
): LibraryStats {
  const year = String(now.getFullYear());
  const month = sql<string>`substr(${readingRecord.dateFinished}, 1, 7)`;

  return db.transaction((tx) => {
    const totals = tx
      .select({
        totalBooks: count(),
        readCount: sql<number>`coalesce(sum(${readingRecord.status} = 'read'), 0)`,
        currentlyReadingCount: sql<number>`coalesce(sum(${readingRecord.status} = 'currently-reading'), 0)`,
        readThisYear: sql<number>`coalesce(sum(${readingRecord.status} = 'read' and substr(${readingRecord.dateFinished}, 1, 4) = ${year}), 0)`,
      })
      .from(book)
      .leftJoin(readingRecord, eq(readingRecord.bookId, book.id))
      .get();

    const ratings = tx
      .select({ rating: review.rating, count: count() })
      .from(review)
      .where(isNotNull(review.rating))
      .groupBy(review.rating)
      .all();

    const ratingDistribution = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    for (const row of ratings) {
      if (
        row.rating === 1 ||
        row.rating === 2 ||
        row.rating === 3 ||
        row.rating === 4 ||
        row.rating === 5
      ) {
        ratingDistribution[row.rating] = row.count;
      }
    }

    const booksPerMonth = tx
      .select({ month, count: count() })
      .from(readingRecord)
      .where(
        and(
          eq(readingRecord.status, "read"),
          isNotNull(readingRecord.dateFinished),
        ),
      )
      .groupBy(month)
      .orderBy(asc(month))
      .all();

    return {
      totalBooks: totals?.totalBooks ?? 0,
      readCount: Number(totals?.readCount ?? 0),
      currentlyReadingCount: Number(totals?.currentlyReadingCount ?? 0),
      readThisYear: Number(totals?.readThisYear ?? 0),
      ratingDistribution,
      booksPerMonth,
    };
  });
}
