import { setReadingStatus, setReview } from "@server/lib/reading";
import { computeStats } from "@server/lib/stats";
import { describe, expect, it } from "vitest";
import { createTestBook, createTestDb } from "./helpers";

describe("computeStats", () => {
  it("returns zeros for an empty library", () => {
    const db = createTestDb();

    expect(computeStats(db, new Date(2024, 5, 1))).toEqual({
      totalBooks: 0,
      readCount: 0,
      currentlyReadingCount: 0,
      readThisYear: 0,
      ratingDistribution: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 },
      booksPerMonth: [],
    });
  });

  it("counts statuses, this year's reads, ratings and months", () => {
    const db = createTestDb();
    const a = createTestBook(db);
    const b = createTestBook(db);
    const c = createTestBook(db);
    const d = createTestBook(db);
    const e = createTestBook(db);
    createTestBook(db);

    setReadingStatus(db, a.id, "read", { dateFinished: "2024-03-15" });
    setReadingStatus(db, b.id, "read", { dateFinished: "2024-03-02" });
    setReadingStatus(db, c.id, "read", { dateFinished: "2023-11-30" });
    setReadingStatus(db, d.id, "currently-reading", {
      dateStarted: "2024-05-01",
    });
    setReadingStatus(db, e.id, "to-read");

    setReview(db, a.id, { rating: 5 });
    setReview(db, b.id, { rating: 5 });
    setReview(db, c.id, { rating: 2 });
    setReview(db, d.id, { reviewText: "Unrated so far" });

    expect(computeStats(db, new Date(2024, 5, 1))).toEqual({
      totalBooks: 6,
      readCount: 3,
      currentlyReadingCount: 1,
      readThisYear: 2,
      ratingDistribution: { 1: 0, 2: 1, 3: 0, 4: 0, 5: 2 },
      booksPerMonth: [
        { month: "2023-11", count: 1 },
        { month: "2024-03", count: 2 },
      ],
    });
  });

  it("leaves read books without a finished date out of this year's count", () => {
    const db = createTestDb();
    setReadingStatus(db, createTestBook(db).id, "read");

    const stats = computeStats(db, new Date(2024, 0, 1));
    expect(stats.readCount).toBe(1);
    expect(stats.readThisYear).toBe(0);
    expect(stats.booksPerMonth).toEqual([]);
  });
});
