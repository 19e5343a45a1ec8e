import type { Database } from "@server/db/client";
import { getBook } from "@server/lib/aggregates";
import { NotFoundError, ValidationError } from "@server/lib/errors";
import {
  clearReadingStatus,
  setReadingStatus,
  setReview,
} from "@server/lib/reading";
import { beforeEach, describe, expect, it } from "vitest";
import { createTestBook, createTestDb } from "./helpers";

describe("setReadingStatus", () => {
  let db: Database;
  let bookId: string;

  beforeEach(() => {
    db = createTestDb();
    bookId = createTestBook(db).id;
  });

  it("creates the reading record", () => {
    const updated = setReadingStatus(db, bookId, "currently-reading", {
      dateStarted: "2024-02-01",
    });

    expect(updated.readingRecord).toMatchObject({
      status: "currently-reading",
      dateStarted: "2024-02-01",
      dateFinished: null,
      readCount: 1,
    });
  });

  it("keeps one record per book and replaces its dates", () => {
    setReadingStatus(db, bookId, "currently-reading", {
      dateStarted: "2024-02-01",
    });
    const updated = setReadingStatus(db, bookId, "read", {
      dateFinished: "2024-03-01",
    });

    expect(updated.readingRecord).toMatchObject({
      status: "read",
      dateStarted: null,
      dateFinished: "2024-03-01",
    });
  });

  it("allows any status to follow any other", () => {
    setReadingStatus(db, bookId, "read");
    expect(getBook(db, bookId).readingRecord?.status).toBe("read");

    setReadingStatus(db, bookId, "to-read");
    expect(getBook(db, bookId).readingRecord?.status).toBe("to-read");
  });

  it("keeps the read count when it is not given", () => {
    setReadingStatus(db, bookId, "read", { readCount: 3 });
    const updated = setReadingStatus(db, bookId, "currently-reading");
    expect(updated.readingRecord?.readCount).toBe(3);
  });

  it("accepts a book finished on the day it was started", () => {
    const updated = setReadingStatus(db, bookId, "read", {
      dateStarted: "2024-05-05",
      dateFinished: "2024-05-05",
    });
    expect(updated.readingRecord?.dateFinished).toBe("2024-05-05");
  });

  it("rejects a finished date before the started date", () => {
    try {
      setReadingStatus(db, bookId, "read", {
        dateStarted: "2024-05-10",
        dateFinished: "2024-05-01",
      });
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      expect(error.issues).toEqual([
        {
          field: "dateFinished",
          message: "Finished date must not be before the started date",
        },
      ]);
    }
    expect(getBook(db, bookId).readingRecord).toBeNull();
  });

  it("rejects dates that are not calendar dates", () => {
    expect(() =>
      setReadingStatus(db, bookId, "read", { dateFinished: "2024-02-30" }),
    ).toThrow(ValidationError);
    expect(() =>
      setReadingStatus(db, bookId, "read", { dateFinished: "03/01/2024" }),
    ).toThrow(ValidationError);
  });

  it("throws NotFoundError for an unknown book", () => {
    expect(() => setReadingStatus(db, "missing", "read")).toThrow(
      NotFoundError,
    );
  });
});

describe("clearReadingStatus", () => {
  it("removes the reading record", () => {
    const db = createTestDb();
    const { id } = createTestBook(db);
    setReadingStatus(db, id, "read");

    clearReadingStatus(db, id);

    expect(getBook(db, id).readingRecord).toBeNull();
  });
});

describe("setReview", () => {
  let db: Database;
  let bookId: string;

  beforeEach(() => {
    db = createTestDb();
    bookId = createTestBook(db).id;
  });

  it("stores rating, texts and spoiler flag", () => {
    const updated = setReview(db, bookId, {
      rating: 5,
      reviewText: "Loved it.",
      privateNotes: "Lend to Sam",
      isSpoiler: true,
    });

    expect(updated.review).toMatchObject({
      rating: 5,
      reviewText: "Loved it.",
      privateNotes: "Lend to Sam",
      isSpoiler: true,
    });
  });

  it("replaces the previous review", () => {
    setReview(db, bookId, { rating: 2, reviewText: "Meh" });
    const updated = setReview(db, bookId, { rating: 4 });

    expect(updated.review).toMatchObject({
      rating: 4,
      reviewText: null,
      isSpoiler: false,
    });
  });

  it("stores highlights in order", () => {
    const updated = setReview(db, bookId, {
      highlights: [" First line ", "Second line"],
    });
    expect(updated.review?.highlights).toEqual(["First line", "Second line"]);

    const cleared = setReview(db, bookId, { highlights: [] });
    expect(cleared.review?.highlights).toEqual([]);
  });

  it("rejects a highlight spanning lines", () => {
    expect(() =>
      setReview(db, bookId, { highlights: ["one\ntwo"] }),
    ).toThrow(ValidationError);
    expect(getBook(db, bookId).review).toBeNull();
  });

  it("stores empty texts as absent", () => {
    const updated = setReview(db, bookId, {
      reviewText: "",
      privateNotes: "   ",
    });
    expect(updated.review?.reviewText).toBeNull();
    expect(updated.review?.privateNotes).toBeNull();
  });

  it.each([0, 6, 3.5])("rejects rating %s", (rating) => {
    expect(() => setReview(db, bookId, { rating })).toThrow(ValidationError);
    expect(getBook(db, bookId).review).toBeNull();
  });

  it("throws NotFoundError for an unknown book", () => {
    expect(() => setReview(db, "missing", { rating: 3 })).toThrow(
      NotFoundError,
    );
  });
});
