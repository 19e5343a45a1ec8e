import type { Database } from "@server/db/client";
import {
  READING_STATUSES,
  readingRecord,
  review,
  type ReadingStatus,
} from "@server/db/schema";
import {
  assertBookExists,
  getBook,
  type BookAggregate,
} from "@server/lib/aggregates";
import { parseOrThrow } from "@server/lib/errors";
import { eq } from "drizzle-orm";
import { randomUUID } from "node:crypto";
import { z } from "zod";

const emptyToNull = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? null : value;

// Zod schemas for validation
export const readingStatusSchema = z.enum(READING_STATUSES);

export const readingUpdateSchema = z
  .strictObject({
    status: readingStatusSchema,
    dateStarted: z.iso.date().nullish(),
    dateFinished: z.iso.date().nullish(),
    readCount: z.number().int().min(1).optional(),
  })
  .refine(
    (d) => !d.dateStarted || !d.dateFinished || d.dateFinished >= d.dateStarted,
    {
      message: "Finished date must not be before the started date",
      path: ["dateFinished"],
    },
  );

export const reviewInputSchema = z.strictObject({
  rating: z
    .number()
    .int("Rating must be a whole number")
    .min(1, "Rating must be between 1 and 5")
    .max(5, "Rating must be between 1 and 5")
    .nullish(),
  reviewText: z.preprocess(emptyToNull, z.string().nullish()),
  privateNotes: z.preprocess(emptyToNull, z.string().nullish()),
  highlights: z
    .array(
      z
        .string()
        .trim()
        .min(1, "Highlights must not be empty")
        .regex(/^[^\r\n]*$/, "Highlights must be a single line"),
    )
    .nullish(),
  isSpoiler: z.boolean().optional(),
});

export type ReadingDates = Omit<
  z.input<typeof readingUpdateSchema>,
  "status"
>;
export type ReviewInput = z.input<typeof reviewInputSchema>;

/**
 * Set the reading status of a book, replacing its dates.
 * Any status may follow any other; only the dates are checked
 * (finished on or after started, both valid calendar dates).
 * `readCount` keeps its current value when omitted.
 */
export function setReadingStatus(
  db: Database,
  bookId: string,
  status: ReadingStatus,
  dates: ReadingDates = {},
): BookAggregate {
  const parsed = parseOrThrow(readingUpdateSchema, { ...dates, status });

  return db.transaction((tx) => {
    assertBookExists(tx, bookId);

    const values = {
      status: parsed.status,
      dateStarted: parsed.dateStarted ?? null,
      dateFinished: parsed.dateFinished ?? null,
      updatedAt: new Date(),
    };

    tx.insert(readingRecord)
      .values({
        id: randomUUID(),
        bookId,
        readCount: parsed.readCount ?? 1,
        ...values,
      })
      .onConflictDoUpdate({
        target: readingRecord.bookId,
        set:
          parsed.readCount === undefined
            ? values
            : { ...values, readCount: parsed.readCount },
      })
      .run();

    return getBook(tx, bookId);
  });
}

/**
 * Remove the reading record of a book, if it has one.
 */
export function clearReadingStatus(db: Database, bookId: string): void {
  db.transaction((tx) => {
    assertBookExists(tx, bookId);
    tx.delete(readingRecord).where(eq(readingRecord.bookId, bookId)).run();
  });
}

/**
 * Set the review of a book, replacing the previous one.
 * Empty texts are stored as absent; highlights are single-line quotes kept in
 * the given order.
 */
export function setReview(
  db: Database,
  bookId: string,
  input: ReviewInput,
): BookAggregate {
  const data = parseOrThrow(reviewInputSchema, input);

  return db.transaction((tx) => {
    assertBookExists(tx, bookId);

    const values = {
      rating: data.rating ?? null,
      reviewText: data.reviewText ?? null,
      privateNotes: data.privateNotes ?? null,
      highlights: data.highlights?.length ? data.highlights : null,
      isSpoiler: data.isSpoiler ?? false,
      updatedAt: new Date(),
    };

    tx.insert(review)
      .values({ id: randomUUID(), bookId, ...values })
      .onConflictDoUpdate({ target: review.bookId, set: values })
      .run();

    return getBook(tx, bookId);
  });
}
