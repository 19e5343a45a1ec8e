import { foldCase, type Database } from "@server/db/client";
import { bookCategory, category, type CategoryRow } from "@server/db/schema";
import { assertBookExists } from "@server/lib/aggregates";
import {
  ConflictError,
  isUniqueViolation,
  NotFoundError,
  parseOrThrow,
} from "@server/lib/errors";
import { and, asc, count, eq, max, ne } from "drizzle-orm";
import { randomUUID } from "node:crypto";
import { z } from "zod";

/**
 * Palette used when a category is created without a colour.
 */
export const CATEGORY_COLORS = [
  "#3498DB",
  "#E74C3C",
  "#2ECC71",
  "#F39C12",
  "#9B59B6",
  "#1ABC9C",
  "#E67E22",
  "#34495E",
  "#16A085",
  "#27AE60",
  "#2980B9",
  "#8E44AD",
  "#C0392B",
  "#D35400",
  "#7F8C8D",
] as const;

// Zod schemas for validation
const categoryNameSchema = z
  .string({ error: "Name is required" })
  .trim()
  .min(1, "Name is required")
  .max(100, "Name must be at most 100 characters");

const colorSchema = z
  .string()
  .regex(/^#[0-9A-Fa-f]{6}$/, "Color must be a hex color like #3498DB");

export const categoryInputSchema = z.strictObject({
  name: categoryNameSchema,
  color: colorSchema.nullish(),
});

export const categoryUpdateSchema = categoryInputSchema.partial();

export type Category = {
  id: string;
  name: string;
  color: string | null;
  createdAt: string;
};

export type CategoryWithCount = Category & { bookCount: number };

function toCategory(row: Pick<CategoryRow, "id" | "name" | "color" | "createdAt">): Category {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    createdAt: row.createdAt.toISOString(),
  };
}

function duplicateName(name: string): ConflictError {
  return new ConflictError(
    `A category named "${name}" already exists`,
    "category",
    "name",
  );
}

/**
 * Find a category by name, ignoring case.
 */
export function getCategoryByName(
  db: Database,
  name: string,
): Category | null {
  const row = db
    .select()
    .from(category)
    .where(eq(category.nameKey, foldCase(name.trim())))
    .get();
  return row ? toCategory(row) : null;
}

function getCategoryRow(db: Database, id: string): CategoryRow {
  const row = db.select().from(category).where(eq(category.id, id)).get();
  if (!row) {
    throw new NotFoundError("category", id);
  }
  return row;
}

/**
 * First palette colour no category uses yet; once all are taken, cycle by
 * category count.
 */
function nextColor(db: Database): string {
  const rows = db.select({ color: category.color }).from(category).all();
  const used = new Set(rows.map((r) => r.color?.toUpperCase()));
  const unused = CATEGORY_COLORS.find((color) => !used.has(color));
  return unused ?? CATEGORY_COLORS[rows.length % CATEGORY_COLORS.length];
}

/**
 * Create a category. Names are unique regardless of case.
 */
export function addCategory(
  db: Database,
  name: string,
  color?: string | null,
): Category {
  const data = parseOrThrow(categoryInputSchema, { name, color });

  return db.transaction((tx) => {
    if (getCategoryByName(tx, data.name)) {
      throw duplicateName(data.name);
    }

    try {
      const row = tx
        .insert(category)
        .values({
          id: randomUUID(),
          name: data.name,
          nameKey: foldCase(data.name),
          color: data.color ?? nextColor(tx),
          createdAt: new Date(),
        })
        .returning()
        .get();
      return toCategory(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw duplicateName(data.name);
      }
      throw error;
    }
  });
}

/**
 * Rename or recolour a category.
 */
export function updateCategory(
  db: Database,
  id: string,
  fields: z.input<typeof categoryUpdateSchema>,
): Category {
  const data = parseOrThrow(categoryUpdateSchema, fields);

  return db.transaction((tx) => {
    getCategoryRow(tx, id);

    if (data.name !== undefined) {
      const clash = tx
        .select({ id: category.id })
        .from(category)
        .where(
          and(
            eq(category.nameKey, foldCase(data.name)),
            ne(category.id, id),
          ),
        )
        .get();
      if (clash) {
        throw duplicateName(data.name);
      }
    }

    const changes: Partial<typeof category.$inferInsert> = {};
    if (data.name !== undefined) {
      changes.name = data.name;
      changes.nameKey = foldCase(data.name);
    }
    if (data.color !== undefined) changes.color = data.color;

    if (Object.keys(changes).length > 0) {
      tx.update(category).set(changes).where(eq(category.id, id)).run();
    }

    return toCategory(getCategoryRow(tx, id));
  });
}

/**
 * Delete a category. Refused while books are still linked to it.
 */
export function deleteCategory(db: Database, id: string): void {
  db.transaction((tx) => {
    const row = getCategoryRow(tx, id);

    const linked = tx
      .select({ total: count() })
      .from(bookCategory)
      .where(eq(bookCategory.categoryId, id))
      .get();
    const bookCount = linked?.total ?? 0;

    if (bookCount > 0) {
      throw new ConflictError(
        `Category "${row.name}" still has ${bookCount} book(s); remove them first`,
        "category",
        "books",
      );
    }

    tx.delete(category).where(eq(category.id, id)).run();
  });
}

/**
 * All categories ordered by name, with the number of books in each.
 */
export function listCategories(db: Database): CategoryWithCount[] {
  const rows = db
    .select({
      id: category.id,
      name: category.name,
      color: category.color,
      createdAt: category.createdAt,
      bookCount: count(bookCategory.bookId),
    })
    .from(category)
    .leftJoin(bookCategory, eq(bookCategory.categoryId, category.id))
    .groupBy(category.id)
    .orderBy(asc(category.nameKey), asc(category.id))
    .all();

  return rows.map((row) => ({
    ...toCategory(row),
    bookCount: row.bookCount,
  }));
}

/**
 * Attach a category to a book. The pair may exist only once.
 */
export function linkCategory(
  db: Database,
  bookId: string,
  categoryId: string,
): void {
  db.transaction((tx) => {
    assertBookExists(tx, bookId);
    getCategoryRow(tx, categoryId);

    const existing = tx
      .select({ bookId: bookCategory.bookId })
      .from(bookCategory)
      .where(
        and(
          eq(bookCategory.bookId, bookId),
          eq(bookCategory.categoryId, categoryId),
        ),
      )
      .get();
    if (existing) {
      throw new ConflictError(
        "Book is already in this category",
        "category",
        "categoryId",
      );
    }

    const last = tx
      .select({ position: max(bookCategory.position) })
      .from(bookCategory)
      .where(eq(bookCategory.bookId, bookId))
      .get();
    const position = (last?.position ?? -1) + 1;

    tx.insert(bookCategory).values({ bookId, categoryId, position }).run();
  });
}

/**
 * Detach a category from a book. Throws NotFoundError if they were not linked.
 */
export function unlinkCategory(
  db: Database,
  bookId: string,
  categoryId: string,
): void {
  const result = db
    .delete(bookCategory)
    .where(
      and(
        eq(bookCategory.bookId, bookId),
        eq(bookCategory.categoryId, categoryId),
      ),
    )
    .run();

  if (result.changes === 0) {
    throw new NotFoundError("category", categoryId);
  }
}
