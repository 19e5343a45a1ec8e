import type { Database } from "@server/db/client";
import { getBook } from "@server/lib/aggregates";
import {
  addCategory,
  CATEGORY_COLORS,
  deleteCategory,
  getCategoryByName,
  linkCategory,
  listCategories,
  unlinkCategory,
  updateCategory,
} from "@server/lib/categories";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "@server/lib/errors";
import { beforeEach, describe, expect, it } from "vitest";
import { createTestBook, createTestDb } from "./helpers";

describe("addCategory", () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
  });

  it("trims the name and keeps a given colour", () => {
    const created = addCategory(db, "  Sci-Fi ", "#112233");
    expect(created.name).toBe("Sci-Fi");
    expect(created.color).toBe("#112233");
  });

  it("assigns unused palette colours in order", () => {
    const first = addCategory(db, "One");
    const second = addCategory(db, "Two");
    expect(first.color).toBe(CATEGORY_COLORS[0]);
    expect(second.color).toBe(CATEGORY_COLORS[1]);
  });

  it("skips palette colours already in use", () => {
    addCategory(db, "Blue", CATEGORY_COLORS[0]);
    expect(addCategory(db, "Next").color).toBe(CATEGORY_COLORS[1]);
  });

  it("refuses a name that differs only by case", () => {
    addCategory(db, "Fantasy");
    expect(() => addCategory(db, "fantasy")).toThrow(ConflictError);
    expect(() => addCategory(db, " FANTASY ")).toThrow(ConflictError);
  });

  it("refuses a name that differs only by non-ASCII case", () => {
    addCategory(db, "Ébène");
    expect(() => addCategory(db, "ébène")).toThrow(ConflictError);
    expect(listCategories(db).map((c) => c.name)).toEqual(["Ébène"]);
  });

  it("rejects an empty or over-long name", () => {
    expect(() => addCategory(db, "  ")).toThrow(ValidationError);
    expect(() => addCategory(db, "x".repeat(101))).toThrow(ValidationError);
  });

  it("rejects a colour that is not #RRGGBB", () => {
    expect(() => addCategory(db, "Odd", "red")).toThrow(ValidationError);
  });
});

describe("getCategoryByName", () => {
  it("ignores case", () => {
    const db = createTestDb();
    const created = addCategory(db, "Non-Fiction");
    expect(getCategoryByName(db, "non-fiction")?.id).toBe(created.id);
    expect(getCategoryByName(db, "Poetry")).toBeNull();
  });

  it("ignores case of accented letters", () => {
    const db = createTestDb();
    const created = addCategory(db, "Ébène");
    expect(getCategoryByName(db, "ÉBÈNE")?.id).toBe(created.id);
  });
});

describe("updateCategory", () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
  });

  it("renames a category", () => {
    const created = addCategory(db, "Scifi");
    const updated = updateCategory(db, created.id, { name: "Science Fiction" });
    expect(updated.name).toBe("Science Fiction");
    expect(updated.color).toBe(created.color);
  });

  it("allows changing only the case of its own name", () => {
    const created = addCategory(db, "poetry");
    expect(updateCategory(db, created.id, { name: "Poetry" }).name).toBe(
      "Poetry",
    );
  });

  it("refuses the name of another category", () => {
    addCategory(db, "Poetry");
    const other = addCategory(db, "Drama");
    expect(() => updateCategory(db, other.id, { name: "POETRY" })).toThrow(
      ConflictError,
    );
  });

  it("throws NotFoundError for an unknown id", () => {
    expect(() => updateCategory(db, "missing", { name: "X" })).toThrow(
      NotFoundError,
    );
  });
});

describe("deleteCategory", () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
  });

  it("deletes an unused category", () => {
    const created = addCategory(db, "Empty");
    deleteCategory(db, created.id);
    expect(listCategories(db)).toEqual([]);
  });

  it("refuses while books are linked", () => {
    const created = addCategory(db, "Busy");
    linkCategory(db, createTestBook(db).id, created.id);

    expect(() => deleteCategory(db, created.id)).toThrow(ConflictError);
    expect(listCategories(db)).toHaveLength(1);
  });

  it("throws NotFoundError for an unknown id", () => {
    expect(() => deleteCategory(db, "missing")).toThrow(NotFoundError);
  });
});

describe("listCategories", () => {
  it("orders by name regardless of case and counts books", () => {
    const db = createTestDb();
    const b = addCategory(db, "banana");
    addCategory(db, "Apple");
    addCategory(db, "cherry");
    linkCategory(db, createTestBook(db).id, b.id);
    linkCategory(db, createTestBook(db).id, b.id);

    expect(listCategories(db).map((c) => [c.name, c.bookCount])).toEqual([
      ["Apple", 0],
      ["banana", 2],
      ["cherry", 0],
    ]);
  });
});

describe("linkCategory", () => {
  let db: Database;
  let bookId: string;

  beforeEach(() => {
    db = createTestDb();
    bookId = createTestBook(db).id;
  });

  it("keeps categories in the order they were linked", () => {
    const zebra = addCategory(db, "Zebra");
    const alpha = addCategory(db, "Alpha");
    linkCategory(db, bookId, zebra.id);
    linkCategory(db, bookId, alpha.id);

    expect(getBook(db, bookId).categories.map((c) => c.name)).toEqual([
      "Zebra",
      "Alpha",
    ]);
  });

  it("refuses a pair that already exists", () => {
    const shelf = addCategory(db, "Once");
    linkCategory(db, bookId, shelf.id);
    expect(() => linkCategory(db, bookId, shelf.id)).toThrow(ConflictError);
  });

  it("throws NotFoundError for an unknown book or category", () => {
    const shelf = addCategory(db, "Real");
    try {
      linkCategory(db, "missing", shelf.id);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      expect(error.entity).toBe("book");
    }
    try {
      linkCategory(db, bookId, "missing");
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      expect(error.entity).toBe("category");
    }
  });
});

describe("unlinkCategory", () => {
  it("removes the link and nothing else", () => {
    const db = createTestDb();
    const { id } = createTestBook(db);
    const shelf = addCategory(db, "Temporary");
    linkCategory(db, id, shelf.id);

    unlinkCategory(db, id, shelf.id);

    expect(getBook(db, id).categories).toEqual([]);
    expect(listCategories(db)).toHaveLength(1);
    expect(() => unlinkCategory(db, id, shelf.id)).toThrow(NotFoundError);
  });
});
