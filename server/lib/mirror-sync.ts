import type { Database } from "@server/db/client";
import { book } from "@server/db/schema";
import { getBook, type BookAggregate } from "@server/lib/aggregates";
import { createBook, updateBook, type BookFields } from "@server/lib/books";
import {
  addCategory,
  getCategoryByName,
  linkCategory,
  unlinkCategory,
} from "@server/lib/categories";
import {
  mirrorFileName,
  parseMirror,
  serializeMirror,
  toMirrorDocument,
  type MirrorDocument,
} from "@server/lib/mirror";
import {
  clearReadingStatus,
  setReadingStatus,
  setReview,
} from "@server/lib/reading";
import { and, asc, eq, isNull, sql } from "drizzle-orm";
import {
  mkdir,
  readdir,
  readFile,
  rename,
  rm,
  writeFile,
} from "node:fs/promises";
import { join } from "node:path";

export type MirrorImportResult = {
  imported: Array<{ file: string; bookId: string }>;
  failed: Array<{ file: string; error: string }>;
};

/**
 * Write `content` to `path` through a temp file so readers never see a
 * half-written document.
 */
async function writeAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, content, "utf8");
  try {
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * The book a mirror document refers to: same ISBN-13 if it has one,
 * otherwise same title and author.
 */
function findMirroredBook(db: Database, doc: MirrorDocument): string | null {
  const condition = doc.isbn13
    ? eq(book.isbn13, doc.isbn13)
    : and(
        eq(book.title, doc.title),
        eq(book.author, doc.author),
        isNull(book.isbn13),
      );

  const row = db
    .select({ id: book.id })
    .from(book)
    .where(condition)
    .orderBy(asc(book.dateAdded), asc(book.id))
    .get();
  return row?.id ?? null;
}

/**
 * Create or update the book described by a mirror document.
 * Goes through the regular create/update/link operations, all inside one
 * transaction; the document's shelves replace the book's categories and
 * unknown shelves are created.
 */
export function importMirror(db: Database, text: string): BookAggregate {
  const doc = parseMirror(text);

  return db.transaction((tx) => {
    const fields: BookFields = {
      title: doc.title,
      author: doc.author,
      isbn13: doc.isbn13,
      pageCount: doc.pages,
      publisher: doc.publisher,
      yearPublished: doc.yearPublished,
    };

    const existingId = findMirroredBook(tx, doc);
    const bookId = existingId
      ? updateBook(tx, existingId, fields).id
      : createBook(tx, fields).id;
    const current = getBook(tx, bookId);

    if (doc.status) {
      setReadingStatus(tx, bookId, doc.status, {
        dateStarted: doc.dateStarted,
        dateFinished: doc.dateFinished,
        readCount: doc.readCount ?? undefined,
      });
    } else if (current.readingRecord) {
      clearReadingStatus(tx, bookId);
    }

    const hasReview =
      doc.rating !== null ||
      doc.reviewText !== null ||
      doc.highlights.length > 0 ||
      doc.privateNotes !== null ||
      doc.isSpoiler;
    if (hasReview || current.review) {
      setReview(tx, bookId, {
        rating: doc.rating,
        reviewText: doc.reviewText,
        highlights: doc.highlights,
        privateNotes: doc.privateNotes,
        isSpoiler: doc.isSpoiler,
      });
    }

    for (const linked of current.categories) {
      unlinkCategory(tx, bookId, linked.id);
    }
    const seen = new Set<string>();
    for (const name of doc.shelves) {
      const shelf = getCategoryByName(tx, name) ?? addCategory(tx, name);
      if (seen.has(shelf.id)) continue;
      seen.add(shelf.id);
      linkCategory(tx, bookId, shelf.id);
    }

    return getBook(tx, bookId);
  });
}

/**
 * Write one book's mirror document (private notes included) into `dir`.
 * Returns the path written.
 */
export async function exportBookToMirror(
  db: Database,
  bookId: string,
  dir: string,
  fileName?: string,
): Promise<string> {
  const aggregate = getBook(db, bookId);
  const doc = toMirrorDocument(aggregate, { includePrivateNotes: true });
  const path = join(dir, fileName ?? mirrorFileName(aggregate.title));

  await mkdir(dir, { recursive: true });
  await writeAtomic(path, serializeMirror(doc));
  return path;
}

/**
 * Export every book into `dir`, one document per book. Books whose titles
 * slugify to the same name get a numeric suffix.
 */
export async function exportLibrary(
  db: Database,
  dir: string,
): Promise<string[]> {
  const books = db
    .select({ id: book.id, title: book.title })
    .from(book)
    .orderBy(sql`fold(${book.title})`, asc(book.id))
    .all();

  const used = new Set<string>();
  const written: string[] = [];

  for (const { id, title } of books) {
    const base = mirrorFileName(title).slice(0, -".md".length);
    let name = `${base}.md`;
    for (let n = 2; used.has(name); n++) {
      name = `${base}-${n}.md`;
    }
    used.add(name);

    written.push(await exportBookToMirror(db, id, dir, name));
  }

  return written;
}

/**
 * Import every ".md" file in `dir`. A file that fails to read or import is
 * reported in `failed` and does not stop the others; directories are skipped.
 */
export async function importLibrary(
  db: Database,
  dir: string,
): Promise<MirrorImportResult> {
  const files = (await readdir(dir, { withFileTypes: true }))
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry) => entry.name)
    .sort();

  const result: MirrorImportResult = { imported: [], failed: [] };

  for (const file of files) {
    try {
      const text = await readFile(join(dir, file), "utf8");
      const imported = importMirror(db, text);
      result.imported.push({ file, bookId: imported.id });
    } catch (error) {
      console.error(`Failed to import mirror document ${file}:`, error);
      result.failed.push({
        file,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}
