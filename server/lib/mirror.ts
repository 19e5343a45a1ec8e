/**
 * Mirror format
 *
 * Plain-text projection of a book aggregate for editing outside the app:
 * a YAML header followed by optional "# Review", "# Highlights" and
 * "# Private Notes" sections. Body lines that would read as one of those
 * headings are escaped with a leading backslash, so documents written by
 * serializeMirror() parse back to the same document, free text included
 * byte for byte.
 */

import { READING_STATUSES, type ReadingStatus } from "@server/db/schema";
import type { BookAggregate } from "@server/lib/aggregates";
import { fromZodError, ValidationError } from "@server/lib/errors";
import { parse, stringify, YAMLParseError } from "yaml";
import { z } from "zod";

export type MirrorDocument = {
  title: string;
  author: string;
  isbn13: string | null;
  pages: number | null;
  publisher: string | null;
  yearPublished: number | null;
  status: ReadingStatus | null;
  dateStarted: string | null;
  dateFinished: string | null;
  readCount: number | null;
  rating: number | null;
  isSpoiler: boolean;
  shelves: string[];
  reviewText: string | null;
  highlights: string[];
  privateNotes: string | null;
};

const REVIEW_HEADING = "# Review";
const HIGHLIGHTS_HEADING = "# Highlights";
const NOTES_HEADING = "# Private Notes";

// Section heading on a line of its own; escaped lines start with "\"
const SECTION_HEADING =
  /^#[ \t]+(review|highlights|private notes)[ \t]*\r?$/gim;
const ESCAPABLE_LINE =
  /^(\\*)(#[ \t]+(?:review|highlights|private notes)[ \t]*\r?)$/gim;
const ESCAPED_LINE =
  /^\\(\\*#[ \t]+(?:review|highlights|private notes)[ \t]*\r?)$/gim;

const HEADER_REGEX = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

// Hand-edited headers often leave ISBNs unquoted, which YAML reads as numbers
const digitsAsString = (value: unknown) =>
  typeof value === "number" ? String(value) : value;

const mirrorHeaderSchema = z.object({
  title: z.string().trim().min(1, "Title is required"),
  author: z.string().trim().min(1, "Author is required"),
  isbn13: z.preprocess(
    digitsAsString,
    z
      .string()
      .regex(/^\d{13}$/, "ISBN-13 must be exactly 13 digits")
      .nullish(),
  ),
  pages: z.number().int().min(0).nullish(),
  publisher: z.string().nullish(),
  year_published: z.number().int().nullish(),
  status: z.enum(READING_STATUSES).nullish(),
  date_started: z.iso.date().nullish(),
  date_finished: z.iso.date().nullish(),
  read_count: z.number().int().min(1).nullish(),
  rating: z.number().int().min(1).max(5).nullish(),
  is_spoiler: z.boolean().nullish(),
  shelves: z.array(z.string().trim().min(1)).nullish(),
});

/**
 * Build the mirror document of an aggregate. Private notes are left out
 * unless `includePrivateNotes` is set.
 */
export function toMirrorDocument(
  aggregate: BookAggregate,
  options: { includePrivateNotes: boolean },
): MirrorDocument {
  const record = aggregate.readingRecord;
  const review = aggregate.review;

  return {
    title: aggregate.title,
    author: aggregate.author,
    isbn13: aggregate.isbn13,
    pages: aggregate.pageCount,
    publisher: aggregate.publisher,
    yearPublished: aggregate.yearPublished,
    status: record?.status ?? null,
    dateStarted: record?.dateStarted ?? null,
    dateFinished: record?.dateFinished ?? null,
    readCount: record?.readCount ?? null,
    rating: review?.rating ?? null,
    isSpoiler: review?.isSpoiler ?? false,
    shelves: aggregate.categories.map((c) => c.name),
    reviewText: review?.reviewText ?? null,
    highlights: review?.highlights ?? [],
    privateNotes: options.includePrivateNotes
      ? (review?.privateNotes ?? null)
      : null,
  };
}

export function serializeMirror(doc: MirrorDocument): string {
  const header: Record<string, unknown> = {
    title: doc.title,
    author: doc.author,
  };
  if (doc.isbn13 !== null) header.isbn13 = doc.isbn13;
  if (doc.pages !== null) header.pages = doc.pages;
  if (doc.publisher !== null) header.publisher = doc.publisher;
  if (doc.yearPublished !== null) header.year_published = doc.yearPublished;
  if (doc.status !== null) header.status = doc.status;
  if (doc.dateStarted !== null) header.date_started = doc.dateStarted;
  if (doc.dateFinished !== null) header.date_finished = doc.dateFinished;
  if (doc.readCount !== null) header.read_count = doc.readCount;
  if (doc.rating !== null) header.rating = doc.rating;
  if (doc.isSpoiler) header.is_spoiler = true;
  if (doc.shelves.length > 0) header.shelves = doc.shelves;

  let text = `---\n${stringify(header, { lineWidth: 0 })}---\n`;
  if (doc.reviewText !== null) {
    text += section(REVIEW_HEADING, escapeHeadings(doc.reviewText));
  }
  if (doc.highlights.length > 0) {
    const list = doc.highlights.map((highlight) => `- ${highlight}`);
    text += section(HIGHLIGHTS_HEADING, list.join("\n"));
  }
  if (doc.privateNotes !== null) {
    text += section(NOTES_HEADING, escapeHeadings(doc.privateNotes));
  }
  return text;
}

const section = (heading: string, content: string) =>
  `\n${heading}\n\n${content}\n`;

const escapeHeadings = (text: string) =>
  text.replace(ESCAPABLE_LINE, "\\$1$2");

const unescapeHeadings = (text: string) => text.replace(ESCAPED_LINE, "$1");

type Sections = {
  reviewText: string | null;
  highlights: string[];
  privateNotes: string | null;
};

/**
 * Text of one section. The exact layout serializeMirror() writes is read
 * verbatim; anything else (a hand-edited body) is trimmed.
 */
function sectionText(raw: string, isLast: boolean): string | null {
  const tail = isLast ? "\n" : "\n\n";
  const exact =
    raw.length >= 2 + tail.length &&
    raw.startsWith("\n\n") &&
    raw.endsWith(tail);
  const text = exact ? raw.slice(2, raw.length - tail.length) : raw.trim();
  return text === "" ? null : unescapeHeadings(text);
}

// "- " bullet items, one highlight each
function parseBulletList(raw: string): string[] {
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("- "))
    .map((line) => line.slice(2).trim())
    .filter((item) => item !== "");
}

function parseSections(body: string): Sections {
  const sections: Sections = {
    reviewText: null,
    highlights: [],
    privateNotes: null,
  };
  const headings = [...body.matchAll(SECTION_HEADING)];

  headings.forEach((match, i) => {
    const start = (match.index ?? 0) + match[0].length;
    const next = headings[i + 1];
    const raw = body.slice(start, next ? next.index : body.length);

    switch (match[1].toLowerCase()) {
      case "review":
        sections.reviewText = sectionText(raw, !next);
        break;
      case "highlights":
        sections.highlights = parseBulletList(raw);
        break;
      case "private notes":
        sections.privateNotes = sectionText(raw, !next);
        break;
    }
  });

  return sections;
}

/**
 * Parse a mirror document. Throws ValidationError when the header is missing,
 * is not YAML, or has invalid fields.
 */
export function parseMirror(text: string): MirrorDocument {
  const match = text.match(HEADER_REGEX);
  if (!match) {
    throw ValidationError.single("header", "Missing metadata header");
  }

  let raw: unknown;
  try {
    raw = parse(match[1]);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw ValidationError.single("header", error.message);
    }
    throw error;
  }

  const result = mirrorHeaderSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw fromZodError(result.error);
  }
  const header = result.data;
  const { reviewText, highlights, privateNotes } = parseSections(
    text.slice(match[0].length),
  );

  return {
    title: header.title,
    author: header.author,
    isbn13: header.isbn13 ?? null,
    pages: header.pages ?? null,
    publisher: header.publisher ?? null,
    yearPublished: header.year_published ?? null,
    status: header.status ?? null,
    dateStarted: header.date_started ?? null,
    dateFinished: header.date_finished ?? null,
    readCount: header.read_count ?? null,
    rating: header.rating ?? null,
    isSpoiler: header.is_spoiler ?? false,
    shelves: header.shelves ?? [],
    reviewText,
    highlights,
    privateNotes,
  };
}

/**
 * File name for a book's mirror document: the title slugified, ".md" added.
 */
export function mirrorFileName(title: string): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 100)
    .replace(/-+$/, "");

  return `${slug || "untitled"}.md`;
}
