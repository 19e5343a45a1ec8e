import { parseOrThrow } from "@server/lib/errors";
import { z } from "zod";

const configSchema = z
  .object({
    DATABASE_PATH: z.string().min(1).default("data/library.db"),
    LIBRARY_PATH: z.string().min(1).default("library"),
    BOOKS_PER_PAGE: z.coerce.number().int().min(1).default(24),
    MAX_PAGE_SIZE: z.coerce.number().int().min(1).default(96),
  })
  .refine((env) => env.BOOKS_PER_PAGE <= env.MAX_PAGE_SIZE, {
    message: "BOOKS_PER_PAGE must not exceed MAX_PAGE_SIZE",
    path: ["BOOKS_PER_PAGE"],
  });

export type AppConfig = {
  /** SQLite file, or ":memory:" */
  databasePath: string;
  /** Directory holding mirror documents */
  libraryPath: string;
  booksPerPage: number;
  maxPageSize: number;
};

/**
 * Read configuration from environment variables, applying defaults.
 * Throws ValidationError naming each bad variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = parseOrThrow(configSchema, {
    DATABASE_PATH: env.DATABASE_PATH || undefined,
    LIBRARY_PATH: env.LIBRARY_PATH || undefined,
    BOOKS_PER_PAGE: env.BOOKS_PER_PAGE || undefined,
    MAX_PAGE_SIZE: env.MAX_PAGE_SIZE || undefined,
  });

  return {
    databasePath: parsed.DATABASE_PATH,
    libraryPath: parsed.LIBRARY_PATH,
    booksPerPage: parsed.BOOKS_PER_PAGE,
    maxPageSize: parsed.MAX_PAGE_SIZE,
  };
}
