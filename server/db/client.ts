import * as schema from "@server/db/schema";
import BetterSqlite3, { type RunResult } from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";

/**
 * Store handle passed to every library operation.
 * Both the root database and a transaction satisfy it, so operations compose
 * inside an outer transaction (nested calls become savepoints).
 */
export type Database = BaseSQLiteDatabase<"sync", RunResult, typeof schema>;

/**
 * Case fold used for every case-insensitive comparison: search, sorting and
 * category name uniqueness. Registered on the connection as `fold()`.
 */
export function foldCase(value: string): string {
  return value.normalize("NFC").toLowerCase();
}

const SCHEMA_SQL = readFileSync(
  new URL("./schema.sql", import.meta.url),
  "utf8",
);

/**
 * Open (or create) the SQLite file at `path` and make sure the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string) {
  const inMemory = path === ":memory:";
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new BetterSqlite3(path);
  sqlite.function("fold", { deterministic: true }, (value: unknown) =>
    value === null || value === undefined ? null : foldCase(String(value)),
  );
  sqlite.pragma("foreign_keys = ON");
  if (!inMemory) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.exec(SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}
