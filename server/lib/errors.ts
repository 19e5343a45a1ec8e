import type { z } from "zod";

export type FieldIssue = {
  field: string;
  message: string;
};

export type EntityName = "book" | "category" | "reading record" | "review";

/**
 * Base class for the errors a library operation can throw on purpose.
 * `status` is the HTTP status the API answers with.
 */
export class LibraryError extends Error {
  public status: 400 | 404 | 409;

  constructor(message: string, status: 400 | 404 | 409) {
    super(message);
    this.name = "LibraryError";
    this.status = status;
  }
}

/**
 * Malformed or out-of-range input. Lists every violated field; nothing has
 * been written when this is thrown.
 */
export class ValidationError extends LibraryError {
  public issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super(
      `Invalid input: ${issues.map((i) => `${i.field} (${i.message})`).join(", ")}`,
      400,
    );
    this.name = "ValidationError";
    this.issues = issues;
  }

  static single(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }
}

export class NotFoundError extends LibraryError {
  public entity: EntityName;
  public id: string;

  constructor(entity: EntityName, id: string) {
    super(`No ${entity} with id ${id}`, 404);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Uniqueness violation: duplicate category name, duplicate link, duplicate ISBN.
 */
export class ConflictError extends LibraryError {
  public entity: EntityName;
  public field: string;

  constructor(message: string, entity: EntityName, field: string) {
    super(message, 409);
    this.name = "ConflictError";
    this.entity = entity;
    this.field = field;
  }
}

export function fromZodError(
  error: Pick<z.ZodError, "issues">,
): ValidationError {
  const issues: FieldIssue[] = [];

  for (const issue of error.issues) {
    if (issue.code === "unrecognized_keys") {
      const prefix = issue.path.map(String).join(".");
      for (const key of issue.keys) {
        issues.push({
          field: prefix ? `${prefix}.${key}` : key,
          message: "Unknown key",
        });
      }
      continue;
    }

    issues.push({
      field: issue.path.map(String).join(".") || "(root)",
      message: issue.message,
    });
  }

  return new ValidationError(issues);
}

/**
 * Parse `input` with `schema`, throwing a ValidationError listing every issue.
 */
export function parseOrThrow<T extends z.ZodType>(
  schema: T,
  input: unknown,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
}

/**
 * SQLite error code of `error` or of anything in its cause chain
 * (drizzle wraps driver errors).
 */
export function sqliteErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  const code = sqliteErrorCode(error);
  return (
    code === "SQLITE_CONSTRAINT_UNIQUE" ||
    code === "SQLITE_CONSTRAINT_PRIMARYKEY"
  );
}
