import { zValidator } from "@hono/zod-validator";
import type { Database } from "@server/db/client";
import { READING_STATUSES } from "@server/db/schema";
import { getBook } from "@server/lib/aggregates";
import {
  bookFieldsSchema,
  bookUpdateSchema,
  createBook,
  deleteBook,
  updateBook,
} from "@server/lib/books";
import {
  addCategory,
  categoryInputSchema,
  categoryUpdateSchema,
  deleteCategory,
  linkCategory,
  listCategories,
  unlinkCategory,
  updateCategory,
} from "@server/lib/categories";
import type { AppConfig } from "@server/lib/config";
import {
  fromZodError,
  LibraryError,
  ValidationError,
} from "@server/lib/errors";
import { listBooks, SORT_KEYS } from "@server/lib/library-query";
import { serializeMirror, toMirrorDocument } from "@server/lib/mirror";
import {
  readingUpdateSchema,
  reviewInputSchema,
  setReadingStatus,
  setReview,
} from "@server/lib/reading";
import { computeStats } from "@server/lib/stats";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";

// Query parameters of GET /api/books. Unknown parameters are rejected.
export const listBooksQuerySchema = z.strictObject({
  status: z.enum(READING_STATUSES).optional(),
  minRating: z.coerce.number().optional(),
  maxRating: z.coerce.number().optional(),
  categoryId: z.string().min(1).optional(),
  search: z.string().optional(),
  sort: z.enum(SORT_KEYS).optional(),
  order: z.enum(["asc", "desc"]).optional(),
  page: z.coerce.number().int().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).optional(),
});

/**
 * Turn failed request validation into a ValidationError so every 400 has the
 * same shape.
 */
const rejectInvalid = (
  result: { success: true } | { success: false; error: Pick<z.ZodError, "issues"> },
) => {
  if (!result.success) {
    throw fromZodError(result.error);
  }
};

export type AppDependencies = {
  db: Database;
  config: AppConfig;
};

export function createApp({ db, config }: AppDependencies) {
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, issues: err.issues }, err.status);
    }
    if (err instanceof LibraryError) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    console.error("Unhandled error in request:", err);
    return c.json({ error: "Internal server error" }, 500);
  });

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  const route = app
    .basePath("/api")
    .get(
      "/books",
      zValidator("query", listBooksQuerySchema, rejectInvalid),
      (c) => {
        const query = c.req.valid("query");
        const sortKey = query.sort ?? "dateAdded";

        const result = listBooks(
          db,
          {
            status: query.status,
            minRating: query.minRating,
            maxRating: query.maxRating,
            categoryId: query.categoryId,
            searchText: query.search,
          },
          {
            key: sortKey,
            direction: query.order ?? (sortKey === "dateAdded" ? "desc" : "asc"),
          },
          {
            pageNumber: query.page ?? 1,
            pageSize: Math.min(
              query.pageSize ?? config.booksPerPage,
              config.maxPageSize,
            ),
          },
        );
        return c.json(result);
      },
    )
    .post(
      "/books",
      zValidator("json", bookFieldsSchema, rejectInvalid),
      (c) => {
        const created = createBook(db, c.req.valid("json"));
        return c.json(created, 201);
      },
    )
    .get("/books/:id", (c) => {
      return c.json(getBook(db, c.req.param("id")));
    })
    .patch(
      "/books/:id",
      zValidator("json", bookUpdateSchema, rejectInvalid),
      (c) => {
        return c.json(updateBook(db, c.req.param("id"), c.req.valid("json")));
      },
    )
    .delete("/books/:id", (c) => {
      deleteBook(db, c.req.param("id"));
      return c.body(null, 204);
    })
    .put(
      "/books/:id/reading-status",
      zValidator("json", readingUpdateSchema, rejectInvalid),
      (c) => {
        const { status, ...dates } = c.req.valid("json");
        return c.json(setReadingStatus(db, c.req.param("id"), status, dates));
      },
    )
    .put(
      "/books/:id/review",
      zValidator("json", reviewInputSchema, rejectInvalid),
      (c) => {
        return c.json(setReview(db, c.req.param("id"), c.req.valid("json")));
      },
    )
    .put("/books/:id/categories/:categoryId", (c) => {
      linkCategory(db, c.req.param("id"), c.req.param("categoryId"));
      return c.body(null, 204);
    })
    .delete("/books/:id/categories/:categoryId", (c) => {
      unlinkCategory(db, c.req.param("id"), c.req.param("categoryId"));
      return c.body(null, 204);
    })
    // Shared view: private notes are never part of it
    .get("/books/:id/mirror", (c) => {
      const doc = toMirrorDocument(getBook(db, c.req.param("id")), {
        includePrivateNotes: false,
      });
      return c.body(serializeMirror(doc), 200, {
        "Content-Type": "text/markdown; charset=utf-8",
      });
    })
    .get("/categories", (c) => {
      return c.json({ categories: listCategories(db) });
    })
    .post(
      "/categories",
      zValidator("json", categoryInputSchema, rejectInvalid),
      (c) => {
        const { name, color } = c.req.valid("json");
        return c.json(addCategory(db, name, color), 201);
      },
    )
    .patch(
      "/categories/:id",
      zValidator("json", categoryUpdateSchema, rejectInvalid),
      (c) => {
        return c.json(
          updateCategory(db, c.req.param("id"), c.req.valid("json")),
        );
      },
    )
    .delete("/categories/:id", (c) => {
      deleteCategory(db, c.req.param("id"));
      return c.body(null, 204);
    })
    .get("/stats", (c) => {
      return c.json(computeStats(db));
    });

  return { app, route };
}

// Export type for client-side type inference
export type AppType = ReturnType<typeof createApp>["route"];
