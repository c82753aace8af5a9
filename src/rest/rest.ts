import { type Context, Hono } from "hono";
import { Ok, type Result, safeTry } from "slang-ts";
import type { z } from "zod";
import { applyCorsConfig } from "@/cors/cors";
import type { TaskStore } from "@/db";
import type { TaskLogger } from "@/logging";
import type { TaskModel } from "@/tasks";
import {
  createTaskSchema,
  listTasksQuerySchema,
  taskIdSchema,
  toTaskResponse,
  updateTaskSchema,
  validate,
} from "@/tasks/schemas";
import {
  createDiagnosticsLog,
  handleError,
  type ValidationError,
  validationError,
} from "@/utils";
import { respondWithError } from "./error-mapping";
import { requestLogger } from "./middleware";
import { createOpenApiDocument } from "./openapi";
import type {
  ErrorResponse,
  HealthResponse,
  RestConfig,
  TaskListResponse,
  WelcomeResponse,
} from "./types";

// --- Factory ---

interface CreateRestAppParams {
  config: RestConfig;
  model: TaskModel;
  store: Pick<TaskStore, "ping">;
  logger: TaskLogger;
  serverName: string;
  version: string;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Creates the Hono REST app for the task API.
 *
 * Task routes live under `{baseUrl}/tasks`; `/`, `/health` and
 * `/openapi.json` stay at the root. Handlers validate path, query and body,
 * call the task model and map its `TaskError`s to status codes.
 */
export function createRestApp(params: CreateRestAppParams): Hono {
  const { config, model, store, logger, serverName, version } = params;
  const app = new Hono();
  const log = createDiagnosticsLog("REST", {
    diagnostics: config.diagnostics,
    logger,
  });
  const docsEnabled = config.enableDocs ?? true;

  // Validation failures at the edge are logged like model errors
  const parseInput = <TSchema extends z.ZodType>(
    schema: TSchema,
    input: unknown,
    atFunction: string
  ): Result<z.output<TSchema>, ValidationError> => {
    const parsed = validate(schema, input);
    if (parsed.isErr) {
      return handleError({ error: parsed.error, logger, atFunction });
    }
    return parsed;
  };

  const readJsonBody = async (
    c: Context,
    atFunction: string
  ): Promise<Result<unknown, ValidationError>> => {
    const body = await safeTry(() => c.req.json<unknown>());
    if (body.isErr) {
      return handleError({
        error: validationError([
          {
            field: "body",
            rule: "invalid_json",
            message: "Request body must be valid JSON",
          },
        ]),
        logger,
        data: { error: body.error },
        atFunction,
      });
    }
    return Ok(body.value);
  };

  applyCorsConfig(app, config);
  app.use("*", requestLogger(logger));

  app.get("/", (c) =>
    c.json({
      message: `Welcome to the ${serverName} API`,
      version,
      status: "healthy",
      docs: docsEnabled ? "/openapi.json" : null,
    } satisfies WelcomeResponse)
  );

  app.get("/health", async (c) => {
    const timestamp = new Date().toISOString();
    const ping = await store.ping();
    if (ping.isErr) {
      const error = describeError(ping.error);
      logger.error({
        atFunction: "rest.health",
        message: "Health check failed",
        data: { error: ping.error },
      });
      return c.json(
        {
          status: "unhealthy",
          database: "disconnected",
          error,
          timestamp,
        } satisfies HealthResponse,
        503
      );
    }
    return c.json({
      status: "healthy",
      database: "connected",
      timestamp,
    } satisfies HealthResponse);
  });

  if (docsEnabled) {
    const document = createOpenApiDocument({
      serverName,
      version,
      baseUrl: config.baseUrl,
    });
    app.get("/openapi.json", (c) => c.json(document));
  }

  const tasksPath = `${config.baseUrl}/tasks`;

  app.get(tasksPath, async (c) => {
    const query = parseInput(
      listTasksQuerySchema,
      c.req.query(),
      "rest.listTasks"
    );
    if (query.isErr) {
      return respondWithError(c, query.error);
    }

    const page = await model.list(query.value);
    if (page.isErr) {
      return respondWithError(c, page.error);
    }

    const { tasks, total, completed, pending } = page.value;
    return c.json({
      tasks: tasks.map(toTaskResponse),
      total,
      completed,
      pending,
    } satisfies TaskListResponse);
  });

  // Registered before :id so "stats" is not read as an id
  app.get(`${tasksPath}/stats`, async (c) => {
    const stats = await model.stats();
    if (stats.isErr) {
      return respondWithError(c, stats.error);
    }
    return c.json(stats.value);
  });

  app.post(tasksPath, async (c) => {
    const body = await readJsonBody(c, "rest.createTask");
    if (body.isErr) {
      return respondWithError(c, body.error);
    }

    const input = parseInput(createTaskSchema, body.value, "rest.createTask");
    if (input.isErr) {
      return respondWithError(c, input.error);
    }

    const created = await model.create(input.value);
    if (created.isErr) {
      return respondWithError(c, created.error);
    }
    return c.json(toTaskResponse(created.value), 201);
  });

  app.get(`${tasksPath}/:id`, async (c) => {
    const id = parseInput(taskIdSchema, c.req.param("id"), "rest.getTask");
    if (id.isErr) {
      return respondWithError(c, id.error);
    }

    const task = await model.get(id.value);
    if (task.isErr) {
      return respondWithError(c, task.error);
    }
    return c.json(toTaskResponse(task.value));
  });

  app.put(`${tasksPath}/:id`, async (c) => {
    const id = parseInput(taskIdSchema, c.req.param("id"), "rest.updateTask");
    if (id.isErr) {
      return respondWithError(c, id.error);
    }

    const body = await readJsonBody(c, "rest.updateTask");
    if (body.isErr) {
      return respondWithError(c, body.error);
    }

    const input = parseInput(updateTaskSchema, body.value, "rest.updateTask");
    if (input.isErr) {
      return respondWithError(c, input.error);
    }

    const updated = await model.update(id.value, input.value);
    if (updated.isErr) {
      return respondWithError(c, updated.error);
    }
    return c.json(toTaskResponse(updated.value));
  });

  app.post(`${tasksPath}/:id/complete`, async (c) => {
    const id = parseInput(
      taskIdSchema,
      c.req.param("id"),
      "rest.completeTask"
    );
    if (id.isErr) {
      return respondWithError(c, id.error);
    }

    const completed = await model.complete(id.value);
    if (completed.isErr) {
      return respondWithError(c, completed.error);
    }
    return c.json(toTaskResponse(completed.value));
  });

  app.delete(`${tasksPath}/:id`, async (c) => {
    const id = parseInput(taskIdSchema, c.req.param("id"), "rest.deleteTask");
    if (id.isErr) {
      return respondWithError(c, id.error);
    }

    const removed = await model.delete(id.value);
    if (removed.isErr) {
      return respondWithError(c, removed.error);
    }
    return c.body(null, 204);
  });

  app.notFound((c) =>
    c.json(
      {
        error: {
          code: "ROUTE_NOT_FOUND",
          message: `Route not found: ${c.req.method} ${c.req.path}`,
        },
      } satisfies ErrorResponse,
      404
    )
  );

  app.onError((error, c) => {
    const log_id = logger.error({
      atFunction: "rest.onError",
      message: "Unhandled error while serving request",
      data: { error, method: c.req.method, path: c.req.path },
    });
    return c.json(
      {
        error: {
          code: "INTERNAL_ERROR",
          message: "Internal server error",
          log_id,
        },
      } satisfies ErrorResponse,
      500
    );
  });

  log(`REST interface ready at ${tasksPath}`);

  return app;
}
