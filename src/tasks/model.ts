import { asc, count, eq, type SQL, sql } from "drizzle-orm";
import { Err, Ok, type Result, safeTry } from "slang-ts";
import { type Task, type TaskDatabase, tasks } from "@/db";
import type { TaskLogger } from "@/logging";
import {
  handleError,
  notFoundError,
  storeUnavailableError,
  type TaskError,
  validationError,
} from "@/utils";
import {
  type CreateTaskInput,
  createListOptionsSchema,
  createTaskSchema,
  DEFAULT_PAGINATION,
  type ListTasksOptions,
  type PaginationConfig,
  type TaskFilter,
  taskIdSchema,
  type UpdateTaskInput,
  updateTaskSchema,
  validate,
} from "./schemas";

export interface TaskStats {
  total: number;
  completed: number;
  pending: number;
}

/** One page of tasks plus counts over the whole table, regardless of filter */
export interface TaskPage extends TaskStats {
  tasks: Task[];
}

export interface TaskModelOptions {
  db: TaskDatabase;
  logger: TaskLogger;
  pagination?: PaginationConfig;
}

export interface TaskModel {
  /** Insert a new pending task; title is trimmed */
  create(input: CreateTaskInput): Promise<Result<Task, TaskError>>;
  /** Page through tasks by ascending id, with unfiltered counts */
  list(options?: ListTasksOptions): Promise<Result<TaskPage, TaskError>>;
  stats(): Promise<Result<TaskStats, TaskError>>;
  get(id: number): Promise<Result<Task, TaskError>>;
  /** Change title and/or completed; at least one is required */
  update(id: number, input: UpdateTaskInput): Promise<Result<Task, TaskError>>;
  /** Mark completed, refreshing updated_at even when already complete */
  complete(id: number): Promise<Result<Task, TaskError>>;
  /** Remove a task, returns the deleted row */
  delete(id: number): Promise<Result<Task, TaskError>>;
}

const FILTER_CONDITIONS: Record<TaskFilter, SQL | undefined> = {
  all: undefined,
  completed: eq(tasks.completed, true),
  pending: eq(tasks.completed, false),
};

/**
 * New updated_at for a mutation: the current time, but always at least 1 ms
 * past the stored value so every change is observable in the timestamp.
 */
const touchUpdatedAt = (): SQL =>
  sql`greatest(${new Date().toISOString()}::timestamptz, ${tasks.updated_at} + interval '1 millisecond')`;

/** SQLSTATE classes 22 (data exception) and 23 (integrity constraint violation) */
const INPUT_SQLSTATE_CLASSES = new Set(["22", "23"]);

const SQLSTATE_REGEX = /^[0-9A-Z]{5}$/;

/** Drivers put the SQLSTATE on `code`; drizzle wraps driver errors in `cause` */
const findSqlState = (error: unknown, depth = 0): string | undefined => {
  if (depth > 2 || typeof error !== "object" || error === null) {
    return undefined;
  }
  if (
    "code" in error &&
    typeof error.code === "string" &&
    SQLSTATE_REGEX.test(error.code)
  ) {
    return error.code;
  }
  return "cause" in error ? findSqlState(error.cause, depth + 1) : undefined;
};

type StoreFault = { message: string; sqlState?: string };

/** safeTry keeps only the message, so the SQLSTATE is read off the thrown error first */
const runQuery = async <T>(
  query: () => PromiseLike<T>
): Promise<Result<Awaited<T>, StoreFault>> => {
  const caught: { sqlState?: string } = {};
  const result = await safeTry(async () => {
    try {
      return await query();
    } catch (error) {
      caught.sqlState = findSqlState(error);
      throw error;
    }
  });
  return result.isOk
    ? Ok(result.value)
    : Err({ message: String(result.error), sqlState: caught.sqlState });
};

const readStats = async (dbx: TaskDatabase): Promise<TaskStats> => {
  const [row] = await dbx
    .select({
      total: count(),
      completed: count(sql`case when ${tasks.completed} then 1 end`),
    })
    .from(tasks);

  const total = row?.total ?? 0;
  const completed = row?.completed ?? 0;
  return { total, completed, pending: total - completed };
};

/**
 * Creates the task data-access layer over an injected database handle.
 *
 * Every method returns `Result<T, TaskError>`: validation and missing rows are
 * client errors, and so is data the store rejects (SQLSTATE class 22 or 23).
 * Anything else thrown by the driver becomes STORE_UNAVAILABLE.
 * Each call is one statement, or one read-only transaction for `list`.
 *
 * @example
 * ```typescript
 * const taskModel = createTaskModel({ db: store.db, logger });
 * const created = await taskModel.create({ title: "Ship it" });
 * if (created.isOk) {
 *   await taskModel.complete(created.value.id);
 * }
 * ```
 */
export function createTaskModel(options: TaskModelOptions): TaskModel {
  const { db, logger } = options;
  const listOptionsSchema = createListOptionsSchema(
    options.pagination ?? DEFAULT_PAGINATION
  );

  // Input the store rejects as invalid is the caller's fault; anything else may pass on retry
  const storeFailure = (
    atFunction: string,
    data: { error?: StoreFault; [key: string]: unknown }
  ) => {
    const sqlState = data.error?.sqlState;
    if (sqlState && INPUT_SQLSTATE_CLASSES.has(sqlState.slice(0, 2))) {
      return handleError({
        error: validationError([
          {
            field: "input",
            rule: `sqlstate_${sqlState}`,
            message: "Rejected by the task store as invalid data",
          },
        ]),
        logger,
        data: { ...data, sqlState },
        atFunction,
      });
    }
    return handleError({
      error: storeUnavailableError(),
      logger,
      data,
      atFunction,
    });
  };

  const create = async (input: CreateTaskInput) => {
    const parsed = validate(createTaskSchema, input);
    if (parsed.isErr) {
      return handleError({
        error: parsed.error,
        logger,
        atFunction: "tasks.create",
      });
    }

    const now = new Date();
    const result = await runQuery(() =>
      db
        .insert(tasks)
        .values({
          title: parsed.value.title,
          completed: false,
          created_at: now,
          updated_at: now,
        })
        .returning()
    );
    if (result.isErr) {
      return storeFailure("tasks.create", { error: result.error });
    }

    const row = result.value[0];
    if (!row) {
      return storeFailure("tasks.create", {
        reason: "insert returned no row",
      });
    }

    logger.info({
      atFunction: "tasks.create",
      message: "Task created",
      data: { id: row.id },
    });
    return Ok(row);
  };

  const list = async (listOptions: ListTasksOptions = {}) => {
    const parsed = validate(listOptionsSchema, listOptions);
    if (parsed.isErr) {
      return handleError({
        error: parsed.error,
        logger,
        data: { options: listOptions },
        atFunction: "tasks.list",
      });
    }

    const { filter, skip, limit } = parsed.value;
    const result = await runQuery(() =>
      db.transaction(
        async (tx): Promise<TaskPage> => {
          const rows = await tx
            .select()
            .from(tasks)
            .where(FILTER_CONDITIONS[filter])
            .orderBy(asc(tasks.id))
            .limit(limit)
            .offset(skip);
          const stats = await readStats(tx);
          return { tasks: rows, ...stats };
        },
        { isolationLevel: "repeatable read", accessMode: "read only" }
      )
    );
    if (result.isErr) {
      return storeFailure("tasks.list", {
        filter,
        skip,
        limit,
        error: result.error,
      });
    }

    return Ok(result.value);
  };

  const stats = async () => {
    const result = await runQuery(() => readStats(db));
    if (result.isErr) {
      return storeFailure("tasks.stats", { error: result.error });
    }
    return Ok(result.value);
  };

  const get = async (id: number) => {
    const parsedId = validate(taskIdSchema, id);
    if (parsedId.isErr) {
      return handleError({
        error: parsedId.error,
        logger,
        data: { id },
        atFunction: "tasks.get",
      });
    }

    const result = await runQuery(() =>
      db.select().from(tasks).where(eq(tasks.id, parsedId.value)).limit(1)
    );
    if (result.isErr) {
      return storeFailure("tasks.get", { id, error: result.error });
    }

    const row = result.value[0];
    if (!row) {
      return handleError({
        error: notFoundError(id),
        logger,
        atFunction: "tasks.get",
      });
    }
    return Ok(row);
  };

  const update = async (id: number, input: UpdateTaskInput) => {
    const parsedId = validate(taskIdSchema, id);
    if (parsedId.isErr) {
      return handleError({
        error: parsedId.error,
        logger,
        data: { id },
        atFunction: "tasks.update",
      });
    }

    const parsed = validate(updateTaskSchema, input);
    if (parsed.isErr) {
      return handleError({
        error: parsed.error,
        logger,
        data: { id },
        atFunction: "tasks.update",
      });
    }

    const { title, completed } = parsed.value;
    const result = await runQuery(() =>
      db
        .update(tasks)
        .set({ title, completed, updated_at: touchUpdatedAt() })
        .where(eq(tasks.id, parsedId.value))
        .returning()
    );
    if (result.isErr) {
      return storeFailure("tasks.update", { id, error: result.error });
    }

    const row = result.value[0];
    if (!row) {
      return handleError({
        error: notFoundError(id),
        logger,
        atFunction: "tasks.update",
      });
    }

    logger.info({
      atFunction: "tasks.update",
      message: "Task updated",
      data: { id, fields: Object.keys(parsed.value) },
    });
    return Ok(row);
  };

  const complete = async (id: number) => {
    const parsedId = validate(taskIdSchema, id);
    if (parsedId.isErr) {
      return handleError({
        error: parsedId.error,
        logger,
        data: { id },
        atFunction: "tasks.complete",
      });
    }

    const result = await runQuery(() =>
      db
        .update(tasks)
        .set({ completed: true, updated_at: touchUpdatedAt() })
        .where(eq(tasks.id, parsedId.value))
        .returning()
    );
    if (result.isErr) {
      return storeFailure("tasks.complete", { id, error: result.error });
    }

    const row = result.value[0];
    if (!row) {
      return handleError({
        error: notFoundError(id),
        logger,
        atFunction: "tasks.complete",
      });
    }

    logger.info({
      atFunction: "tasks.complete",
      message: "Task completed",
      data: { id },
    });
    return Ok(row);
  };

  const deleteFn = async (id: number) => {
    const parsedId = validate(taskIdSchema, id);
    if (parsedId.isErr) {
      return handleError({
        error: parsedId.error,
        logger,
        data: { id },
        atFunction: "tasks.delete",
      });
    }

    const result = await runQuery(() =>
      db.delete(tasks).where(eq(tasks.id, parsedId.value)).returning()
    );
    if (result.isErr) {
      return storeFailure("tasks.delete", { id, error: result.error });
    }

    const row = result.value[0];
    if (!row) {
      return handleError({
        error: notFoundError(id),
        logger,
        atFunction: "tasks.delete",
      });
    }

    logger.info({
      atFunction: "tasks.delete",
      message: "Task deleted",
      data: { id },
    });
    return Ok(row);
  };

  return {
    create,
    list,
    stats,
    get,
    update,
    complete,
    delete: deleteFn,
  };
}
