import { createSelectSchema } from "drizzle-zod";
import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { type Task, TITLE_MAX_LENGTH, tasks } from "@/db";
import {
  type ValidationError,
  type ValidationIssue,
  validationError,
} from "@/utils";

/** Largest value a SERIAL id can hold */
export const MAX_TASK_ID = 2_147_483_647;

export const titleSchema = z
  .string({
    error: (issue) =>
      issue.input === undefined ? "Title is required" : "Title must be a string",
  })
  .trim()
  .min(1, "Title must not be empty")
  .refine(
    (title) => !title.includes("\u0000"),
    "Title must not contain NUL characters"
  )
  // Counted in code points, like the varchar column, not UTF-16 units
  .refine(
    (title) => [...title].length <= TITLE_MAX_LENGTH,
    `Title must be at most ${TITLE_MAX_LENGTH} characters`
  );

export const createTaskSchema = z.object({
  title: titleSchema,
});

export const updateTaskSchema = z
  .object({
    title: titleSchema.optional(),
    completed: z.boolean({ error: "Completed must be a boolean" }).optional(),
  })
  .refine((v) => v.title !== undefined || v.completed !== undefined, {
    message: "Provide at least one of title or completed",
  });

const DIGITS_REGEX = /^\d+$/;

/** Numbers pass through; strings (path segments) only when they are plain digits */
export const taskIdSchema = z.preprocess(
  (value) =>
    typeof value === "string" && DIGITS_REGEX.test(value)
      ? Number(value)
      : value,
  z
    .number({ error: "Task ID must be a number" })
    .int("Task ID must be an integer")
    .positive("Task ID must be positive")
    .max(MAX_TASK_ID, "Task ID is out of range")
);

export type CreateTaskInput = z.input<typeof createTaskSchema>;
export type UpdateTaskInput = z.input<typeof updateTaskSchema>;

// -- Listing --

export const TASK_FILTERS = ["all", "completed", "pending"] as const;
export type TaskFilter = (typeof TASK_FILTERS)[number];

export interface PaginationConfig {
  defaultLimit: number;
  maxLimit: number;
}

export const DEFAULT_PAGINATION: PaginationConfig = {
  defaultLimit: 100,
  maxLimit: 1000,
};

/** Domain rules for a page request; limits above the max are clamped, not rejected */
export const createListOptionsSchema = ({
  defaultLimit,
  maxLimit,
}: PaginationConfig) =>
  z.object({
    filter: z.enum(TASK_FILTERS).default("all"),
    skip: z.number().int().min(0, "skip must be at least 0").default(0),
    limit: z
      .number()
      .int()
      .min(1, "limit must be at least 1")
      .default(defaultLimit)
      .transform((limit) => Math.min(limit, maxLimit)),
  });

export type ListTasksOptions = z.input<
  ReturnType<typeof createListOptionsSchema>
>;

const toTaskFilter = (completed: "true" | "false" | undefined): TaskFilter => {
  if (completed === undefined) {
    return "all";
  }
  return completed === "true" ? "completed" : "pending";
};

/** Query-string shape of GET /tasks: coerces strings, leaves range checks to the model */
export const listTasksQuerySchema = z
  .object({
    skip: z.coerce.number({ error: "skip must be a number" }).optional(),
    limit: z.coerce.number({ error: "limit must be a number" }).optional(),
    completed: z
      .enum(["true", "false"], {
        error: "completed must be 'true' or 'false'",
      })
      .optional(),
  })
  .transform(
    ({ completed, skip, limit }): ListTasksOptions => ({
      filter: toTaskFilter(completed),
      skip,
      limit,
    })
  );

// -- Validation helpers --

/** Flattens Zod issues into field/rule pairs, root-level issues land on "input" */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join(".") || "input",
    rule: issue.code,
    message: issue.message,
  }));
}

/** Parses input against a schema without side effects */
export function validate<TSchema extends z.ZodType>(
  schema: TSchema,
  input: unknown
): Result<z.output<TSchema>, ValidationError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return Err(validationError(toValidationIssues(parsed.error)));
  }
  return Ok(parsed.data);
}

// -- Response shaping --

export const taskResponseSchema = createSelectSchema(tasks, {
  created_at: z.iso.datetime(),
  updated_at: z.iso.datetime(),
});

export type TaskResponse = z.infer<typeof taskResponseSchema>;

/** Public representation of a task row, timestamps as ISO-8601 strings */
export const toTaskResponse = (task: Task): TaskResponse =>
  taskResponseSchema.parse({
    id: task.id,
    title: task.title,
    completed: task.completed,
    created_at: task.created_at.toISOString(),
    updated_at: task.updated_at.toISOString(),
  });
