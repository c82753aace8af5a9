import { z } from "zod";
import {
  createTaskSchema,
  taskResponseSchema,
  updateTaskSchema,
} from "@/tasks/schemas";

interface OpenApiParams {
  serverName: string;
  version: string;
  baseUrl: string;
}

const errorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
    log_id: z.string().optional(),
  }),
});

const statsSchema = z.object({
  total: z.int(),
  completed: z.int(),
  pending: z.int(),
});

const taskListSchema = statsSchema.extend({
  tasks: z.array(taskResponseSchema),
});

const json = (schema: z.ZodType, io: "input" | "output" = "output") => ({
  "application/json": {
    schema: z.toJSONSchema(schema, { io, unrepresentable: "any" }),
  },
});

const errorResponse = (description: string) => ({
  description,
  content: json(errorResponseSchema),
});

const idParameter = {
  name: "id",
  in: "path",
  required: true,
  schema: { type: "integer", minimum: 1 },
};

/**
 * OpenAPI 3.1 description of the task routes, generated from the same
 * Zod schemas the handlers validate with
 */
export function createOpenApiDocument(params: OpenApiParams) {
  const { serverName, version, baseUrl } = params;
  const tasksPath = `${baseUrl}/tasks`;
  const taskPath = `${tasksPath}/{id}`;

  const taskResponse = (description: string) => ({
    description,
    content: json(taskResponseSchema),
  });

  return {
    openapi: "3.1.0",
    info: { title: serverName, version },
    paths: {
      [tasksPath]: {
        get: {
          summary: "List tasks with counts",
          parameters: [
            {
              name: "skip",
              in: "query",
              schema: { type: "integer", minimum: 0, default: 0 },
            },
            {
              name: "limit",
              in: "query",
              schema: { type: "integer", minimum: 1 },
            },
            {
              name: "completed",
              in: "query",
              schema: { type: "string", enum: ["true", "false"] },
            },
          ],
          responses: {
            200: { description: "Task page", content: json(taskListSchema) },
            400: errorResponse("Invalid query"),
            503: errorResponse("Store unavailable"),
          },
        },
        post: {
          summary: "Create a task",
          requestBody: {
            required: true,
            content: json(createTaskSchema, "input"),
          },
          responses: {
            201: taskResponse("Created task"),
            400: errorResponse("Invalid body"),
            503: errorResponse("Store unavailable"),
          },
        },
      },
      [`${tasksPath}/stats`]: {
        get: {
          summary: "Task counts",
          responses: {
            200: { description: "Counts", content: json(statsSchema) },
            503: errorResponse("Store unavailable"),
          },
        },
      },
      [taskPath]: {
        get: {
          summary: "Get a task",
          parameters: [idParameter],
          responses: {
            200: taskResponse("Task"),
            404: errorResponse("Task not found"),
          },
        },
        put: {
          summary: "Update title and/or completed",
          parameters: [idParameter],
          requestBody: {
            required: true,
            content: json(updateTaskSchema, "input"),
          },
          responses: {
            200: taskResponse("Updated task"),
            400: errorResponse("Invalid body"),
            404: errorResponse("Task not found"),
          },
        },
        delete: {
          summary: "Delete a task",
          parameters: [idParameter],
          responses: {
            204: { description: "Deleted" },
            404: errorResponse("Task not found"),
          },
        },
      },
      [`${taskPath}/complete`]: {
        post: {
          summary: "Mark a task completed",
          parameters: [idParameter],
          responses: {
            200: taskResponse("Completed task"),
            404: errorResponse("Task not found"),
          },
        },
      },
    },
  };
}
