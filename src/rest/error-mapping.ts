import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { TaskError, TaskErrorCode } from "@/utils";
import type { ErrorResponse } from "./types";

export const ERROR_STATUS = {
  VALIDATION_ERROR: 400,
  TASK_NOT_FOUND: 404,
  STORE_UNAVAILABLE: 503,
} as const satisfies Record<TaskErrorCode, ContentfulStatusCode>;

const errorDetails = (error: TaskError): unknown => {
  switch (error.code) {
    case "VALIDATION_ERROR":
      return error.issues;
    case "TASK_NOT_FOUND":
      return { id: error.id };
    default:
      return undefined;
  }
};

/** JSON body for a task error; `details` and `log_id` only when present */
export const toErrorBody = (error: TaskError): ErrorResponse => {
  const details = errorDetails(error);
  return {
    error: {
      code: error.code,
      message: error.message,
      ...(details !== undefined && { details }),
      ...(error.log_id !== undefined && { log_id: error.log_id }),
    },
  };
};

export const respondWithError = (c: Context, error: TaskError) =>
  c.json(toErrorBody(error), ERROR_STATUS[error.code]);
