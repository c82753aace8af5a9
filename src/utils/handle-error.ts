import { Err } from "slang-ts";
import type { TaskLogger } from "@/logging";
import type { TaskError } from "./errors";

export interface HandleErrorParams<E extends TaskError> {
  error: E;
  logger: TaskLogger;
  data?: unknown;
  atFunction?: string;
}

const CALLER_LINE_REGEX = /at\s+(\S+)\s+/;

function inferCallerName(): string {
  const stack = new Error("capture stack trace").stack;
  const callerLine = stack?.split("\n")[3] ?? "";
  const match = callerLine.match(CALLER_LINE_REGEX);
  return match?.[1] ?? "unknown";
}

/**
 * Logs a task error and wraps it in Err with the log id attached.
 * Client errors (validation, not found) log at warn, store failures at error.
 */
export function handleError<E extends TaskError>(
  params: HandleErrorParams<E>
) {
  const { error, logger, data } = params;
  const atFunction = params.atFunction ?? inferCallerName();
  const log = error.code === "STORE_UNAVAILABLE" ? logger.error : logger.warn;

  const log_id = log({
    atFunction,
    message: error.message,
    data: { code: error.code, ...(isRecord(data) ? data : { detail: data }) },
  });

  return Err<E>({ ...error, log_id });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
