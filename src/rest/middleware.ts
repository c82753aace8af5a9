import type { MiddlewareHandler } from "hono";
import type { TaskLogger } from "@/logging";

/**
 * Logs one line per request after the handler ran: method, path, status, duration
 */
export const requestLogger =
  (logger: TaskLogger): MiddlewareHandler =>
  async (c, next) => {
    const startedAt = Date.now();
    await next();

    const durationMs = Date.now() - startedAt;
    const { method, path } = c.req;
    const { status } = c.res;
    logger.info({
      atFunction: "rest.request",
      message: `${method} ${path} ${status}`,
      data: { method, path, status, durationMs },
    });
  };
