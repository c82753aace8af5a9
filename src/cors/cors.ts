import type { Hono } from "hono";
import { cors } from "hono/cors";
import type { RestConfig } from "@/rest/types";
import type { CorsOptions } from "./types";

/**
 * Origin callback for the cors middleware: echoes listed origins,
 * answers "*" when no list is configured, and "" (no header) otherwise
 */
export const createOriginResolver =
  (allowedOrigins: string[]) =>
  (reqOrigin: string): string => {
    if (allowedOrigins.length === 0) {
      return "*";
    }
    return allowedOrigins.includes(reqOrigin) ? reqOrigin : "";
  };

/**
 * Build default CORS options from REST config
 */
export const buildDefaultCorsOptions = (config: RestConfig): CorsOptions => {
  const defaults = config.cors?.defaults;

  return {
    origin: defaults?.origin ?? createOriginResolver(config.allowedOrigins),
    credentials: defaults?.credentials ?? true,
    allowHeaders: defaults?.allowHeaders ?? ["Content-Type", "Authorization"],
    allowMethods: defaults?.allowMethods ?? [
      "GET",
      "POST",
      "PUT",
      "DELETE",
      "OPTIONS",
    ],
    exposeHeaders: defaults?.exposeHeaders ?? ["Content-Length"],
    maxAge: defaults?.maxAge ?? 600,
  };
};

/**
 * Apply CORS configuration to a Hono app based on RestConfig
 */
export const applyCorsConfig = (app: Hono, config: RestConfig): void => {
  if (config.cors?.enabled === false) {
    return;
  }

  app.use("*", cors(buildDefaultCorsOptions(config)));
};
