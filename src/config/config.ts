import { z } from "zod";
import type { StoreConfig } from "@/db";
import type { LoggerConfig } from "@/logging";
import type { RestConfig } from "@/rest/types";
import type { PaginationConfig } from "@/tasks";

export const SERVER_NAME = "task-tracker";
export const SERVER_VERSION = "1.0.0";

export const DEFAULT_CORS_ORIGINS = [
  "http://localhost:3000",
  "http://127.0.0.1:3000",
];

export interface AppConfig {
  serverName: string;
  version: string;
  database: StoreConfig;
  rest: RestConfig;
  logging: LoggerConfig & { level: NonNullable<LoggerConfig["level"]> };
  pagination: PaginationConfig;
  diagnostics: boolean;
}

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"], {
      error: "must be one of true, false, 1, 0",
    })
    .default(fallback)
    .transform((v) => v === "true" || v === "1");

const positiveInt = (fallback: number) =>
  z.coerce
    .number({ error: "must be a number" })
    .int("must be an integer")
    .positive("must be positive")
    .default(fallback);

const commaList = z
  .string()
  .transform((v) =>
    v
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean)
  );

const envSchema = z
  .object({
    DATABASE_URL: z
      .string()
      .min(1, "must not be empty")
      .default("pglite://./data"),
    DATABASE_POOL_SIZE: positiveInt(10),
    DATABASE_CONNECT_TIMEOUT_MS: positiveInt(5000),
    API_HOST: z.string().min(1, "must not be empty").default("0.0.0.0"),
    API_PORT: z.coerce
      .number({ error: "must be a number" })
      .int("must be an integer")
      .min(1, "must be between 1 and 65535")
      .max(65_535, "must be between 1 and 65535")
      .default(8000),
    API_BASE_PATH: z
      .string()
      .regex(/^(\/[\w.-]+)*\/?$/, "must be empty or a path like /api/v1")
      .default("")
      .transform((v) => v.replace(/\/+$/, "")),
    CORS_ORIGINS: commaList.default(() => [...DEFAULT_CORS_ORIGINS]),
    LOG_LEVEL: z
      .string()
      .default("info")
      .transform((v) => v.toLowerCase())
      .pipe(
        z.enum(["debug", "info", "warn", "error", "silent"], {
          error: "must be one of debug, info, warn, error, silent",
        })
      ),
    LOG_FILE: z.string().min(1).optional(),
    DEFAULT_PAGE_SIZE: positiveInt(100),
    MAX_PAGE_SIZE: positiveInt(1000),
    ENABLE_DOCS: booleanFlag("true"),
    DIAGNOSTICS: booleanFlag("false"),
  })
  .refine((env) => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
    message: "DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE",
    path: ["DEFAULT_PAGE_SIZE"],
  });

/** Empty strings count as unset so `FOO=` in a .env file falls back to the default */
const dropEmpty = (env: Record<string, string | undefined>) =>
  Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== ""
    )
  );

/**
 * Reads application configuration from environment variables.
 *
 * Throws a single error naming every invalid variable; configuration is
 * the one place the service fails fast instead of returning a Result.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    serverName: SERVER_NAME,
    version: SERVER_VERSION,
    database: {
      url: vars.DATABASE_URL,
      poolSize: vars.DATABASE_POOL_SIZE,
      connectTimeoutMs: vars.DATABASE_CONNECT_TIMEOUT_MS,
    },
    rest: {
      baseUrl: vars.API_BASE_PATH,
      host: vars.API_HOST,
      port: vars.API_PORT,
      allowedOrigins: vars.CORS_ORIGINS,
      enableDocs: vars.ENABLE_DOCS,
      diagnostics: vars.DIAGNOSTICS,
    },
    logging: {
      level: vars.LOG_LEVEL,
      destination: vars.LOG_FILE,
    },
    pagination: {
      defaultLimit: vars.DEFAULT_PAGE_SIZE,
      maxLimit: vars.MAX_PAGE_SIZE,
    },
    diagnostics: vars.DIAGNOSTICS,
  };
}
