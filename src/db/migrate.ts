import { type SQL, sql } from "drizzle-orm";
import { Ok, type Result, safeTry } from "slang-ts";
import type { TaskLogger } from "@/logging";
import {
  handleError,
  type StoreUnavailableError,
  storeUnavailableError,
} from "@/utils";
import { TITLE_MAX_LENGTH } from "./schema";
import type { TaskDatabase } from "./types";

/** Idempotent DDL matching ./schema.ts, one statement per entry */
export const SCHEMA_STATEMENTS: SQL[] = [
  sql`
    CREATE TABLE IF NOT EXISTS tasks (
      id SERIAL PRIMARY KEY,
      title VARCHAR(${sql.raw(String(TITLE_MAX_LENGTH))}) NOT NULL,
      completed BOOLEAN NOT NULL DEFAULT false,
      created_at TIMESTAMPTZ(3) NOT NULL DEFAULT now(),
      updated_at TIMESTAMPTZ(3) NOT NULL DEFAULT now(),
      CONSTRAINT tasks_title_not_blank CHECK (length(btrim(title)) > 0),
      CONSTRAINT tasks_updated_after_created CHECK (updated_at >= created_at)
    )
  `,
  sql`CREATE INDEX IF NOT EXISTS tasks_completed_idx ON tasks (completed)`,
];

/**
 * Creates the tasks table and its index when missing.
 * Runs on every boot; existing tables are left untouched.
 */
export const pushSchema = async ({
  db,
  logger,
}: {
  db: TaskDatabase;
  logger: TaskLogger;
}): Promise<Result<true, StoreUnavailableError>> => {
  for (const statement of SCHEMA_STATEMENTS) {
    const result = await safeTry(() => db.execute(statement));
    if (result.isErr) {
      return handleError({
        error: storeUnavailableError("Failed to apply task schema"),
        logger,
        data: { error: result.error },
        atFunction: "pushSchema",
      });
    }
  }

  logger.debug({ atFunction: "pushSchema", message: "Task schema ready" });
  return Ok(true as const);
};
