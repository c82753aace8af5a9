import { sql } from "drizzle-orm";
import {
  boolean,
  check,
  index,
  pgTable,
  serial,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

export const TITLE_MAX_LENGTH = 200;

export const tasks = pgTable(
  "tasks",
  {
    id: serial("id").primaryKey(),
    title: varchar("title", { length: TITLE_MAX_LENGTH }).notNull(),
    completed: boolean("completed").notNull().default(false),
    created_at: timestamp("created_at", { withTimezone: true, precision: 3 })
      .notNull()
      .defaultNow(),
    updated_at: timestamp("updated_at", { withTimezone: true, precision: 3 })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index("tasks_completed_idx").on(table.completed),
    check("tasks_title_not_blank", sql`length(btrim(${table.title})) > 0`),
    check(
      "tasks_updated_after_created",
      sql`${table.updated_at} >= ${table.created_at}`
    ),
  ]
);
