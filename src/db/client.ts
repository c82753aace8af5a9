import { mkdirSync } from "node:fs";
import { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { drizzle as drizzlePg } from "drizzle-orm/node-postgres";
import { drizzle as drizzlePglite } from "drizzle-orm/pglite";
import pg from "pg";
import { Err, Ok, safeTry } from "slang-ts";
import type { TaskLogger } from "@/logging";
// biome-ignore lint/performance/noNamespaceImport: Drizzle requires namespace import to pass all table schemas
import * as schema from "./schema";
import type {
  StoreConfig,
  StoreDriver,
  TaskDatabase,
  TaskStore,
} from "./types";

const DEFAULT_POOL_SIZE = 10;
const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
const IDLE_TIMEOUT_MS = 30_000;

const POSTGRES_URL_REGEX = /^postgres(ql)?:\/\//;
const PGLITE_URL_PREFIX = "pglite://";
const MEMORY_URL = "memory://";
const URL_CREDENTIALS_REGEX = /\/\/([^:/@]+):[^@]*@/;

type ParsedStoreUrl =
  | { driver: "postgres"; connectionString: string }
  | { driver: "pglite"; dataDir: string | null };

/** Splits a store URL into the driver and its connection target */
export function parseStoreUrl(url: string): ParsedStoreUrl {
  if (POSTGRES_URL_REGEX.test(url)) {
    return { driver: "postgres", connectionString: url };
  }
  if (url === MEMORY_URL) {
    return { driver: "pglite", dataDir: null };
  }
  if (url.startsWith(PGLITE_URL_PREFIX)) {
    const dataDir = url.slice(PGLITE_URL_PREFIX.length);
    if (!dataDir) {
      throw new Error("createStore: pglite:// URL requires a directory");
    }
    return { driver: "pglite", dataDir };
  }
  throw new Error(
    `createStore: Unsupported database URL scheme in '${url}'. Use postgres://, pglite://<dir> or memory://`
  );
}

/** Store URL with credentials masked, safe to log */
export function redactStoreUrl(url: string): string {
  return url.replace(URL_CREDENTIALS_REGEX, "//$1:****@");
}

function createStoreHandle(
  driver: StoreDriver,
  db: TaskDatabase,
  shutdown: () => Promise<void>
): TaskStore {
  let closed = false;

  return {
    driver,
    db,
    ping: async () => {
      const result = await safeTry(() => db.execute(sql`select 1`));
      if (result.isErr) {
        return Err(result.error);
      }
      return Ok(true as const);
    },
    close: async () => {
      if (closed) {
        return;
      }
      closed = true;
      await shutdown();
    },
  };
}

/**
 * Opens the task store behind a Drizzle instance.
 *
 * PostgreSQL URLs get a node-postgres pool: plain queries check a connection
 * out and return it when they settle, transactions hold one connection until
 * commit or rollback. PGlite runs in process, persisted to a directory or
 * kept in memory.
 */
export function createStore(
  config: StoreConfig,
  logger?: TaskLogger
): TaskStore {
  const parsed = parseStoreUrl(config.url);

  if (parsed.driver === "postgres") {
    const pool = new pg.Pool({
      connectionString: parsed.connectionString,
      max: config.poolSize ?? DEFAULT_POOL_SIZE,
      connectionTimeoutMillis:
        config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      idleTimeoutMillis: IDLE_TIMEOUT_MS,
    });

    // An idle client losing its connection emits on the pool; unhandled it kills the process
    pool.on("error", (error) => {
      logger?.error({
        atFunction: "createStore",
        message: "Idle database connection failed",
        data: { error },
      });
    });

    const db = drizzlePg({ client: pool, schema });
    return createStoreHandle("postgres", db, () => pool.end());
  }

  if (parsed.dataDir) {
    mkdirSync(parsed.dataDir, { recursive: true });
  }
  const pglite = parsed.dataDir ? new PGlite(parsed.dataDir) : new PGlite();
  const db = drizzlePglite({ client: pglite, schema });
  return createStoreHandle("pglite", db, () => pglite.close());
}
