import type { DestinationStream } from "pino";
import { createLogger, type LoggerConfig, type TaskLogger } from "@/logging";
import { createStore, pushSchema, type TaskStore } from "@/db";

export interface MemorySink {
  stream: DestinationStream;
  /** Raw JSON lines in write order */
  lines: string[];
  /** Parsed log records in write order */
  records: () => Record<string, unknown>[];
}

/** In-memory pino destination so tests can assert on log output */
export function createMemorySink(): MemorySink {
  const lines: string[] = [];
  return {
    stream: {
      write(msg: string) {
        lines.push(msg.trim());
      },
    },
    lines,
    records: () =>
      lines.map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}

/** Logger writing into a fresh memory sink */
export function createTestLogger(
  config: Omit<LoggerConfig, "destination"> = {}
): { logger: TaskLogger; sink: MemorySink } {
  const sink = createMemorySink();
  const logger = createLogger("task-tracker-test", {
    level: "debug",
    ...config,
    destination: sink.stream,
  });
  return { logger, sink };
}

/** In-memory PGlite store with the tasks schema applied */
export async function createTestStore(logger: TaskLogger): Promise<TaskStore> {
  const store = createStore({ url: "memory://" });
  const pushed = await pushSchema({ db: store.db, logger });
  if (pushed.isErr) {
    throw new Error(`Test schema setup failed: ${pushed.error.message}`);
  }
  return store;
}
