import type { AddressInfo } from "node:net";
import type { Hono } from "hono";
import type { AppConfig } from "@/config";
import type { TaskStore } from "@/db";
import type { TaskLogger } from "@/logging";
import type { TaskModel } from "@/tasks";

/** Pre-built collaborators, mainly for tests */
export interface TaskServerOverrides {
  logger?: TaskLogger;
  store?: TaskStore;
}

export interface TaskServer {
  config: AppConfig;
  logger: TaskLogger;
  store: TaskStore;
  model: TaskModel;
  app: Hono;
  /** Starts listening on the configured host and port */
  start: () => Promise<AddressInfo>;
  /** Closes the listener (if started) and then the store */
  stop: () => Promise<void>;
}
