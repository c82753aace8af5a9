// biome-ignore lint/performance/noBarrelFile: Public API entry point for the store
export { createStore, parseStoreUrl, redactStoreUrl } from "./client";
export { pushSchema, SCHEMA_STATEMENTS } from "./migrate";
export { TITLE_MAX_LENGTH, tasks } from "./schema";
export type {
  NewTask,
  StoreConfig,
  StoreDriver,
  Task,
  TaskDatabase,
  TaskStore,
} from "./types";
