// Configuration: environment parsing into a typed AppConfig
export { type AppConfig, loadConfig } from "./config";
// CORS types: origin control for the REST app
export type { CorsConfig, CorsOptions } from "./cors";
// Store: drizzle schema, driver selection and schema bootstrap
export {
  createStore,
  pushSchema,
  type StoreConfig,
  type Task,
  type TaskDatabase,
  type TaskStore,
  tasks,
} from "./db";
// Logging: pino-backed structured logs with log ids
export {
  createLogger,
  type Log,
  type LoggerConfig,
  type TaskLogger,
} from "./logging";
// REST: Hono app factory and response shapes
export {
  createRestApp,
  type ErrorResponse,
  type RestConfig,
  type TaskListResponse,
} from "./rest";
// Server factory: the main entry point for embedding the service
export {
  createTaskServer,
  type TaskServer,
  type TaskServerOverrides,
} from "./server";
// Tasks: validation schemas and the data-access model
export {
  createTaskModel,
  type CreateTaskInput,
  type ListTasksOptions,
  type TaskModel,
  type TaskPage,
  type TaskResponse,
  type TaskStats,
  toTaskResponse,
  type UpdateTaskInput,
} from "./tasks";
// Utilities: error taxonomy and handling
export {
  handleError,
  type TaskError,
  type TaskErrorCode,
  type ValidationIssue,
} from "./utils";
