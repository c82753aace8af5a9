// biome-ignore lint/performance/noBarrelFile: Public API entry point for the client package
export { createTaskClient } from "./create-client.js";
export { type HttpMethod, sendRequest, toQueryString } from "./request.js";
export type {
  ApiErrorBody,
  ClientResult,
  CreateTaskParams,
  FetchLike,
  FetchOptions,
  HealthStatus,
  ListTasksParams,
  Task,
  TaskClient,
  TaskClientConfig,
  TaskList,
  TaskStats,
  UpdateTaskParams,
} from "./types.js";
