// biome-ignore lint/performance/noBarrelFile: Public API entry point for the REST layer
export { ERROR_STATUS, respondWithError, toErrorBody } from "./error-mapping";
export { requestLogger } from "./middleware";
export { createOpenApiDocument } from "./openapi";
export { createRestApp } from "./rest";
export type {
  ErrorResponse,
  HealthResponse,
  RestConfig,
  TaskListResponse,
  WelcomeResponse,
} from "./types";
