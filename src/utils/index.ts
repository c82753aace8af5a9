// biome-ignore lint/performance/noBarrelFile: Shared error and logging helpers
export { createDiagnosticsLog } from "./diagnostics-log";
export {
  type NotFoundError,
  notFoundError,
  type StoreUnavailableError,
  storeUnavailableError,
  type TaskError,
  type TaskErrorCode,
  type ValidationError,
  type ValidationIssue,
  validationError,
} from "./errors";
export { handleError } from "./handle-error";
