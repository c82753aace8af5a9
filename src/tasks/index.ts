// biome-ignore lint/performance/noBarrelFile: Public API entry point for the tasks module
export {
  createTaskModel,
  type TaskModel,
  type TaskModelOptions,
  type TaskPage,
  type TaskStats,
} from "./model";
export {
  type CreateTaskInput,
  createListOptionsSchema,
  createTaskSchema,
  DEFAULT_PAGINATION,
  type ListTasksOptions,
  listTasksQuerySchema,
  MAX_TASK_ID,
  type PaginationConfig,
  TASK_FILTERS,
  type TaskFilter,
  type TaskResponse,
  taskIdSchema,
  taskResponseSchema,
  titleSchema,
  toTaskResponse,
  toValidationIssues,
  type UpdateTaskInput,
  updateTaskSchema,
  validate,
} from "./schemas";
