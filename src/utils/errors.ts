/** One failed validation rule, pinned to the input field that broke it */
export interface ValidationIssue {
  field: string;
  rule: string;
  message: string;
}

export interface ValidationError {
  code: "VALIDATION_ERROR";
  message: string;
  issues: ValidationIssue[];
  log_id?: string;
}

export interface NotFoundError {
  code: "TASK_NOT_FOUND";
  message: string;
  id: number;
  log_id?: string;
}

export interface StoreUnavailableError {
  code: "STORE_UNAVAILABLE";
  message: string;
  log_id?: string;
}

export type TaskError = ValidationError | NotFoundError | StoreUnavailableError;

export type TaskErrorCode = TaskError["code"];

export const validationError = (issues: ValidationIssue[]): ValidationError => ({
  code: "VALIDATION_ERROR",
  message: issues.map((i) => `${i.field}: ${i.message}`).join("; "),
  issues,
});

export const notFoundError = (id: number): NotFoundError => ({
  code: "TASK_NOT_FOUND",
  message: `Task with ID ${id} does not exist`,
  id,
});

export const storeUnavailableError = (
  message = "Task store is unavailable"
): StoreUnavailableError => ({
  code: "STORE_UNAVAILABLE",
  message,
});
