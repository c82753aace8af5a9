/** Task as the API returns it, timestamps are ISO-8601 strings */
export interface Task {
  id: number;
  title: string;
  completed: boolean;
  created_at: string;
  updated_at: string;
}

export interface TaskStats {
  total: number;
  completed: number;
  pending: number;
}

/** One page of tasks; counts cover every task, not just the page */
export interface TaskList extends TaskStats {
  tasks: Task[];
}

export interface ListTasksParams {
  skip?: number;
  limit?: number;
  /** true for completed only, false for pending only, omit for all */
  completed?: boolean;
}

export interface CreateTaskParams {
  title: string;
}

export interface UpdateTaskParams {
  title?: string;
  completed?: boolean;
}

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  database: "connected" | "disconnected";
  timestamp: string;
  error?: string;
}

/** Error body the API sends with every non-2xx task response */
export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
    log_id?: string;
  };
}

/** Result pattern: { error, data } (graceful failure over throwing) */
export type ClientResult<T> =
  | { error: null; data: T }
  | { error: string; data: ApiErrorBody | null };

export type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

/** Client configuration */
export interface TaskClientConfig {
  /** Server origin, e.g. "http://localhost:8000"; "" for same-origin */
  baseUrl: string;
  /** Prefix of the task routes, matching the server's API_BASE_PATH. Default: "" */
  basePath?: string;
  credentials?: "include" | "omit" | "same-origin";
  headers?: Record<string, string>;
  /** Optional timeout in ms (default: 30000) */
  timeout?: number;
  /** Fetch implementation, defaults to the global fetch */
  fetch?: FetchLike;
}

/** Options for individual fetch calls (body and method are managed internally) */
export interface FetchOptions extends Omit<RequestInit, "body" | "method"> {
  timeout?: number;
}

/** Interface for the typed client */
export interface TaskClient {
  /** Page through tasks, optionally filtered by completion */
  list: (
    params?: ListTasksParams,
    fetchOptions?: FetchOptions
  ) => Promise<ClientResult<TaskList>>;
  get: (id: number, fetchOptions?: FetchOptions) => Promise<ClientResult<Task>>;
  create: (
    params: CreateTaskParams,
    fetchOptions?: FetchOptions
  ) => Promise<ClientResult<Task>>;
  update: (
    id: number,
    params: UpdateTaskParams,
    fetchOptions?: FetchOptions
  ) => Promise<ClientResult<Task>>;
  complete: (
    id: number,
    fetchOptions?: FetchOptions
  ) => Promise<ClientResult<Task>>;
  /** Delete a task; data is null on success */
  remove: (
    id: number,
    fetchOptions?: FetchOptions
  ) => Promise<ClientResult<null>>;
  stats: (fetchOptions?: FetchOptions) => Promise<ClientResult<TaskStats>>;
  health: (fetchOptions?: FetchOptions) => Promise<ClientResult<HealthStatus>>;
}
