import type { CorsConfig } from "@/cors/types";
import type { TaskStats } from "@/tasks";
import type { TaskResponse } from "@/tasks/schemas";

export interface RestConfig {
  /** Prefix for the task routes, "" or e.g. "/api/v1" */
  baseUrl: string;
  host?: string;
  port?: number;
  diagnostics?: boolean;
  /** Serve GET /openapi.json. Default: true */
  enableDocs?: boolean;
  allowedOrigins: string[];
  cors?: CorsConfig;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    log_id?: string;
  };
}

export interface TaskListResponse extends TaskStats {
  tasks: TaskResponse[];
}

export interface WelcomeResponse {
  message: string;
  version: string;
  status: "healthy";
  docs: string | null;
}

export type HealthResponse =
  | { status: "healthy"; database: "connected"; timestamp: string }
  | {
      status: "unhealthy";
      database: "disconnected";
      error: string;
      timestamp: string;
    };
