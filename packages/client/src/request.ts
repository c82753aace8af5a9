import { safeTry } from "./safe-try.js";
import type {
  ApiErrorBody,
  ClientResult,
  FetchOptions,
  TaskClientConfig,
} from "./types.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Sends one JSON request to the task API.
 * Uses fetch + safeTry for crash safety and consistent { error, data } results.
 */
export async function sendRequest<T>(
  config: TaskClientConfig,
  method: HttpMethod,
  path: string,
  body?: unknown,
  options: FetchOptions = {}
): Promise<ClientResult<T>> {
  const { timeout = config.timeout ?? DEFAULT_TIMEOUT_MS, ...fetchOptions } =
    options;
  const fetchFn = config.fetch ?? fetch;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  const headers = new Headers(config.headers);
  new Headers(fetchOptions.headers).forEach((value, key) => {
    headers.set(key, value);
  });
  if (body !== undefined) {
    headers.set("Content-Type", "application/json");
  }

  const requestResult = await safeTry(async () => {
    const response = await fetchFn(joinUrl(config.baseUrl, path), {
      ...fetchOptions,
      method,
      headers,
      credentials: config.credentials ?? fetchOptions.credentials,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });
    return { response, payload: await readPayload(response) };
  });

  clearTimeout(timeoutId);

  if (requestResult.isErr) {
    return resolveError(requestResult.error);
  }

  const { response, payload } = requestResult.value;

  if (!response.ok) {
    return {
      error: describeFailure(response.status, payload),
      data: isApiErrorBody(payload) ? payload : null,
    };
  }

  // Untyped JSON from the server, shaped by the route contract
  return { error: null, data: payload as T };
}

/** Builds "?skip=..&limit=.." from defined values only */
export function toQueryString(
  params: Record<string, string | number | boolean | undefined>
): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : "";
}

const joinUrl = (baseUrl: string, path: string) =>
  `${baseUrl.replace(/\/+$/, "")}${path}`;

/** Empty bodies (204) read as null */
async function readPayload(response: Response): Promise<unknown> {
  const text = await response.text();
  return text ? JSON.parse(text) : null;
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  if (typeof value !== "object" || value === null || !("error" in value)) {
    return false;
  }
  const { error } = value;
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    "message" in error &&
    typeof error.message === "string"
  );
}

/** Prefers the API's own message; health failures send a plain string */
function describeFailure(status: number, payload: unknown): string {
  if (isApiErrorBody(payload)) {
    return payload.error.message;
  }
  if (
    typeof payload === "object" &&
    payload !== null &&
    "error" in payload &&
    typeof payload.error === "string"
  ) {
    return payload.error;
  }
  return `Request failed with status ${status}`;
}

const isAbortError = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "name" in error &&
  error.name === "AbortError";

/** Resolve error from safeTry into a ClientResult */
function resolveError<T>(error: unknown): ClientResult<T> {
  if (isAbortError(error)) {
    return { error: "Request timed out", data: null };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { error: message, data: null };
}
