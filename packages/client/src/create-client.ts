import { sendRequest, toQueryString } from "./request.js";
import type { TaskClient, TaskClientConfig } from "./types.js";

/**
 * Creates a typed client for the task API.
 *
 * Every method resolves to `{ error, data }` and never throws: network
 * failures, timeouts and non-2xx answers all land in `error`.
 *
 * @param config - The client configuration including baseUrl
 * @returns An object with list, get, create, update, complete, remove, stats and health
 *
 * @example
 * const tasks = createTaskClient({ baseUrl: "http://localhost:8000" });
 * const { error, data } = await tasks.create({ title: "Buy milk" });
 * if (!error) {
 *   await tasks.complete(data.id);
 * }
 */
export function createTaskClient(config: TaskClientConfig): TaskClient {
  const tasksPath = `${config.basePath ?? ""}/tasks`;
  const taskPath = (id: number) => `${tasksPath}/${encodeURIComponent(id)}`;

  return {
    list: (params = {}, fetchOptions) =>
      sendRequest(
        config,
        "GET",
        `${tasksPath}${toQueryString({ ...params })}`,
        undefined,
        fetchOptions
      ),

    get: (id, fetchOptions) =>
      sendRequest(config, "GET", taskPath(id), undefined, fetchOptions),

    create: (params, fetchOptions) =>
      sendRequest(config, "POST", tasksPath, params, fetchOptions),

    update: (id, params, fetchOptions) =>
      sendRequest(config, "PUT", taskPath(id), params, fetchOptions),

    complete: (id, fetchOptions) =>
      sendRequest(
        config,
        "POST",
        `${taskPath(id)}/complete`,
        undefined,
        fetchOptions
      ),

    remove: (id, fetchOptions) =>
      sendRequest(config, "DELETE", taskPath(id), undefined, fetchOptions),

    stats: (fetchOptions) =>
      sendRequest(
        config,
        "GET",
        `${tasksPath}/stats`,
        undefined,
        fetchOptions
      ),

    /** Health lives at the server root, outside any base path */
    health: (fetchOptions) =>
      sendRequest(config, "GET", "/health", undefined, fetchOptions),
  };
}
