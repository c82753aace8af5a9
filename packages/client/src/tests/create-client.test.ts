import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTaskClient } from "../create-client.js";
import type { TaskClientConfig } from "../types.js";

const config: TaskClientConfig = {
  baseUrl: "http://localhost:8000",
  basePath: "/api",
};

const task = {
  id: 7,
  title: "Review PR",
  completed: false,
  created_at: "2025-03-01T10:00:00.000Z",
  updated_at: "2025-03-01T10:00:00.000Z",
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status });

const lastCall = () => {
  const [url, init] = vi.mocked(fetch).mock.calls.at(-1) ?? [];
  return { url, init };
};

beforeEach(() => {
  vi.stubGlobal("fetch", vi.fn());
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("createTaskClient", () => {
  it("should return an object with every task method", () => {
    const client = createTaskClient(config);

    for (const method of [
      "list",
      "get",
      "create",
      "update",
      "complete",
      "remove",
      "stats",
      "health",
    ] as const) {
      expect(typeof client[method]).toBe("function");
    }
  });
});

describe("client.list", () => {
  it("should map params to the query string", async () => {
    vi.mocked(fetch).mockResolvedValue(
      jsonResponse({ tasks: [task], total: 1, completed: 0, pending: 1 })
    );

    const result = await createTaskClient(config).list({
      completed: false,
      limit: 10,
    });

    expect(result.error).toBeNull();
    expect(result.data).toEqual({
      tasks: [task],
      total: 1,
      completed: 0,
      pending: 1,
    });
    expect(lastCall().url).toBe(
      "http://localhost:8000/api/tasks?completed=false&limit=10"
    );
  });

  it("should omit the query string without params", async () => {
    vi.mocked(fetch).mockResolvedValue(
      jsonResponse({ tasks: [], total: 0, completed: 0, pending: 0 })
    );

    await createTaskClient(config).list();

    expect(lastCall().url).toBe("http://localhost:8000/api/tasks");
  });
});

describe("task methods", () => {
  it("should create with POST and a JSON body", async () => {
    vi.mocked(fetch).mockResolvedValue(jsonResponse(task, 201));

    const result = await createTaskClient(config).create({
      title: "Review PR",
    });

    expect(result.data).toEqual(task);
    const { url, init } = lastCall();
    expect(url).toBe("http://localhost:8000/api/tasks");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"title":"Review PR"}');
  });

  it("should update with PUT on the task path", async () => {
    vi.mocked(fetch).mockResolvedValue(jsonResponse({ ...task, title: "New" }));

    await createTaskClient(config).update(7, { title: "New" });

    const { url, init } = lastCall();
    expect(url).toBe("http://localhost:8000/api/tasks/7");
    expect(init?.method).toBe("PUT");
  });

  it("should complete with POST on the complete path", async () => {
    vi.mocked(fetch).mockResolvedValue(
      jsonResponse({ ...task, completed: true })
    );

    const result = await createTaskClient(config).complete(7);

    expect(result.data).toEqual({ ...task, completed: true });
    expect(lastCall().url).toBe("http://localhost:8000/api/tasks/7/complete");
  });

  it("should remove with DELETE and return null data", async () => {
    vi.mocked(fetch).mockResolvedValue(new Response(null, { status: 204 }));

    const result = await createTaskClient(config).remove(7);

    expect(result).toEqual({ error: null, data: null });
    expect(lastCall().init?.method).toBe("DELETE");
  });

  it("should read stats under the base path", async () => {
    vi.mocked(fetch).mockResolvedValue(
      jsonResponse({ total: 2, completed: 1, pending: 1 })
    );

    await createTaskClient(config).stats();

    expect(lastCall().url).toBe("http://localhost:8000/api/tasks/stats");
  });

  it("should check health at the server root", async () => {
    vi.mocked(fetch).mockResolvedValue(
      jsonResponse({
        status: "healthy",
        database: "connected",
        timestamp: "2025-03-01T10:00:00.000Z",
      })
    );

    const result = await createTaskClient(config).health();

    expect(result.error === null && result.data.status).toBe("healthy");
    expect(lastCall().url).toBe("http://localhost:8000/health");
  });
});
