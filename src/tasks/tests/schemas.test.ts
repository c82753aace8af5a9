import { describe, expect, it } from "vitest";
import {
  createListOptionsSchema,
  createTaskSchema,
  listTasksQuerySchema,
  taskIdSchema,
  toTaskResponse,
  updateTaskSchema,
  validate,
} from "../schemas";

describe("createTaskSchema", () => {
  it("should trim the title", () => {
    const result = validate(createTaskSchema, { title: "  Buy milk  " });

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value).toEqual({ title: "Buy milk" });
    }
  });

  it("should reject a whitespace-only title", () => {
    const result = validate(createTaskSchema, { title: "   " });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.issues).toEqual([
        { field: "title", rule: "too_small", message: "Title must not be empty" },
      ]);
    }
  });

  it("should accept 200 characters and reject 201", () => {
    const ok = validate(createTaskSchema, { title: "a".repeat(200) });
    const tooLong = validate(createTaskSchema, { title: "a".repeat(201) });

    expect(ok.isOk).toBe(true);
    expect(tooLong.isErr).toBe(true);
    if (tooLong.isErr) {
      expect(tooLong.error.message).toBe(
        "title: Title must be at most 200 characters"
      );
    }
  });

  it("should count characters, not UTF-16 units", () => {
    const ok = validate(createTaskSchema, { title: "😀".repeat(200) });
    const tooLong = validate(createTaskSchema, { title: "😀".repeat(201) });

    expect(ok.isOk && ok.value.title).toBe("😀".repeat(200));
    expect(tooLong.isErr && tooLong.error.message).toBe(
      "title: Title must be at most 200 characters"
    );
  });

  it("should reject a NUL character", () => {
    const result = validate(createTaskSchema, { title: "a\u0000b" });

    expect(result.isErr && result.error.message).toBe(
      "title: Title must not contain NUL characters"
    );
  });

  it("should tell a missing title from a wrong type", () => {
    const missing = validate(createTaskSchema, {});
    const wrongType = validate(createTaskSchema, { title: 42 });

    expect(missing.isErr && missing.error.issues[0]?.message).toBe(
      "Title is required"
    );
    expect(wrongType.isErr && wrongType.error.issues[0]?.message).toBe(
      "Title must be a string"
    );
  });
});

describe("updateTaskSchema", () => {
  it("should require at least one field", () => {
    const result = validate(updateTaskSchema, {});

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.issues).toEqual([
        {
          field: "input",
          rule: "custom",
          message: "Provide at least one of title or completed",
        },
      ]);
    }
  });

  it("should accept completed alone", () => {
    const result = validate(updateTaskSchema, { completed: true });

    expect(result.isOk && result.value).toEqual({ completed: true });
  });

  it("should reject a non-boolean completed", () => {
    const result = validate(updateTaskSchema, { completed: "yes" });

    expect(result.isErr && result.error.issues[0]?.field).toBe("completed");
  });
});

describe("taskIdSchema", () => {
  it("should coerce numeric path segments", () => {
    const result = validate(taskIdSchema, "12");

    expect(result.isOk && result.value).toBe(12);
  });

  it.each([
    ["0"],
    ["-3"],
    ["1.5"],
    ["abc"],
    ["2147483648"],
    ["0x10"],
    ["1e1"],
    [" 7"],
    [""],
  ])(
    "should reject %s",
    (raw) => {
      expect(validate(taskIdSchema, raw).isErr).toBe(true);
    }
  );
});

describe("createListOptionsSchema", () => {
  const schema = createListOptionsSchema({ defaultLimit: 10, maxLimit: 50 });

  it("should fill defaults", () => {
    const result = validate(schema, {});

    expect(result.isOk && result.value).toEqual({
      filter: "all",
      skip: 0,
      limit: 10,
    });
  });

  it("should clamp limit to the max page size", () => {
    const result = validate(schema, { limit: 500 });

    expect(result.isOk && result.value.limit).toBe(50);
  });

  it("should reject negative skip and zero limit", () => {
    const result = validate(schema, { skip: -1, limit: 0 });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.issues.map((i) => i.message)).toEqual([
        "skip must be at least 0",
        "limit must be at least 1",
      ]);
    }
  });
});

describe("listTasksQuerySchema", () => {
  it("should map completed=true to the completed filter", () => {
    const result = validate(listTasksQuerySchema, {
      completed: "true",
      skip: "5",
    });

    expect(result.isOk && result.value).toEqual({
      filter: "completed",
      skip: 5,
      limit: undefined,
    });
  });

  it("should map completed=false to the pending filter", () => {
    const result = validate(listTasksQuerySchema, { completed: "false" });

    expect(result.isOk && result.value.filter).toBe("pending");
  });

  it("should reject other completed values", () => {
    const result = validate(listTasksQuerySchema, { completed: "maybe" });

    expect(result.isErr && result.error.issues[0]?.message).toBe(
      "completed must be 'true' or 'false'"
    );
  });
});

describe("toTaskResponse", () => {
  it("should serialize timestamps as ISO strings", () => {
    const at = new Date("2025-03-01T10:00:00.123Z");

    const response = toTaskResponse({
      id: 1,
      title: "Ship",
      completed: false,
      created_at: at,
      updated_at: at,
    });

    expect(response).toEqual({
      id: 1,
      title: "Ship",
      completed: false,
      created_at: "2025-03-01T10:00:00.123Z",
      updated_at: "2025-03-01T10:00:00.123Z",
    });
  });
});
