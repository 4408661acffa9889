import { describe, it, expect } from "vitest";
import { queuePage, queueQuerySchema, toPageRequest } from "../queue.js";

describe("queueQuerySchema", () => {
  it("coerces query strings and fills defaults", () => {
    expect(queueQuerySchema.parse({ page: "3", limit: "10" })).toEqual({ page: 3, limit: 10, sort: "oldest" });
    expect(queueQuerySchema.parse({ sort: "largest", priority: "urgent" })).toEqual({
      page: 1,
      limit: 20,
      sort: "largest",
      priority: "urgent",
    });
  });

  it("rejects unknown sorts and oversized pages", () => {
    expect(queueQuerySchema.safeParse({ sort: "random" }).success).toBe(false);
    expect(queueQuerySchema.safeParse({ limit: "101" }).success).toBe(false);
  });
});

describe("queue paging", () => {
  it("turns a page number into an offset", () => {
    expect(toPageRequest({ page: 3, limit: 10, sort: "newest" })).toEqual({ skip: 20, limit: 10, sort: "newest" });
  });

  it("reports the page count with the rows", () => {
    expect(queuePage(["a", "b"], 21, { page: 1, limit: 10, sort: "oldest" })).toEqual({
      data: ["a", "b"],
      total: 21,
      page: 1,
      limit: 10,
      pages: 3,
      sort: "oldest",
    });
  });
});
