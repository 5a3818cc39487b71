/**
 * Tests for request-id middleware.
 */

import { describe, it, expect } from "vitest";
import { resolveRequestId } from "../../src/middleware/request-id.js";
import { createTestApp, jsonRequest } from "../setup.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("resolveRequestId", () => {
  it("keeps a plausible incoming id", () => {
    expect(resolveRequestId("req-42")).toBe("req-42");
  });

  it("generates a UUID when none is given", () => {
    expect(resolveRequestId(undefined)).toMatch(UUID);
  });

  it("replaces ids with whitespace or excessive length", () => {
    expect(resolveRequestId("has space")).toMatch(UUID);
    expect(resolveRequestId("x".repeat(129))).toMatch(UUID);
    expect(resolveRequestId("")).toMatch(UUID);
  });
});

describe("requestIdMiddleware", () => {
  it("echoes a generated id when the incoming one is rejected", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "x".repeat(200) }),
    );

    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });
});
