/**
 * Tests for the activity feed route.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, DINNER, SAM_PAYS_YOU } from "./setup.js";

describe("GET /api/v1/activity", () => {
  it("merges expenses and settlements, newest first", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/expenses", "POST", DINNER));
    await app.request(jsonRequest("/api/v1/settlements", "POST", SAM_PAYS_YOU));

    const res = await app.request("/api/v1/activity");
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: unknown[] };
    expect(body.data).toEqual([
      {
        kind: "settlement",
        id: "set-sam",
        date: "2024-01-02T09:00:00.000Z",
        description: "",
        amount: 20,
        payer: "sam",
        payee: "you",
      },
      {
        kind: "expense",
        id: "exp-dinner",
        date: "2024-01-01T19:00:00.000Z",
        description: "Dinner",
        amount: 90,
        payer: "you",
        splitMode: "EqualSplit",
      },
    ]);
  });

  it("orders by event date, not by insertion", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/settlements", "POST", SAM_PAYS_YOU));
    await app.request(
      jsonRequest("/api/v1/expenses", "POST", {
        ...DINNER,
        id: "exp-breakfast",
        date: "2024-01-03T08:00:00.000Z",
      }),
    );
    await app.request(jsonRequest("/api/v1/expenses", "POST", DINNER));

    const res = await app.request("/api/v1/activity");
    const body = (await res.json()) as { data: { id: string }[] };
    expect(body.data.map((item) => item.id)).toEqual([
      "exp-breakfast",
      "set-sam",
      "exp-dinner",
    ]);
  });

  it("honours the limit query parameter", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/expenses", "POST", DINNER));
    await app.request(jsonRequest("/api/v1/settlements", "POST", SAM_PAYS_YOU));

    const res = await app.request("/api/v1/activity?limit=1");
    const body = (await res.json()) as { data: { id: string }[] };
    expect(body.data.map((item) => item.id)).toEqual(["set-sam"]);
  });

  it("falls back to the configured limit", async () => {
    const { app } = createTestApp({ activityLimit: 1 });
    await app.request(jsonRequest("/api/v1/expenses", "POST", DINNER));
    await app.request(jsonRequest("/api/v1/settlements", "POST", SAM_PAYS_YOU));

    const res = await app.request("/api/v1/activity");
    const body = (await res.json()) as { data: unknown[] };
    expect(body.data).toHaveLength(1);
  });

  it("rejects a limit outside 1..100", async () => {
    const { app } = createTestApp();

    expect((await app.request("/api/v1/activity?limit=0")).status).toBe(400);
    expect((await app.request("/api/v1/activity?limit=101")).status).toBe(400);
  });
});
