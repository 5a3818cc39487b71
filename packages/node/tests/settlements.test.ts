/**
 * Tests for settlement routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, DINNER, SAM_PAYS_YOU } from "./setup.js";

describe("POST /api/v1/settlements", () => {
  it("records a settlement and returns the persisted record", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/settlements", "POST", SAM_PAYS_YOU),
    );

    expect(res.status).toBe(201);

    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      id: "set-sam",
      payer: "sam",
      payee: "you",
      amount: 20,
      description: "",
      date: "2024-01-02T09:00:00.000Z",
      notes: "",
    });
  });

  it("reduces what the payer owes the payee", async () => {
    const { app, service } = createTestApp();
    await app.request(jsonRequest("/api/v1/expenses", "POST", DINNER));
    await app.request(jsonRequest("/api/v1/settlements", "POST", SAM_PAYS_YOU));

    expect(service.balancesFor("sam")).toEqual({ you: 10 });
  });

  it("allows paying more than is owed", async () => {
    const { app, service } = createTestApp();
    await app.request(jsonRequest("/api/v1/expenses", "POST", DINNER));
    await app.request(
      jsonRequest("/api/v1/settlements", "POST", { ...SAM_PAYS_YOU, amount: 50 }),
    );

    expect(service.balancesFor("you")).toEqual({ sam: 20, lee: -30 });
  });

  it("rejects paying oneself", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/settlements", "POST", { ...SAM_PAYS_YOU, payee: "sam" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("DUPLICATE_IDENTITY");
  });

  it("rejects a settlement id already used by an expense", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/expenses", "POST", DINNER));
    const res = await app.request(
      jsonRequest("/api/v1/settlements", "POST", { ...SAM_PAYS_YOU, id: "exp-dinner" }),
    );

    expect(res.status).toBe(409);
  });

  it("returns 400 for a missing payee", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/settlements", "POST", { payer: "sam", amount: 5 }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("rejects a date-time without an offset", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/settlements", "POST", {
        ...SAM_PAYS_YOU,
        date: "2024-01-02T09:00:00",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as {
      error: { code: string; details?: { issues: { path: string }[] } };
    };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details?.issues[0]?.path).toBe("date");
    expect(service.listSettlements()).toEqual([]);
  });

  it("rejects a bare-integer payee", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/settlements", "POST", { ...SAM_PAYS_YOU, payee: "42" }),
    );

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/settlements", () => {
  it("lists settlements", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/settlements", "POST", SAM_PAYS_YOU));

    const res = await app.request("/api/v1/settlements");
    const body = (await res.json()) as { data: { id: string }[] };
    expect(body.data.map((s) => s.id)).toEqual(["set-sam"]);
  });
});
