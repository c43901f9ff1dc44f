/**
 * Tests for audit event routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { DAY, isRecord, sha256Hex } from "@afterword/types";
import { captureBody, createTestApp, jsonRequest, readBody, readData, readErrorCode } from "./setup.js";
import type { TestApp } from "./setup.js";

let t: TestApp;

function positions(body: Record<string, unknown>): unknown[] {
  const data = Array.isArray(body.data) ? body.data : [];
  return data.map((e: unknown) => (isRecord(e) ? e.globalPosition : undefined));
}

beforeEach(async () => {
  t = createTestApp();
  await t.app.request(jsonRequest("/api/v1/intents/alice", "POST", captureBody(), "alice"));
  for (const priority of [10, 20, 30]) {
    await t.app.request(
      jsonRequest(
        "/api/v1/intents/alice/goals",
        "POST",
        { description: `goal ${priority}`, constraintDigest: sha256Hex(`goal:${priority}`), priority },
        "alice",
      ),
    );
  }
});

describe("GET /api/v1/events", () => {
  it("lists every event", async () => {
    const body = await readBody(await t.app.request("/api/v1/events"));

    expect(positions(body)).toEqual([1, 2, 3, 4]);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("paginates with a cursor", async () => {
    const first = await readBody(await t.app.request("/api/v1/events?limit=2"));
    expect(positions(first)).toEqual([1, 2]);
    expect(first.pagination).toMatchObject({ hasMore: true });

    const cursor = isRecord(first.pagination) ? first.pagination.cursor : undefined;
    expect(typeof cursor).toBe("string");

    const second = await readBody(await t.app.request(`/api/v1/events?limit=2&cursor=${String(cursor)}`));
    expect(positions(second)).toEqual([3, 4]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("starts after a given position", async () => {
    const body = await readBody(await t.app.request("/api/v1/events?afterPosition=3"));

    expect(positions(body)).toEqual([4]);
  });

  it("filters by emitting component", async () => {
    await t.app.request(jsonRequest("/api/v1/triggers/alice/deadman", "POST", { interval: 30 * DAY }, "alice"));
    const body = await readBody(await t.app.request("/api/v1/events?source=trigger"));

    expect(positions(body)).toEqual([5]);
  });

  it("rejects an unknown source filter", async () => {
    const res = await t.app.request("/api/v1/events?source=ledger");

    expect(res.status).toBe(400);
  });

  it("rejects an invalid limit", async () => {
    const res = await t.app.request("/api/v1/events?limit=0");

    expect(res.status).toBe(400);
    expect(await readErrorCode(res)).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/events/verify", () => {
  it("verifies the hash chain", async () => {
    const res = await t.app.request("/api/v1/events/verify");

    expect(await readData(res)).toEqual({ valid: true, lastVerifiedPosition: 4, errors: [] });
  });
});

describe("GET /api/v1/events/:source/:principal", () => {
  it("lists one component's events for a principal", async () => {
    const body = await readBody(await t.app.request("/api/v1/events/intent-ledger/alice?afterVersion=2"));
    const types = Array.isArray(body.data)
      ? body.data.map((e: unknown) => (isRecord(e) && isRecord(e.event) ? e.event.type : undefined))
      : [];

    expect(types).toEqual(["GoalAdded", "GoalAdded"]);
  });

  it("rejects an unknown source", async () => {
    const res = await t.app.request("/api/v1/events/ledger/alice");

    expect(res.status).toBe(400);
    expect(await readErrorCode(res)).toBe("VALIDATION_ERROR");
  });
});
