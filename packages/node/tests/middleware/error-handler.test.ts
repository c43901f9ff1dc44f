import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import pino from "pino";
import { ExternalTransferFailure, PolicyRejection, PreconditionViolation } from "@afterword/types";
import { EventStoreError } from "@afterword/event-store";
import { createErrorHandler, statusForCode } from "../../src/middleware/error-handler.js";
import type { AppEnv } from "../../src/types/api-contract.js";
import { readBody } from "../setup.js";

function appThrowing(err: Error, lines: string[] = []): Hono<AppEnv> {
  const logger = pino({ level: "error" }, { write: (line: string) => lines.push(line) });
  const app = new Hono<AppEnv>();
  app.onError(createErrorHandler(logger));
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

const cases: Array<[Error, number, string]> = [
  [new PreconditionViolation("INVALID_INPUT", "bad"), 400, "INVALID_INPUT"],
  [new PreconditionViolation("UNAUTHORIZED", "no"), 403, "UNAUTHORIZED"],
  [new PreconditionViolation("NOT_CAPTURED", "missing"), 404, "NOT_CAPTURED"],
  [new PreconditionViolation("NOT_ACTIVE", "inactive"), 409, "NOT_ACTIVE"],
  [new PolicyRejection("PROHIBITED_ACTION", "blocked", "phrase"), 422, "PROHIBITED_ACTION"],
  [new ExternalTransferFailure("failed", "band", 5n), 502, "TRANSFER_FAILED"],
  [new EventStoreError("INVALID_PAYLOAD", "bad payload"), 400, "INVALID_PAYLOAD"],
];

describe("createErrorHandler", () => {
  it.each(cases)("maps %s", async (err, status, code) => {
    const res = await appThrowing(err).request("/boom");

    expect(res.status).toBe(status);
    expect(await readBody(res)).toEqual({ error: { code, message: err.message } });
  });

  it("hides unexpected errors behind a 500 and logs them", async () => {
    const lines: string[] = [];
    const res = await appThrowing(new Error("database password leaked"), lines).request("/boom");

    expect(res.status).toBe(500);
    expect(await readBody(res)).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ level: 50, msg: "unhandled error" });
  });

  it("passes HTTP exceptions through", async () => {
    const res = await appThrowing(new HTTPException(401, { message: "nope" })).request("/boom");

    expect(res.status).toBe(401);
  });
});

describe("statusForCode", () => {
  it("is undefined for unknown codes", () => {
    expect(statusForCode("SOMETHING_ELSE")).toBeUndefined();
    expect(statusForCode("EMPTY_TREASURY")).toBe(422);
  });
});
