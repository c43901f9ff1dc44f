/**
 * Runtime type guard tests for @afterword/types
 */
import { describe, it, expect } from "vitest";
import {
  isRecord,
  isNonEmptyString,
  isStringArray,
  isIntInRange,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { isDigest, sha256Hex } from "../src/primitives.js";

const metadata = {
  eventId: "evt-1",
  timestamp: "2030-01-01T00:00:00.000Z",
  actor: "alice",
  correlationId: "alice",
  source: "intent-ledger",
};

describe("isRecord", () => {
  it("accepts plain objects", () => {
    expect(isRecord({ a: 1 })).toBe(true);
  });

  it("rejects null, arrays and primitives", () => {
    expect(isRecord(null)).toBe(false);
    expect(isRecord([])).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});

describe("scalar guards", () => {
  it("isNonEmptyString", () => {
    expect(isNonEmptyString("a")).toBe(true);
    expect(isNonEmptyString("")).toBe(false);
    expect(isNonEmptyString(1)).toBe(false);
  });

  it("isStringArray", () => {
    expect(isStringArray(["a", "b"])).toBe(true);
    expect(isStringArray([])).toBe(true);
    expect(isStringArray(["a", 1])).toBe(false);
  });

  it("isIntInRange is inclusive", () => {
    expect(isIntInRange(0, 0, 100)).toBe(true);
    expect(isIntInRange(100, 0, 100)).toBe(true);
    expect(isIntInRange(101, 0, 100)).toBe(false);
    expect(isIntInRange(50.5, 0, 100)).toBe(false);
  });
});

describe("isDigest", () => {
  it("accepts sha256Hex output", () => {
    expect(isDigest(sha256Hex("corpus"))).toBe(true);
  });

  it("rejects uppercase and short strings", () => {
    expect(isDigest(sha256Hex("corpus").toUpperCase())).toBe(false);
    expect(isDigest("abc")).toBe(false);
  });

  it("hashes the empty string to the known value", () => {
    expect(sha256Hex("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("accepts a string causationId", () => {
    expect(isEventMetadata({ ...metadata, causationId: "evt-0" })).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });

  it("rejects a missing actor", () => {
    const { actor: _actor, ...rest } = metadata;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a full event", () => {
    expect(isDomainEvent({ type: "IntentCaptured", metadata, payload: {} })).toBe(true);
  });

  it("rejects an array payload", () => {
    expect(isDomainEvent({ type: "IntentCaptured", metadata, payload: [] })).toBe(false);
  });
});

describe("isEventSource", () => {
  it("knows every component", () => {
    for (const s of ["intent-ledger", "trigger", "resolution", "execution", "sunset"]) {
      expect(isEventSource(s)).toBe(true);
    }
    expect(isEventSource("treasury")).toBe(false);
  });
});
