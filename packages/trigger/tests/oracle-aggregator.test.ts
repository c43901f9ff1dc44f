import { describe, it, expect } from "vitest";
import { sha256Hex } from "@afterword/types";
import { InMemoryOracleAggregator } from "../src/oracle-aggregator.js";
import { codeOf } from "./helpers.js";

async function open(aggregator: InMemoryOracleAggregator, requiredCount = 2): Promise<string> {
  return aggregator.requestVerification({
    principal: "alice",
    oracles: ["o1", "o2", "o3"],
    requiredCount,
    eventType: "death-certificate",
    dataDigest: sha256Hex("record"),
  });
}

describe("InMemoryOracleAggregator", () => {
  it("hands out distinct references", async () => {
    const aggregator = new InMemoryOracleAggregator();
    expect(await open(aggregator)).toBe("agg-1");
    expect(await open(aggregator)).toBe("agg-2");
  });

  it("is not finalized until requiredCount reports arrive", async () => {
    const aggregator = new InMemoryOracleAggregator();
    const ref = await open(aggregator);

    expect(aggregator.submitOracleResult(ref, "o1", { isValid: true, confidence: 99 }).finalized).toBe(false);
    const result = aggregator.submitOracleResult(ref, "o2", { isValid: true, confidence: 96 });

    expect(result).toEqual({ finalized: true, isValid: true, confidence: 96, reportCount: 2 });
    expect(await aggregator.getResult(ref)).toEqual(result);
  });

  it("is invalid if any report is invalid", async () => {
    const aggregator = new InMemoryOracleAggregator();
    const ref = await open(aggregator);
    aggregator.submitOracleResult(ref, "o1", { isValid: true, confidence: 99 });
    const result = aggregator.submitOracleResult(ref, "o3", { isValid: false, confidence: 99 });

    expect(result.finalized).toBe(true);
    expect(result.isValid).toBe(false);
  });

  it("rejects unknown refs, foreign oracles and double reports", async () => {
    const aggregator = new InMemoryOracleAggregator();
    const ref = await open(aggregator, 3);
    const report = { isValid: true, confidence: 99 };

    expect(codeOf(() => aggregator.submitOracleResult("agg-9", "o1", report))).toBe("UNKNOWN_AGGREGATION");
    expect(codeOf(() => aggregator.submitOracleResult(ref, "eve", report))).toBe("NOT_ORACLE");
    aggregator.submitOracleResult(ref, "o1", report);
    expect(codeOf(() => aggregator.submitOracleResult(ref, "o1", report))).toBe("ALREADY_REPORTED");
    expect(codeOf(() => aggregator.submitOracleResult(ref, "o2", { isValid: true, confidence: 101 }))).toBe("INVALID_INPUT");
  });

  it("accepts nothing once finalized", async () => {
    const aggregator = new InMemoryOracleAggregator();
    const ref = await open(aggregator, 1);
    aggregator.submitOracleResult(ref, "o1", { isValid: true, confidence: 99 });

    expect(codeOf(() => aggregator.submitOracleResult(ref, "o2", { isValid: false, confidence: 0 }))).toBe("ALREADY_REPORTED");
  });

  it("returns undefined for an unknown ref", async () => {
    expect(await new InMemoryOracleAggregator().getResult("nope")).toBeUndefined();
  });
});
