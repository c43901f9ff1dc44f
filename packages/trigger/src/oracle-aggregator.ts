/**
 * In-memory oracle aggregator.
 *
 * Collects one report per listed oracle. An aggregation finalizes as soon
 * as `requiredCount` reports exist and accepts nothing after that.
 *
 * Verdict:
 * - isValid only if every report says valid
 * - confidence is the lowest reported confidence
 */

import type { Identity } from "@afterword/types";
import {
  MAX_CONFIDENCE,
  PreconditionViolation,
  isIntInRange,
} from "@afterword/types";
import type {
  AggregationResult,
  OracleConsensusProvider,
  OracleReport,
  VerificationRequest,
} from "./types.js";

interface Aggregation {
  readonly request: VerificationRequest;
  readonly reports: Map<Identity, OracleReport>;
}

export class InMemoryOracleAggregator implements OracleConsensusProvider {
  private readonly aggregations = new Map<string, Aggregation>();
  private counter = 0;

  async requestVerification(request: VerificationRequest): Promise<string> {
    this.counter += 1;
    const ref = `agg-${this.counter}`;
    this.aggregations.set(ref, { request, reports: new Map() });
    return ref;
  }

  async getResult(aggregationRef: string): Promise<AggregationResult | undefined> {
    const aggregation = this.aggregations.get(aggregationRef);
    return aggregation === undefined ? undefined : summarize(aggregation);
  }

  /**
   * Record one oracle's report.
   */
  submitOracleResult(
    aggregationRef: string,
    oracle: Identity,
    report: OracleReport,
  ): AggregationResult {
    const aggregation = this.aggregations.get(aggregationRef);
    if (aggregation === undefined) {
      throw new PreconditionViolation("UNKNOWN_AGGREGATION", `Unknown aggregation "${aggregationRef}"`);
    }
    if (!aggregation.request.oracles.includes(oracle)) {
      throw new PreconditionViolation("NOT_ORACLE", `"${oracle}" is not an oracle for "${aggregationRef}"`);
    }
    if (aggregation.reports.has(oracle)) {
      throw new PreconditionViolation("ALREADY_REPORTED", `"${oracle}" already reported`);
    }
    if (summarize(aggregation).finalized) {
      throw new PreconditionViolation("ALREADY_REPORTED", `Aggregation "${aggregationRef}" is finalized`);
    }
    if (!isIntInRange(report.confidence, 0, MAX_CONFIDENCE)) {
      throw new PreconditionViolation("INVALID_INPUT", `Confidence must be an integer in [0, ${MAX_CONFIDENCE}]`);
    }

    aggregation.reports.set(oracle, { isValid: report.isValid, confidence: report.confidence });
    return summarize(aggregation);
  }

  /**
   * The request behind an aggregation, for callers that only hold the ref.
   */
  getRequest(aggregationRef: string): VerificationRequest | undefined {
    return this.aggregations.get(aggregationRef)?.request;
  }
}

function summarize(aggregation: Aggregation): AggregationResult {
  const reports = [...aggregation.reports.values()];
  const reportCount = reports.length;
  if (reportCount === 0) {
    return { finalized: false, isValid: false, confidence: 0, reportCount };
  }
  return {
    finalized: reportCount >= aggregation.request.requiredCount,
    isValid: reports.every((r) => r.isValid),
    confidence: Math.min(...reports.map((r) => r.confidence)),
    reportCount,
  };
}
