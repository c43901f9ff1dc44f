import { describe, it, expect, beforeEach } from "vitest";
import {
  CapabilityTable,
  DAY,
  EMERGENCY_RECOVERY_DELAY,
  ExternalTransferFailure,
  FIXED_DURATION,
  ManualClock,
  PolicyRejection,
  YEAR,
  sha256Hex,
} from "@afterword/types";
import { AuditEmitter, canonicalDigest } from "@afterword/event-store";
import { ResolutionEngine } from "@afterword/resolution";
import { ExecutionEngine } from "../src/execution-engine.js";
import { InMemoryFundsTransport } from "../src/in-memory-transport.js";
import type { FundsTransport } from "../src/types.js";
import { codeOf, deferredTransport, errorOf } from "./helpers.js";

const corpus = sha256Hex("corpus");
const START = 1_000;

describe("ExecutionEngine", () => {
  let clock: ManualClock;
  let audit: AuditEmitter;
  let capabilities: CapabilityTable;
  let triggered: Set<string>;
  let resolution: ResolutionEngine;
  let transport: InMemoryFundsTransport;
  let engine: ExecutionEngine;

  function build(funds: FundsTransport = transport): ExecutionEngine {
    return new ExecutionEngine({
      capabilities,
      intents: { isTriggered: (principal) => triggered.has(principal) },
      resolver: resolution,
      transport: funds,
      clock,
      audit,
    });
  }

  function support(query: string, confidence: number): void {
    resolution.submitResolution("indexer", "alice", query, [`cite:${query}`], [confidence]);
  }

  beforeEach(() => {
    clock = new ManualClock(START);
    audit = new AuditEmitter({ clock });
    capabilities = new CapabilityTable("admin", {
      "resolution.index": ["indexer"],
      "execution.execute": ["executor"],
      "execution.sunset": ["sunset-operator"],
      "execution.recover": ["recoverer"],
    });
    triggered = new Set(["alice"]);
    resolution = new ResolutionEngine({ capabilities, clock, audit });
    resolution.freezeCorpus("indexer", "alice", corpus, "ipfs://corpus", 2020, 2025);
    transport = new InMemoryFundsTransport();
    engine = build();
  });

  // ─── activation ──────────────────────────────────────────────────────

  describe("activate", () => {
    it("requires the execute capability", () => {
      expect(codeOf(() => engine.activate("stranger", "alice"))).toBe("UNAUTHORIZED");
    });

    it("requires a triggered intent", () => {
      expect(codeOf(() => engine.activate("executor", "bob"))).toBe("NOT_TRIGGERED");
      expect(engine.isActive("bob")).toBe(false);
    });

    it("activates exactly once", () => {
      engine.activate("executor", "alice");
      expect(engine.isActive("alice")).toBe(true);
      expect(engine.getState("alice").activatedAt).toBe(START);
      expect(codeOf(() => engine.activate("executor", "alice"))).toBe("ALREADY_ACTIVATED");
      expect(audit.typesFor("execution", "alice")).toEqual(["ExecutionActivated"]);
    });

    it("counts activation at time zero as active", () => {
      clock.set(0);
      engine.activate("executor", "alice");
      expect(engine.isActive("alice")).toBe(true);
    });

    it("reports an empty state for unknown principals", () => {
      expect(engine.getState("nobody")).toEqual({
        principal: "nobody",
        sunset: false,
        treasury: 0n,
        executionLog: [],
        licenses: [],
        fundedProjects: [],
        distributions: [],
      });
    });
  });

  // ─── proposeAction ───────────────────────────────────────────────────

  describe("proposeAction", () => {
    it("is rejected before activation", () => {
      support("royalties", 99);
      expect(codeOf(() => engine.proposeAction("executor", "alice", "distribute_royalties", "royalties", corpus)))
        .toBe("NOT_ACTIVE");
    });

    describe("once active", () => {
      beforeEach(() => {
        engine.activate("executor", "alice");
      });

      it("executes at exactly the confidence threshold", () => {
        support("royalties", 95);
        const decision = engine.proposeAction("executor", "alice", "distribute_royalties", "royalties", corpus);

        expect(decision).toEqual({
          outcome: "executed",
          entry: {
            action: "distribute_royalties",
            query: "royalties",
            citation: "cite:royalties",
            confidence: 95,
            timestamp: START,
            decisionDigest: canonicalDigest({
              action: "distribute_royalties",
              citation: "cite:royalties",
              confidence: 95,
            }),
          },
        });
        expect(engine.getExecutionLog("alice")).toHaveLength(1);
        expect(audit.typesFor("execution", "alice")).toEqual(["ExecutionActivated", "ActionExecuted"]);
      });

      it("defaults to inaction below the threshold", () => {
        support("royalties", 94);
        const decision = engine.proposeAction("executor", "alice", "distribute_royalties", "royalties", corpus);

        expect(decision).toEqual({ outcome: "inaction", citation: "cite:royalties", confidence: 94 });
        expect(engine.getExecutionLog("alice")).toEqual([]);
        expect(audit.typesFor("execution", "alice")).toEqual(["ExecutionActivated", "InactionDefault"]);
      });

      it("treats an unanswered query as zero confidence", () => {
        expect(engine.proposeAction("executor", "alice", "archive_digital_assets", "unknown", corpus))
          .toEqual({ outcome: "inaction", citation: "", confidence: 0 });
      });

      it("rejects actions over 1000 characters without auditing a filter hit", () => {
        const err = errorOf(() =>
          engine.proposeAction("executor", "alice", "a".repeat(1001), "q", corpus),
        );
        expect(err).toBeInstanceOf(PolicyRejection);
        expect(err).toMatchObject({ code: "ACTION_TOO_LONG" });
        expect(audit.typesFor("execution", "alice")).toEqual(["ExecutionActivated"]);
      });

      it("accepts an action of exactly 1000 characters", () => {
        expect(engine.proposeAction("executor", "alice", "a".repeat(1000), "q", corpus).outcome).toBe("inaction");
      });

      it("rejects and audits prohibited actions", () => {
        support("donations", 100);
        const err = errorOf(() =>
          engine.proposeAction("executor", "alice", "donate_to_campaign", "donations", corpus),
        );
        expect(err).toBeInstanceOf(PolicyRejection);
        expect(err).toMatchObject({ code: "PROHIBITED_ACTION", layer: "primary-keyword" });

        const last = audit.history("execution", "alice").at(-1);
        expect(last?.event.type).toBe("PoliticalActionBlocked");
        expect(last?.event.payload).toMatchObject({
          principal: "alice",
          actionDigest: sha256Hex("donate_to_campaign"),
          layer: "primary-keyword",
        });
        expect(engine.getExecutionLog("alice")).toEqual([]);
      });

      it("filters before consulting the corpus", () => {
        expect(codeOf(() =>
          engine.proposeAction("executor", "alice", "hire_a_lobbyist", "q", sha256Hex("wrong")),
        )).toBe("PROHIBITED_ACTION");
      });

      it("hard-fails on a corpus digest mismatch", () => {
        expect(codeOf(() =>
          engine.proposeAction("executor", "alice", "distribute_royalties", "q", sha256Hex("wrong")),
        )).toBe("CORPUS_DIGEST_MISMATCH");
      });

      it("rejects empty action text and queries", () => {
        expect(codeOf(() => engine.proposeAction("executor", "alice", "", "q", corpus))).toBe("INVALID_INPUT");
        expect(codeOf(() => engine.proposeAction("executor", "alice", "x", "", corpus))).toBe("INVALID_INPUT");
      });

      it("stops after FIXED_DURATION", () => {
        support("royalties", 99);
        clock.advance(FIXED_DURATION - 1);
        expect(engine.isActive("alice")).toBe(true);
        clock.advance(1);
        expect(engine.isActive("alice")).toBe(false);
        expect(codeOf(() => engine.proposeAction("executor", "alice", "distribute_royalties", "royalties", corpus)))
          .toBe("NOT_ACTIVE");
      });
    });
  });

  // ─── treasury ────────────────────────────────────────────────────────

  describe("treasury", () => {
    beforeEach(() => {
      engine.activate("executor", "alice");
      engine.depositToTreasury("alice", 1_000n);
    });

    it("credits deposits and audits the balance", () => {
      expect(engine.depositToTreasury("alice", 250n, "donor")).toBe(1_250n);
      const last = audit.history("execution", "alice").at(-1);
      expect(last?.event.type).toBe("TreasuryDeposited");
      expect(last?.event.payload).toMatchObject({ amount: "250", balance: "1250" });
      expect(last?.event.metadata.actor).toBe("donor");
    });

    it("rejects non-positive deposits", () => {
      expect(codeOf(() => engine.depositToTreasury("alice", 0n))).toBe("INVALID_INPUT");
      expect(codeOf(() => engine.depositToTreasury("alice", -5n))).toBe("INVALID_INPUT");
    });

    it("funds a project when the corpus supports it", async () => {
      support("fund_project:open_source_tooling", 97);
      const decision = await engine.fundProject(
        "executor", "alice", "tooling-wallet", 400n, "open_source_tooling", corpus,
      );

      expect(decision.outcome).toBe("executed");
      expect(engine.getTreasuryBalance("alice")).toBe(600n);
      expect(transport.sent).toEqual([
        { recipient: "tooling-wallet", amount: 400n, memo: "fund_project:open_source_tooling" },
      ]);
      expect(engine.getFundedProjects("alice")).toEqual([
        { recipient: "tooling-wallet", amount: 400n, description: "open_source_tooling", fundedAt: START },
      ]);
      expect(audit.typesFor("execution", "alice").slice(-2)).toEqual(["ActionExecuted", "ProjectFunded"]);
    });

    it("distributes revenue under its own query", async () => {
      support("distribute_revenue:q3_royalties", 96);
      const decision = await engine.distributeRevenue(
        "executor", "alice", "heir-wallet", 1_000n, "q3_royalties", corpus,
      );

      expect(decision.outcome).toBe("executed");
      expect(engine.getTreasuryBalance("alice")).toBe(0n);
      expect(engine.getDistributions("alice")).toHaveLength(1);
      expect(engine.getFundedProjects("alice")).toEqual([]);
      expect(audit.typesFor("execution", "alice").at(-1)).toBe("RevenueDistributed");
    });

    it("does nothing below the threshold", async () => {
      support("fund_project:open_source_tooling", 80);
      const decision = await engine.fundProject(
        "executor", "alice", "tooling-wallet", 400n, "open_source_tooling", corpus,
      );

      expect(decision).toEqual({ outcome: "inaction", citation: "cite:fund_project:open_source_tooling", confidence: 80 });
      expect(engine.getTreasuryBalance("alice")).toBe(1_000n);
      expect(transport.sent).toEqual([]);
    });

    it("rejects amounts above the balance", async () => {
      support("fund_project:open_source_tooling", 97);
      await expect(
        engine.fundProject("executor", "alice", "tooling-wallet", 1_001n, "open_source_tooling", corpus),
      ).rejects.toMatchObject({ code: "INSUFFICIENT_TREASURY" });
    });

    it("filters project descriptions", async () => {
      await expect(
        engine.fundProject("executor", "alice", "ads-wallet", 10n, "campaign_ads", corpus),
      ).rejects.toMatchObject({ code: "PROHIBITED_ACTION" });
      expect(engine.getTreasuryBalance("alice")).toBe(1_000n);
    });

    it("restores the debit when the transfer fails", async () => {
      support("fund_project:open_source_tooling", 97);
      const cause = new Error("bank offline");
      transport.failNext(cause);

      const err: unknown = await engine
        .fundProject("executor", "alice", "tooling-wallet", 400n, "open_source_tooling", corpus)
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExternalTransferFailure);
      expect(err).toMatchObject({ code: "TRANSFER_FAILED", recipient: "tooling-wallet", amount: 400n, cause });
      expect(engine.getTreasuryBalance("alice")).toBe(1_000n);
      expect(engine.getExecutionLog("alice")).toEqual([]);
      expect(engine.getFundedProjects("alice")).toEqual([]);
      expect(engine.isOperationInProgress("alice")).toBe(false);
    });

    it("locks the principal while a transfer is in flight", async () => {
      const deferred = deferredTransport();
      engine = build(deferred.transport);
      engine.activate("executor", "alice");
      engine.depositToTreasury("alice", 1_000n);
      support("fund_project:open_source_tooling", 97);
      support("royalties", 99);

      const pending = engine.fundProject(
        "executor", "alice", "tooling-wallet", 400n, "open_source_tooling", corpus,
      );

      expect(engine.isOperationInProgress("alice")).toBe(true);
      expect(engine.getTreasuryBalance("alice")).toBe(600n);
      expect(codeOf(() => engine.depositToTreasury("alice", 1n))).toBe("OPERATION_IN_PROGRESS");
      expect(codeOf(() => engine.proposeAction("executor", "alice", "distribute_royalties", "royalties", corpus)))
        .toBe("OPERATION_IN_PROGRESS");
      await expect(
        engine.fundProject("executor", "alice", "tooling-wallet", 100n, "open_source_tooling", corpus),
      ).rejects.toMatchObject({ code: "OPERATION_IN_PROGRESS" });
      expect(engine.depositToTreasury("bob", 5n)).toBe(5n);

      deferred.release();
      await expect(pending).resolves.toMatchObject({ outcome: "executed" });
      expect(engine.isOperationInProgress("alice")).toBe(false);
      expect(engine.depositToTreasury("alice", 1n)).toBe(601n);
    });
  });

  // ─── licenses ────────────────────────────────────────────────────────

  describe("issueLicense", () => {
    beforeEach(() => {
      engine.activate("executor", "alice");
    });

    it("issues a license gated on license_issuance", () => {
      support("license_issuance", 99);
      const decision = engine.issueLicense("executor", "alice", "label-co", "album-1", 1_500, YEAR, corpus);

      expect(decision).toMatchObject({ outcome: "executed", entry: { action: "issue_license:album-1" } });
      expect(engine.getLicenses("alice")).toEqual([
        { licensee: "label-co", assetRef: "album-1", royaltyBasisPoints: 1_500, startsAt: START, endsAt: START + YEAR },
      ]);
      expect(audit.typesFor("execution", "alice").at(-1)).toBe("LicenseIssued");
    });

    it("bounds royalties at 10000 basis points", () => {
      support("license_issuance", 99);
      expect(codeOf(() => engine.issueLicense("executor", "alice", "label-co", "album-1", 10_001, DAY, corpus)))
        .toBe("INVALID_INPUT");
      expect(engine.issueLicense("executor", "alice", "label-co", "album-1", 10_000, DAY, corpus).outcome)
        .toBe("executed");
    });

    it("rejects a non-positive duration", () => {
      expect(codeOf(() => engine.issueLicense("executor", "alice", "label-co", "album-1", 100, 0, corpus)))
        .toBe("INVALID_INPUT");
    });

    it("issues nothing below the threshold", () => {
      support("license_issuance", 50);
      expect(engine.issueLicense("executor", "alice", "label-co", "album-1", 100, DAY, corpus).outcome)
        .toBe("inaction");
      expect(engine.getLicenses("alice")).toEqual([]);
    });
  });

  // ─── sunset & recovery ───────────────────────────────────────────────

  describe("sunset", () => {
    it("requires activation", () => {
      expect(codeOf(() => engine.activateSunset("executor", "alice"))).toBe("NOT_ACTIVATED");
      expect(codeOf(() => engine.emergencySunset("alice"))).toBe("NOT_ACTIVATED");
    });

    it("is not due before FIXED_DURATION", () => {
      engine.activate("executor", "alice");
      clock.advance(FIXED_DURATION - 1);
      expect(engine.isSunsetDue("alice")).toBe(false);
      expect(codeOf(() => engine.activateSunset("executor", "alice"))).toBe("SUNSET_NOT_DUE");
    });

    it("accepts either the execute or the sunset capability", () => {
      engine.activate("executor", "alice");
      clock.advance(FIXED_DURATION);
      expect(engine.isSunsetDue("alice")).toBe(true);
      expect(codeOf(() => engine.activateSunset("stranger", "alice"))).toBe("UNAUTHORIZED");

      engine.activateSunset("sunset-operator", "alice");
      expect(engine.isSunset("alice")).toBe(true);
      expect(engine.isSunsetDue("alice")).toBe(false);
      expect(engine.getState("alice").sunsetAt).toBe(START + FIXED_DURATION);
      expect(codeOf(() => engine.activateSunset("executor", "alice"))).toBe("ALREADY_SUNSET");
      expect(codeOf(() => engine.emergencySunset("alice"))).toBe("ALREADY_SUNSET");
    });

    it("lets anyone sunset an overdue engine", () => {
      engine.activate("executor", "alice");
      clock.advance(FIXED_DURATION + DAY);
      engine.emergencySunset("alice");
      expect(audit.history("execution", "alice").at(-1)?.event.payload).toMatchObject({ emergency: true });
    });
  });

  describe("emergencyFundRecovery", () => {
    beforeEach(() => {
      engine.activate("executor", "alice");
      engine.depositToTreasury("alice", 700n);
    });

    it("requires the recover capability and a sunset engine", async () => {
      await expect(engine.emergencyFundRecovery("executor", "alice", "estate")).rejects.toMatchObject({
        code: "UNAUTHORIZED",
      });
      await expect(engine.emergencyFundRecovery("recoverer", "alice", "estate")).rejects.toMatchObject({
        code: "NOT_SUNSET",
      });
    });

    it("waits a year after sunset", async () => {
      clock.advance(FIXED_DURATION);
      engine.activateSunset("executor", "alice");
      clock.advance(EMERGENCY_RECOVERY_DELAY - 1);
      await expect(engine.emergencyFundRecovery("recoverer", "alice", "estate")).rejects.toMatchObject({
        code: "RECOVERY_NOT_DUE",
      });

      clock.advance(1);
      await expect(engine.emergencyFundRecovery("recoverer", "alice", "estate")).resolves.toBe(700n);
      expect(engine.getTreasuryBalance("alice")).toBe(0n);
      expect(transport.sent).toEqual([{ recipient: "estate", amount: 700n, memo: "emergency_recovery" }]);
      expect(audit.typesFor("execution", "alice").at(-1)).toBe("EmergencyFundsRecovered");

      await expect(engine.emergencyFundRecovery("recoverer", "alice", "estate")).rejects.toMatchObject({
        code: "EMPTY_TREASURY",
      });
    });

    it("restores the treasury when recovery fails", async () => {
      clock.advance(FIXED_DURATION);
      engine.activateSunset("executor", "alice");
      clock.advance(EMERGENCY_RECOVERY_DELAY);
      transport.failNext();

      await expect(engine.emergencyFundRecovery("recoverer", "alice", "estate")).rejects.toBeInstanceOf(
        ExternalTransferFailure,
      );
      expect(engine.getTreasuryBalance("alice")).toBe(700n);
    });

    it("rejects an empty recipient", async () => {
      await expect(engine.emergencyFundRecovery("recoverer", "alice", "")).rejects.toMatchObject({
        code: "INVALID_INPUT",
      });
    });
  });
});
