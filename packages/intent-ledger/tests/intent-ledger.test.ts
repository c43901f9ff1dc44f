import { describe, it, expect, beforeEach } from "vitest";
import {
  CapabilityTable,
  ManualClock,
  PreconditionViolation,
  sha256Hex,
} from "@afterword/types";
import { AuditEmitter } from "@afterword/event-store";
import { IntentLedger } from "../src/intent-ledger.js";
import { captureInput, codeOf } from "./helpers.js";

const constraint = sha256Hex("constraint");

describe("IntentLedger", () => {
  let clock: ManualClock;
  let capabilities: CapabilityTable;
  let audit: AuditEmitter;
  let ledger: IntentLedger;

  beforeEach(() => {
    clock = new ManualClock(1_000);
    capabilities = new CapabilityTable("admin", { "intent.trigger": ["coordinator"] });
    audit = new AuditEmitter({ clock });
    ledger = new IntentLedger({ capabilities, clock, audit });
  });

  // ─── capture ─────────────────────────────────────────────────────────

  describe("capture", () => {
    it("records the intent", () => {
      const record = ledger.capture("alice", captureInput());

      expect(record.corpusWindow).toEqual({ startYear: 2020, endYear: 2025 });
      expect(record.capturedAt).toBe(1_000);
      expect(record.triggered).toBe(false);
      expect(ledger.getIntent("alice")).toEqual(record);
      expect(audit.typesFor("intent-ledger", "alice")).toEqual(["IntentCaptured"]);
    });

    it("accepts windows of exactly 5 and 10 years", () => {
      expect(codeOf(() => ledger.capture("a", captureInput({ windowStart: 2000, windowEnd: 2005 })))).toBeUndefined();
      expect(codeOf(() => ledger.capture("b", captureInput({ windowStart: 2000, windowEnd: 2010 })))).toBeUndefined();
    });

    it("rejects windows outside 5-10 years or reversed", () => {
      expect(codeOf(() => ledger.capture("a", captureInput({ windowStart: 2020, windowEnd: 2024 })))).toBe("INVALID_INPUT");
      expect(codeOf(() => ledger.capture("a", captureInput({ windowStart: 2020, windowEnd: 2031 })))).toBe("INVALID_INPUT");
      expect(codeOf(() => ledger.capture("a", captureInput({ windowStart: 2025, windowEnd: 2020 })))).toBe("INVALID_INPUT");
    });

    it("requires 1 to 100 asset references", () => {
      expect(codeOf(() => ledger.capture("a", captureInput({ assetRefs: [] })))).toBe("INVALID_INPUT");
      const many = Array.from({ length: 101 }, (_, i) => `asset-${i}`);
      expect(codeOf(() => ledger.capture("a", captureInput({ assetRefs: many })))).toBe("LIMIT_EXCEEDED");
      expect(codeOf(() => ledger.capture("a", captureInput({ assetRefs: many.slice(0, 100) })))).toBeUndefined();
    });

    it("rejects malformed digests", () => {
      expect(codeOf(() => ledger.capture("a", captureInput({ intentDigest: "0x12" })))).toBe("INVALID_INPUT");
    });

    it("re-capture replaces the record but keeps goals and signed versions", () => {
      ledger.capture("alice", captureInput());
      ledger.addGoal("alice", "fund open source", constraint, 80);
      ledger.signVersion("alice", sha256Hex("v1"));
      clock.advance(10);

      const record = ledger.capture("alice", captureInput({ intentDigest: sha256Hex("intent-v2") }));

      expect(record.intentDigest).toBe(sha256Hex("intent-v2"));
      expect(record.capturedAt).toBe(1_010);
      expect(record.goals).toHaveLength(1);
      expect(ledger.isVersionSigned("alice", sha256Hex("v1"))).toBe(true);
    });

    it("is rejected once revoked or triggered", () => {
      ledger.capture("alice", captureInput());
      ledger.revoke("alice");
      expect(codeOf(() => ledger.capture("alice", captureInput()))).toBe("ALREADY_REVOKED");

      ledger.capture("bob", captureInput());
      ledger.trigger("coordinator", "bob");
      expect(codeOf(() => ledger.capture("bob", captureInput()))).toBe("ALREADY_TRIGGERED");
    });
  });

  // ─── goals & versions ────────────────────────────────────────────────

  describe("addGoal", () => {
    it("requires a prior capture", () => {
      expect(codeOf(() => ledger.addGoal("nobody", "x", constraint, 1))).toBe("NOT_CAPTURED");
    });

    it("enforces the priority range", () => {
      ledger.capture("alice", captureInput());
      expect(codeOf(() => ledger.addGoal("alice", "x", constraint, 0))).toBe("INVALID_INPUT");
      expect(codeOf(() => ledger.addGoal("alice", "x", constraint, 101))).toBe("INVALID_INPUT");
      expect(ledger.addGoal("alice", "x", constraint, 100).priority).toBe(100);
    });

    it("caps goals at 50", () => {
      ledger.capture("alice", captureInput());
      for (let i = 0; i < 50; i++) {
        ledger.addGoal("alice", `goal ${i}`, constraint, 1);
      }
      expect(codeOf(() => ledger.addGoal("alice", "one more", constraint, 1))).toBe("LIMIT_EXCEEDED");
      expect(ledger.getGoals("alice")).toHaveLength(50);
    });

    it("records a GoalAdded event with its index", () => {
      ledger.capture("alice", captureInput());
      ledger.addGoal("alice", "first", constraint, 10);
      ledger.addGoal("alice", "second", constraint, 20);

      const events = audit.history("intent-ledger", "alice");
      expect(events.map((e) => e.event.payload.goalIndex)).toEqual([undefined, 0, 1]);
    });
  });

  describe("signVersion", () => {
    it("is idempotent per digest", () => {
      ledger.capture("alice", captureInput());
      ledger.signVersion("alice", sha256Hex("v1"));
      ledger.signVersion("alice", sha256Hex("v1"));

      expect(ledger.getIntent("alice")?.signedVersions).toEqual([sha256Hex("v1")]);
      expect(audit.typesFor("intent-ledger", "alice")).toEqual(["IntentCaptured", "VersionSigned"]);
    });
  });

  // ─── terminal transitions ────────────────────────────────────────────

  describe("revoke", () => {
    it("is one-way and freezes the record", () => {
      ledger.capture("alice", captureInput());
      ledger.revoke("alice");

      expect(ledger.isRevoked("alice")).toBe(true);
      expect(codeOf(() => ledger.revoke("alice"))).toBe("ALREADY_REVOKED");
      expect(codeOf(() => ledger.addGoal("alice", "x", constraint, 1))).toBe("ALREADY_REVOKED");
    });

    it("cannot follow a trigger", () => {
      ledger.capture("alice", captureInput());
      ledger.trigger("coordinator", "alice");
      expect(codeOf(() => ledger.revoke("alice"))).toBe("ALREADY_TRIGGERED");
    });
  });

  describe("trigger", () => {
    it("requires the trigger capability", () => {
      ledger.capture("alice", captureInput());
      expect(() => ledger.trigger("alice", "alice")).toThrow(PreconditionViolation);
      expect(codeOf(() => ledger.trigger("alice", "alice"))).toBe("UNAUTHORIZED");
      expect(ledger.isTriggered("alice")).toBe(false);
    });

    it("sets triggered irreversibly", () => {
      ledger.capture("alice", captureInput());
      clock.advance(5);
      ledger.trigger("coordinator", "alice");

      expect(ledger.isTriggered("alice")).toBe(true);
      expect(ledger.getIntent("alice")?.triggeredAt).toBe(1_005);
      expect(codeOf(() => ledger.trigger("coordinator", "alice"))).toBe("ALREADY_TRIGGERED");
    });

    it("freezes goals and versions once triggered", () => {
      ledger.capture("alice", captureInput());
      ledger.trigger("coordinator", "alice");

      expect(codeOf(() => ledger.addGoal("alice", "late goal", constraint, 10))).toBe("ALREADY_TRIGGERED");
      expect(codeOf(() => ledger.signVersion("alice", sha256Hex("v2")))).toBe("ALREADY_TRIGGERED");
      expect(ledger.getIntent("alice")?.goals).toEqual([]);
    });

    it("freezes goals and versions once revoked", () => {
      ledger.capture("alice", captureInput());
      ledger.revoke("alice");

      expect(codeOf(() => ledger.addGoal("alice", "late goal", constraint, 10))).toBe("ALREADY_REVOKED");
      expect(codeOf(() => ledger.signVersion("alice", sha256Hex("v2")))).toBe("ALREADY_REVOKED");
    });

    it("cannot trigger a revoked or missing intent", () => {
      expect(codeOf(() => ledger.trigger("coordinator", "ghost"))).toBe("NOT_CAPTURED");
      ledger.capture("alice", captureInput());
      ledger.revoke("alice");
      expect(codeOf(() => ledger.trigger("coordinator", "alice"))).toBe("ALREADY_REVOKED");
    });
  });

  describe("setTriggerCoordinator", () => {
    it("lets the admin move the trigger capability", () => {
      ledger.capture("alice", captureInput());
      ledger.setTriggerCoordinator("admin", "new-coordinator");

      expect(codeOf(() => ledger.trigger("coordinator", "alice"))).toBe("UNAUTHORIZED");
      ledger.trigger("new-coordinator", "alice");
      expect(ledger.isTriggered("alice")).toBe(true);
    });

    it("refuses anyone but the admin", () => {
      expect(codeOf(() => ledger.setTriggerCoordinator("alice", "alice"))).toBe("UNAUTHORIZED");
    });
  });
});
