/**
 * Property-based tests for hash chain integrity.
 *
 * 1. Any N events → valid chain
 * 2. Remove any event → breaks chain
 * 3. Modify any payload → breaks chain
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@afterword/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";
import { appendAll, makeEvent } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDomainEvent: fc.Arbitrary<DomainEvent> = fc
  .record({
    type: fc.constantFrom("GoalAdded", "DeadmanCheckIn", "ActionExecuted", "InactionDefault"),
    principal: fc.constantFrom("alice", "bob", "carol"),
    note: fc.string({ maxLength: 20 }),
    confidence: fc.integer({ min: 0, max: 100 }),
  })
  .map((r) => makeEvent(r.type, r.principal, "execution", { note: r.note, confidence: r.confidence }));

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any N events produce a valid chain", () => {
    fc.assert(
      fc.property(fc.array(arbDomainEvent, { minLength: 1, maxLength: 20 }), (events) => {
        const store = new InMemoryEventStore();
        for (const e of events) {
          store.append(`execution:${String(e.payload.principal)}`, e);
        }
        expect(store.verifyIntegrity().valid).toBe(true);
      }),
      { numRuns: 50 },
    );
  });

  it("removing any event from the middle breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 3, maxLength: 10 }),
        fc.nat(),
        (events, removeIndex) => {
          const store = new InMemoryEventStore();
          appendAll(store, "stream", events);

          const all = store.readAll();
          const idx = 1 + (removeIndex % (all.length - 2));
          const tampered = [...all.slice(0, idx), ...all.slice(idx + 1)];

          expect(verifyHashChain(tampered).valid).toBe(false);
        },
      ),
      { numRuns: 50 },
    );
  });

  it("changing any payload breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 10 }),
        fc.nat(),
        (events, pick) => {
          const store = new InMemoryEventStore();
          appendAll(store, "stream", events);

          const all = [...store.readAll()];
          const idx = pick % all.length;
          const target = all[idx]!;
          all[idx] = {
            ...target,
            event: {
              ...target.event,
              payload: { ...target.event.payload, tampered: true },
            },
          };

          const result = verifyHashChain(all);
          expect(result.valid).toBe(false);
          expect(result.errors[0]?.position).toBe(idx + 1);
        },
      ),
      { numRuns: 50 },
    );
  });
});
