/**
 * Capability Table
 *
 * Maps each gated operation to the set of identities allowed to call it.
 * Only the admin identity may change the table. Every gated operation
 * calls `assert` before it reads or writes any state.
 */

import { PreconditionViolation } from "./errors.js";
import type { Identity } from "./primitives.js";

export type Capability =
  | "intent.trigger"
  | "resolution.index"
  | "execution.execute"
  | "execution.sunset"
  | "execution.recover"
  | "sunset.operate";

export const CAPABILITIES: readonly Capability[] = [
  "intent.trigger",
  "resolution.index",
  "execution.execute",
  "execution.sunset",
  "execution.recover",
  "sunset.operate",
];

export function isCapability(value: unknown): value is Capability {
  return typeof value === "string" && CAPABILITIES.some((capability) => capability === value);
}

export type CapabilityGrants = Partial<Record<Capability, readonly Identity[]>>;

export class CapabilityTable {
  private _admin: Identity;
  private readonly _holders = new Map<Capability, Set<Identity>>();

  constructor(admin: Identity, grants: CapabilityGrants = {}) {
    if (admin.length === 0) {
      throw new PreconditionViolation("INVALID_INPUT", "Admin identity must be non-empty");
    }
    this._admin = admin;
    for (const capability of CAPABILITIES) {
      this._holders.set(capability, new Set(grants[capability] ?? []));
    }
  }

  get admin(): Identity {
    return this._admin;
  }

  has(capability: Capability, identity: Identity): boolean {
    return this.holdersOf(capability).has(identity);
  }

  /**
   * Throws UNAUTHORIZED unless `identity` holds `capability`.
   */
  assert(capability: Capability, identity: Identity): void {
    if (!this.has(capability, identity)) {
      throw new PreconditionViolation(
        "UNAUTHORIZED",
        `Identity "${identity}" lacks capability "${capability}"`,
      );
    }
  }

  assertAdmin(identity: Identity): void {
    if (identity !== this._admin) {
      throw new PreconditionViolation(
        "UNAUTHORIZED",
        `Identity "${identity}" is not the admin`,
      );
    }
  }

  holders(capability: Capability): readonly Identity[] {
    return [...this.holdersOf(capability)];
  }

  // ─── Administration ────────────────────────────────────────────────

  grant(caller: Identity, capability: Capability, identity: Identity): void {
    this.assertAdmin(caller);
    if (identity.length === 0) {
      throw new PreconditionViolation("INVALID_INPUT", "Identity must be non-empty");
    }
    this.holdersOf(capability).add(identity);
  }

  revoke(caller: Identity, capability: Capability, identity: Identity): void {
    this.assertAdmin(caller);
    this.holdersOf(capability).delete(identity);
  }

  /**
   * Replace every holder of `capability` with `identities`.
   */
  replace(caller: Identity, capability: Capability, identities: readonly Identity[]): void {
    this.assertAdmin(caller);
    if (identities.some((id) => id.length === 0)) {
      throw new PreconditionViolation("INVALID_INPUT", "Identity must be non-empty");
    }
    this._holders.set(capability, new Set(identities));
  }

  transferAdmin(caller: Identity, next: Identity): void {
    this.assertAdmin(caller);
    if (next.length === 0) {
      throw new PreconditionViolation("INVALID_INPUT", "Admin identity must be non-empty");
    }
    this._admin = next;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private holdersOf(capability: Capability): Set<Identity> {
    let set = this._holders.get(capability);
    if (set === undefined) {
      set = new Set();
      this._holders.set(capability, set);
    }
    return set;
  }
}
