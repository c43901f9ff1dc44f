/**
 * In-memory funds transport.
 *
 * Records every transfer instead of moving anything. Used by the
 * service when no real transport is configured, and by tests.
 */

import type { FundsTransport } from "./types.js";

export interface SentTransfer {
  readonly recipient: string;
  readonly amount: bigint;
  readonly memo: string;
}

export class InMemoryFundsTransport implements FundsTransport {
  private readonly _sent: SentTransfer[] = [];
  private failure: Error | undefined;

  /** Every transfer that succeeded, in order */
  get sent(): readonly SentTransfer[] {
    return [...this._sent];
  }

  /** Reject the next `send` with `error`. */
  failNext(error: Error = new Error("transport unavailable")): void {
    this.failure = error;
  }

  async send(recipient: string, amount: bigint, memo: string): Promise<void> {
    const failure = this.failure;
    if (failure !== undefined) {
      this.failure = undefined;
      throw failure;
    }
    this._sent.push({ recipient, amount, memo });
  }
}
