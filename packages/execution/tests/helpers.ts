import { isCoreError } from "@afterword/types";
import type { FundsTransport } from "../src/types.js";

export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isCoreError(err)) return err.code;
    throw err;
  }
  return undefined;
}

export function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

/**
 * A transport whose transfers stay pending until released, oldest first.
 */
export function deferredTransport(): { transport: FundsTransport; release: () => void } {
  const pending: Array<() => void> = [];
  return {
    transport: {
      send: () =>
        new Promise<void>((resolve) => {
          pending.push(resolve);
        }),
    },
    release: () => {
      pending.shift()?.();
    },
  };
}
