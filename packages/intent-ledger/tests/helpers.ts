import { isCoreError, sha256Hex } from "@afterword/types";
import type { CaptureInput } from "../src/types.js";

/**
 * Run `fn` and return the code of the core error it throws.
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isCoreError(err)) return err.code;
    throw err;
  }
  return undefined;
}

export function captureInput(overrides: Partial<CaptureInput> = {}): CaptureInput {
  return {
    intentDigest: sha256Hex("intent-v1"),
    corpusDigest: sha256Hex("corpus-2020-2025"),
    corpusUri: "ipfs://corpus",
    assetsUri: "ipfs://assets",
    assetRefs: ["album-1", "album-2"],
    windowStart: 2020,
    windowEnd: 2025,
    ...overrides,
  };
}
