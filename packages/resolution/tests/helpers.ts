import { isCoreError } from "@afterword/types";

export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isCoreError(err)) return err.code;
    throw err;
  }
  return undefined;
}
