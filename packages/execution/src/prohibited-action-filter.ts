/**
 * Prohibited-action filter.
 *
 * The engine may never take part in electoral or political activity.
 * Every proposed action passes through these layers, in order; the
 * first layer that matches decides:
 *
 *   1. non-ascii       any character outside 0x00-0x7F
 *   2. length          more than MAX_ACTION_LENGTH characters
 *   3. denylist        SHA-256 of the lowercased text equals a listed digest
 *   4. primary-keyword case-insensitive; "word" entries must be bounded
 *                      by non-letters, "substring" entries match anywhere
 *                      outside a keyword exemption (e.g. "selection")
 *   5. misspelling     known variants of primary keywords
 *   6. phrase          multi-word phrases
 *
 * Secondary keywords never block. They are reported as advisories so a
 * reviewer can see why an action looked borderline.
 *
 * The table is read once from data/prohibited-actions.json and is never
 * mutated at run time. A new list ships as a new table version.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { MAX_ACTION_LENGTH, sha256Hex } from "@afterword/types";

// =============================================================================
// Table
// =============================================================================

const ProhibitedActionTableSchema = z.object({
  version: z.string().min(1),
  description: z.string().optional(),
  denylistDigests: z.array(
    z.object({
      label: z.string().min(1),
      digest: z.string().regex(/^[0-9a-f]{64}$/),
    }),
  ),
  primaryKeywords: z.array(
    z.object({
      term: z.string().min(1),
      match: z.enum(["word", "substring"]),
    }),
  ),
  /** Benign words that contain a substring keyword; ignored by layer 4 only */
  keywordExemptions: z.array(z.string().min(1)).optional(),
  misspellings: z.array(z.string().min(1)),
  phrases: z.array(z.string().min(1)),
  secondaryKeywords: z.array(z.string().min(1)),
});

export type ProhibitedActionTable = z.infer<typeof ProhibitedActionTableSchema>;

export const DEFAULT_TABLE_URL = new URL("../data/prohibited-actions.json", import.meta.url);

/**
 * Read and validate a table. Throws a ZodError on a malformed file.
 */
export function loadProhibitedActionTable(url: URL = DEFAULT_TABLE_URL): ProhibitedActionTable {
  const raw: unknown = JSON.parse(readFileSync(url, "utf-8"));
  return ProhibitedActionTableSchema.parse(raw);
}

// =============================================================================
// Filter
// =============================================================================

export type FilterLayer =
  | "non-ascii"
  | "length"
  | "denylist"
  | "primary-keyword"
  | "misspelling"
  | "phrase";

export interface FilterVerdict {
  readonly blocked: boolean;
  readonly layer?: FilterLayer;
  /** The term, phrase or denylist label that matched */
  readonly matched?: string;
  /** Secondary keywords found in the text; informational only */
  readonly advisories: readonly string[];
}

const NON_ASCII = /[^\x00-\x7F]/;

export class ProhibitedActionFilter {
  readonly version: string;
  private readonly denylist: ReadonlyMap<string, string>;
  private readonly primary: readonly { readonly term: string; readonly match: "word" | "substring" }[];
  private readonly exemptions: readonly string[];
  private readonly misspellings: readonly string[];
  private readonly phrases: readonly string[];
  private readonly secondary: readonly string[];

  constructor(table: ProhibitedActionTable) {
    const parsed = ProhibitedActionTableSchema.parse(table);
    this.version = parsed.version;
    this.denylist = new Map(parsed.denylistDigests.map((d) => [d.digest, d.label]));
    this.primary = parsed.primaryKeywords.map((k) => ({ term: k.term.toLowerCase(), match: k.match }));
    this.exemptions = (parsed.keywordExemptions ?? []).map((e) => e.toLowerCase());
    this.misspellings = parsed.misspellings.map((m) => m.toLowerCase());
    this.phrases = parsed.phrases.map((p) => p.toLowerCase());
    this.secondary = parsed.secondaryKeywords.map((s) => s.toLowerCase());
  }

  check(action: string): FilterVerdict {
    if (NON_ASCII.test(action)) {
      return { blocked: true, layer: "non-ascii", advisories: [] };
    }
    if (action.length > MAX_ACTION_LENGTH) {
      return { blocked: true, layer: "length", advisories: [] };
    }

    const text = action.toLowerCase();
    const advisories = this.secondary.filter((term) => text.includes(term));

    const label = this.denylist.get(sha256Hex(text));
    if (label !== undefined) {
      return { blocked: true, layer: "denylist", matched: label, advisories };
    }

    const keywordText = maskExemptions(text, this.exemptions);
    for (const { term, match } of this.primary) {
      const hit = match === "word" ? containsWord(keywordText, term) : keywordText.includes(term);
      if (hit) return { blocked: true, layer: "primary-keyword", matched: term, advisories };
    }

    const misspelling = this.misspellings.find((m) => text.includes(m));
    if (misspelling !== undefined) {
      return { blocked: true, layer: "misspelling", matched: misspelling, advisories };
    }

    const phrase = this.phrases.find((p) => text.includes(p));
    if (phrase !== undefined) {
      return { blocked: true, layer: "phrase", matched: phrase, advisories };
    }

    return { blocked: false, advisories };
  }

  isProhibited(action: string): boolean {
    return this.check(action).blocked;
  }
}

// ─── Helpers ───────────────────────────────────────────────────────────

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "a" && ch <= "z";
}

/**
 * True when `term` occurs in `text` with no letter directly before or
 * after it. Both arguments are lowercase.
 */
export function containsWord(text: string, term: string): boolean {
  let from = 0;
  for (;;) {
    const at = text.indexOf(term, from);
    if (at === -1) return false;
    if (!isLetter(text[at - 1]) && !isLetter(text[at + term.length])) return true;
    from = at + 1;
  }
}

/** Blank out every occurrence of an exempt word. */
function maskExemptions(text: string, exemptions: readonly string[]): string {
  let masked = text;
  for (const word of exemptions) {
    masked = masked.split(word).join(" ".repeat(word.length));
  }
  return masked;
}

/** Filter over the bundled table, loaded once per process. */
export const defaultFilter = new ProhibitedActionFilter(loadProhibitedActionTable());
