import { WRatio } from "fuzzball";

export interface ServiceAreaMatcher {
  /** Best canonical jurisdiction for the caller's words, or "" when nothing is close enough. */
  match(freeText: string): string;
}

export const FUZZY_SCORE_CUTOFF = 50;

/**
 * Weighted-ratio similarity over the jurisdiction names. Scoring lowercases and strips
 * punctuation on both sides; the first name wins a tie.
 */
export class FuzzyServiceAreaMatcher implements ServiceAreaMatcher {
  constructor(
    private readonly jurisdictions: readonly string[],
    private readonly cutoff = FUZZY_SCORE_CUTOFF
  ) {}

  match(freeText: string): string {
    if (!freeText.trim()) return "";
    let best = "";
    let bestScore = -1;
    for (const name of this.jurisdictions) {
      const score = WRatio(freeText, name);
      if (score > bestScore) {
        best = name;
        bestScore = score;
      }
    }
    return bestScore >= this.cutoff ? best : "";
  }
}

const ADMIN_SUFFIX = /\s+(city|county|town)$/;

export function normalizeJurisdiction(text: string): string {
  let out = text.trim().toLowerCase().replace(/\s+/g, " ");
  while (ADMIN_SUFFIX.test(out)) out = out.replace(ADMIN_SUFFIX, "");
  return out.trim();
}

/** Exact match after suffix stripping, then substring in either direction. */
export class SuffixServiceAreaMatcher implements ServiceAreaMatcher {
  private readonly normalized: { name: string; key: string }[];

  constructor(jurisdictions: readonly string[]) {
    this.normalized = jurisdictions.map((name) => ({ name, key: normalizeJurisdiction(name) }));
  }

  match(freeText: string): string {
    const key = normalizeJurisdiction(freeText);
    if (!key) return "";
    const exact = this.normalized.find((j) => j.key === key);
    if (exact) return exact.name;
    const partial = this.normalized.find((j) => j.key.includes(key) || key.includes(j.key));
    return partial?.name ?? "";
  }
}

export function createServiceAreaMatcher(kind: "fuzzy" | "suffix", jurisdictions: readonly string[]): ServiceAreaMatcher {
  return kind === "suffix" ? new SuffixServiceAreaMatcher(jurisdictions) : new FuzzyServiceAreaMatcher(jurisdictions);
}
