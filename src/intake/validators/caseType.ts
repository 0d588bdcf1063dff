import type { CaseTypeTaxonomy } from "../referenceData.js";
import { classificationResponseSchema, type ClassificationResponse } from "../schemas.js";
import { postJson, type Fetch } from "./http.js";

export type ClassifiedLabel = {
  label: string;
  confidence?: number;
  /** Empty when the label has no counterpart in the local taxonomy. */
  legal_problem_code: string;
};

export type Classification = {
  labels: ClassifiedLabel[];
  follow_up_questions: ClassificationResponse["follow_up_questions"];
};

export interface CaseTypeClassifier {
  classify(description: string, opts?: { signal?: AbortSignal }): Promise<Classification>;
}

/**
 * Allow-list lookup against the local taxonomy labels, case-insensitive. Anything not
 * listed (or listed without a code) comes back with an empty code and is ineligible.
 */
export class StaticCaseTypeClassifier implements CaseTypeClassifier {
  private readonly byKey: Map<string, { label: string; code: string }>;

  constructor(taxonomy: CaseTypeTaxonomy) {
    this.byKey = new Map([...taxonomy].map(([label, code]) => [label.toLowerCase(), { label, code }]));
  }

  async classify(description: string): Promise<Classification> {
    const key = description.trim().toLowerCase();
    const hit = this.byKey.get(key);
    return {
      labels: [{ label: hit?.label ?? key, confidence: 1, legal_problem_code: hit?.code ?? "" }],
      follow_up_questions: []
    };
  }
}

export type RemoteCaseTypeClassifierOptions = {
  url: string;
  apiKey: string;
  taxonomy: CaseTypeTaxonomy;
  timeoutMs: number;
  fetchFn?: Fetch;
};

/** Delegates to the taxonomy classification service, then maps labels to problem codes. */
export class RemoteCaseTypeClassifier implements CaseTypeClassifier {
  constructor(private readonly opts: RemoteCaseTypeClassifierOptions) {}

  async classify(description: string, { signal }: { signal?: AbortSignal } = {}): Promise<Classification> {
    const response = await postJson(
      "case type classifier",
      this.opts.url,
      { problem_description: description, include_debug_details: false, decision_mode: "vote" },
      classificationResponseSchema,
      {
        headers: { Authorization: `Bearer ${this.opts.apiKey}` },
        timeoutMs: this.opts.timeoutMs,
        signal,
        fetchFn: this.opts.fetchFn
      }
    );
    return {
      labels: response.labels.map((l) => ({
        label: l.label,
        confidence: l.confidence,
        legal_problem_code: this.opts.taxonomy.get(l.label) ?? ""
      })),
      follow_up_questions: response.follow_up_questions
    };
  }
}
