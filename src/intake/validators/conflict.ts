import type { ConflictCheckResponse, ConflictInterval, OpposingParties, OpposingParty } from "../schemas.js";
import { conflictCheckResponseSchema } from "../schemas.js";
import { postJson, type Fetch } from "./http.js";

export type ConflictCheckResponses = {
  counts: Record<ConflictInterval, number>;
  results: ConflictCheckResponse[];
};

export interface ConflictChecker {
  check(parties: OpposingParties, opts?: { signal?: AbortSignal }): Promise<ConflictCheckResponses>;
}

export function emptyConflictResponses(): ConflictCheckResponses {
  return { counts: { lowest: 0, low: 0, high: 0, highest: 0 }, results: [] };
}

function tally(responses: ConflictCheckResponses, response: ConflictCheckResponse) {
  responses.results.push(response);
  responses.counts[response.interval] += 1;
}

/** A single highest-severity hit blocks intake, whatever the other parties scored. */
export function hasBlockingConflict(responses: ConflictCheckResponses): boolean {
  return responses.counts.highest > 0;
}

export function partyNames(party: OpposingParty): string[] {
  const short = `${party.first} ${party.last}`;
  return party.middle ? [`${party.first} ${party.middle} ${party.last}`, short] : [short];
}

export const DEFAULT_CONFLICT_NAMES: readonly string[] = ["Jimmy Dean"];

/** Case-sensitive deny list, for development and tests. */
export class StaticConflictChecker implements ConflictChecker {
  constructor(private readonly denyList: readonly string[] = DEFAULT_CONFLICT_NAMES) {}

  async check(parties: OpposingParties): Promise<ConflictCheckResponses> {
    const responses = emptyConflictResponses();
    for (const party of parties) {
      const hit = partyNames(party).some((name) => this.denyList.includes(name));
      tally(
        responses,
        hit
          ? { status: 200, message: "Existing client or adverse party", interval: "highest", score: 100 }
          : { status: 200, message: "No match", interval: "lowest", score: 0 }
      );
    }
    return responses;
  }
}

export type LegalServerConflictCheckerOptions = {
  subdomain: string;
  bearerToken: string;
  timeoutMs: number;
  fetchFn?: Fetch;
};

export function legalServerApiBase(subdomain: string): string {
  return `https://${subdomain}.legalserver.org/api/v2/`;
}

/** Submits each party to the case management system's conflict_check endpoint in turn. */
export class LegalServerConflictChecker implements ConflictChecker {
  constructor(private readonly opts: LegalServerConflictCheckerOptions) {}

  async check(parties: OpposingParties, { signal }: { signal?: AbortSignal } = {}): Promise<ConflictCheckResponses> {
    const responses = emptyConflictResponses();
    const url = `${legalServerApiBase(this.opts.subdomain)}conflict_check`;
    for (const party of parties) {
      const response = await postJson("conflict check", url, party, conflictCheckResponseSchema, {
        headers: { Authorization: `Bearer ${this.opts.bearerToken}`, Accept: "application/json, text/html" },
        timeoutMs: this.opts.timeoutMs,
        signal,
        fetchFn: this.opts.fetchFn
      });
      tally(responses, response);
    }
    return responses;
  }
}
