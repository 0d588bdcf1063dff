import type { Env } from "../env.js";
import type { IntakeDependencies, IntakeSettings } from "./engine.js";
import { IntakeConfigError } from "./errors.js";
import { loadCaseTypeTaxonomy, loadPovertyScale, loadServiceAreas } from "./referenceData.js";
import { RemoteCaseTypeClassifier, StaticCaseTypeClassifier, type CaseTypeClassifier } from "./validators/caseType.js";
import { LegalServerConflictChecker, StaticConflictChecker, type ConflictChecker } from "./validators/conflict.js";
import type { Fetch } from "./validators/http.js";
import { PovertyScale } from "./validators/poverty.js";
import { createServiceAreaMatcher } from "./validators/serviceArea.js";

export type IntakeConfig = {
  settings: IntakeSettings;
  deps: IntakeDependencies;
};

function required(value: string | undefined, name: string): string {
  if (!value) throw new IntakeConfigError(`${name} is not set`);
  return value;
}

function buildClassifier(env: Env, fetchFn?: Fetch): CaseTypeClassifier {
  const taxonomy = loadCaseTypeTaxonomy();
  if (env.CASE_TYPE_CLASSIFIER === "static") return new StaticCaseTypeClassifier(taxonomy);
  return new RemoteCaseTypeClassifier({
    url: required(env.CLASSIFIER_URL, "CLASSIFIER_URL"),
    apiKey: required(env.CLASSIFIER_API_KEY, "CLASSIFIER_API_KEY"),
    taxonomy,
    timeoutMs: env.REMOTE_TIMEOUT_MS,
    fetchFn
  });
}

function buildConflictChecker(env: Env, fetchFn?: Fetch): ConflictChecker {
  if (env.CONFLICT_CHECKER === "static") return new StaticConflictChecker();
  return new LegalServerConflictChecker({
    subdomain: required(env.LEGALSERVER_SUBDOMAIN, "LEGALSERVER_SUBDOMAIN"),
    bearerToken: required(env.LEGALSERVER_BEARER_TOKEN, "LEGALSERVER_BEARER_TOKEN"),
    timeoutMs: env.REMOTE_TIMEOUT_MS,
    fetchFn
  });
}

/** Loads the reference data and picks the validator variants. Built once at startup. */
export function buildIntakeConfig(env: Env, fetchFn?: Fetch): IntakeConfig {
  return {
    settings: {
      initialFunction: env.INITIAL_FUNCTION,
      incomeMultiplier: env.INCOME_POVERTY_MULTIPLIER,
      assetLimit: env.ASSET_LIMIT,
      caseTypeConfidenceThreshold: env.CASE_TYPE_CONFIDENCE_THRESHOLD,
      alternativeProviders: env.ALTERNATIVE_PROVIDERS
    },
    deps: {
      serviceAreaMatcher: createServiceAreaMatcher(env.SERVICE_AREA_MATCHER, loadServiceAreas()),
      caseTypeClassifier: buildClassifier(env, fetchFn),
      conflictChecker: buildConflictChecker(env, fetchFn),
      povertyScale: new PovertyScale(loadPovertyScale(), env.POVERTY_SCALE_REGION)
    }
  };
}
