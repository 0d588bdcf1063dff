import { readFileSync } from "node:fs";
import { z } from "zod";
import { IntakeConfigError } from "./errors.js";

// Loaded once per process and shared read-only by every call.

const DATA_DIR = new URL("../../data/", import.meta.url);

const serviceAreasSchema = z.array(z.string().min(1)).min(1);

const povertyScaleSchema = z.object({
  poverty_base: z.number().int().positive(),
  poverty_increment: z.number().int().nonnegative(),
  poverty_base_ak: z.number().int().positive(),
  poverty_increment_ak: z.number().int().nonnegative(),
  poverty_base_hi: z.number().int().positive(),
  poverty_increment_hi: z.number().int().nonnegative()
});

const taxonomySchema = z.array(
  z.object({
    label: z.string().min(1),
    legal_problem_code: z.string()
  })
);

export type PovertyScaleTable = z.infer<typeof povertyScaleSchema>;
export type CaseTypeTaxonomy = ReadonlyMap<string, string>;

function readDataFile<T>(file: string, schema: z.ZodType<T>): T {
  const url = new URL(file, DATA_DIR);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(url, "utf8"));
  } catch (err) {
    throw new IntakeConfigError(`Cannot read reference data ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new IntakeConfigError(`Invalid reference data ${file}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

let serviceAreas: readonly string[] | null = null;
let povertyScale: PovertyScaleTable | null = null;
let taxonomy: CaseTypeTaxonomy | null = null;

export function loadServiceAreas(): readonly string[] {
  serviceAreas ??= Object.freeze(readDataFile("service-areas.json", serviceAreasSchema));
  return serviceAreas;
}

export function loadPovertyScale(): PovertyScaleTable {
  povertyScale ??= Object.freeze(readDataFile("federal-poverty-scale.json", povertyScaleSchema));
  return povertyScale;
}

/** Taxonomy label → legal problem code. */
export function loadCaseTypeTaxonomy(): CaseTypeTaxonomy {
  taxonomy ??= new Map(
    readDataFile("case-type-taxonomy.json", taxonomySchema).map((row) => [row.label, row.legal_problem_code])
  );
  return taxonomy;
}
