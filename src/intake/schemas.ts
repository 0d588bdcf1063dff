import { z } from "zod";
import type { FunctionName } from "./types.js";
import { validatePhoneNumber } from "./validators/phoneNumber.js";

// Shapes of the structured arguments the dialogue agent extracts from the caller,
// and of the payloads returned by the remote classifier and conflict check.

/** Whole dollars; tolerates "1,200" and "$1200" as spoken-number transcriptions. */
const wholeDollars = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v.replace(/[$,\s]/g, "")) : v),
  z.number({ invalid_type_error: "Expected a whole dollar amount" }).int("Expected a whole dollar amount")
);

const blankToUndefined = (v: unknown) => (v === "" || v === null || v === false ? undefined : v);

// ─── Income ───────────────────────────────────────────────────────────────────

export const incomePeriodSchema = z.enum(["month", "year"]);

export const incomeDetailSchema = z.object({
  amount: wholeDollars,
  period: incomePeriodSchema
});

/** income type → detail */
export const memberIncomeSchema = z.record(z.string().min(1), incomeDetailSchema);

/** household member name → income by type */
export const householdIncomeSchema = z.record(z.string().min(1), memberIncomeSchema);

export type HouseholdIncome = z.infer<typeof householdIncomeSchema>;

// ─── Assets ───────────────────────────────────────────────────────────────────

/** asset name → net value; an entry may name several assets, all of which count. */
export const assetListingSchema = z.array(z.record(z.string().min(1), wholeDollars));

export type AssetListing = z.infer<typeof assetListingSchema>;

// ─── Opposing parties ─────────────────────────────────────────────────────────

export const phoneTypeSchema = z.enum(["business", "other", "home", "mobile", "fax"]);

export const partyPhoneSchema = z.object({
  number: z.string().transform((raw, ctx) => {
    const { isValid, phoneNumber } = validatePhoneNumber(raw);
    if (!isValid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid US phone number: ${raw}` });
      return z.NEVER;
    }
    return phoneNumber;
  }),
  type: phoneTypeSchema
});

const isoDate = z
  .string()
  .refine(
    (v) => /^\d{4}-\d{2}-\d{2}$/.test(v) && !Number.isNaN(Date.parse(`${v}T00:00:00Z`)),
    "Expected a date as YYYY-MM-DD"
  );

export const opposingPartySchema = z.object({
  first: z.string().trim().min(1),
  middle: z.preprocess(blankToUndefined, z.string().trim().optional()),
  last: z.string().trim().min(1),
  dob: z.preprocess(blankToUndefined, isoDate.optional()),
  visa_number: z.preprocess(blankToUndefined, z.string().optional()),
  phones: z.preprocess(
    (v) => (Array.isArray(v) && v.length === 0 ? undefined : blankToUndefined(v)),
    z.array(partyPhoneSchema).optional()
  )
});

export const opposingPartiesSchema = z.array(opposingPartySchema);

export type OpposingParty = z.infer<typeof opposingPartySchema>;
export type OpposingParties = z.infer<typeof opposingPartiesSchema>;

// ─── Remote payloads ──────────────────────────────────────────────────────────

export const conflictIntervalSchema = z.enum(["lowest", "low", "high", "highest"]);

export const conflictCheckResponseSchema = z.object({
  status: z.number().int(),
  message: z.string(),
  interval: conflictIntervalSchema,
  score: z.number().int().min(0).max(100)
});

export type ConflictInterval = z.infer<typeof conflictIntervalSchema>;
export type ConflictCheckResponse = z.infer<typeof conflictCheckResponseSchema>;

export const classificationLabelSchema = z.object({
  label: z.string(),
  confidence: z.number().nullish().transform((v) => v ?? undefined),
  legal_problem_code: z.string().optional()
});

export const followUpQuestionSchema = z.object({
  question: z.string(),
  format: z.string().nullish().transform((v) => v ?? undefined),
  options: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? undefined)
});

export const classificationResponseSchema = z.object({
  labels: z.array(classificationLabelSchema),
  follow_up_questions: z.array(followUpQuestionSchema).default([])
});

export type FollowUpQuestion = z.infer<typeof followUpQuestionSchema>;
export type ClassificationResponse = z.infer<typeof classificationResponseSchema>;

// ─── Function arguments ───────────────────────────────────────────────────────

const noArgs = z.object({}).passthrough();
const optionalName = z.string().trim().optional().default("");

export const functionArgsSchemas = {
  system_phone_number: noArgs,
  record_phone_number: z.object({ phone_number: z.string() }),
  record_name: z.object({ first: optionalName, middle: optionalName, last: optionalName }),
  record_service_area: z.object({ location: z.string().trim().min(1) }),
  record_case_type: z.object({ case_description: z.string().trim().min(1) }),
  record_conflict: z.object({ opposing_parties: opposingPartiesSchema }),
  record_domestic_violence: z.object({
    perpetrators: z
      .array(z.string().trim())
      .default([])
      .transform((names) => names.filter(Boolean))
  }),
  record_income: z.object({ income: householdIncomeSchema }),
  record_assets_receives_benefits: z.object({ receives_benefits: z.boolean() }),
  record_assets_list: z.object({ assets: assetListingSchema }),
  record_citizenship: z.object({ is_a_us_citizen: z.boolean() }),
  record_emergency: z.object({ is_emergency: z.boolean() }),
  continue_intake: z.object({ next_step: z.string() }),
  end_conversation: noArgs,
  caller_ended_conversation: noArgs
} as const satisfies Record<FunctionName, z.ZodTypeAny>;

export type FunctionArgs = { [K in keyof typeof functionArgsSchemas]: z.output<(typeof functionArgsSchemas)[K]> };

// ─── Errors ───────────────────────────────────────────────────────────────────

/** One line per failing path, e.g. `John Doe.wages.period: Invalid enum value...`. */
export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
