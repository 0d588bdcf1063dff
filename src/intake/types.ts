import type { AssetListing, FollowUpQuestion, HouseholdIncome, OpposingParties } from "./schemas.js";
import type { ConflictCheckResponses } from "./validators/conflict.js";

/** The record steps double as their entry functions' names (see continue_intake). */
export const RECORD_STEPS = [
  "record_phone_number",
  "record_name",
  "record_service_area",
  "record_case_type",
  "record_conflict",
  "record_domestic_violence",
  "record_income",
  "record_assets_receives_benefits",
  "record_assets_list",
  "record_citizenship",
  "record_emergency"
] as const;

export type RecordStep = (typeof RECORD_STEPS)[number];

export const STEP_NAMES = [
  "initial",
  ...RECORD_STEPS,
  "confirm_income_over_limit",
  "confirm_assets_over_limit",
  "ineligible",
  "complete_intake",
  "end",
  "caller_ended_conversation"
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export const TERMINAL_STEPS = ["end", "caller_ended_conversation"] as const satisfies readonly StepName[];

/** Functions the initial step may be configured to start with. */
export const ENTRY_FUNCTIONS = ["system_phone_number", ...RECORD_STEPS] as const;

export type EntryFunctionName = (typeof ENTRY_FUNCTIONS)[number];

export const FUNCTION_NAMES = [
  ...ENTRY_FUNCTIONS,
  "continue_intake",
  "end_conversation",
  "caller_ended_conversation"
] as const;

export type FunctionName = (typeof FUNCTION_NAMES)[number];

export function isFunctionName(name: string): name is FunctionName {
  return FUNCTION_NAMES.some((n) => n === name);
}

export function isRecordStep(name: string): name is RecordStep {
  return RECORD_STEPS.some((n) => n === name);
}

export type PostAction = "end_conversation";

/** A conversation node. Built once per transition and never mutated. */
export type Step = Readonly<{
  name: StepName;
  instructions: string;
  functions: readonly FunctionName[];
  /** Compact the dialogue so far into a summary before continuing. */
  contextReset: boolean;
  postAction?: PostAction;
}>;

// ─── Results ──────────────────────────────────────────────────────────────────

export type Status = "success" | "error";

export type FlowResult = { status: Status; error?: string };

export type SystemPhoneNumberResult = FlowResult & { phone_number: string | null };
export type PhoneNumberResult = FlowResult & { is_valid: boolean; phone_number: string };
export type NameResult = FlowResult & { first: string; middle: string; last: string };
export type ServiceAreaResult = FlowResult & { is_eligible: boolean; location: string; match: string };
export type CaseTypeResult = FlowResult & {
  is_eligible?: boolean;
  label?: string;
  confidence?: number;
  legal_problem_code?: string;
  /** Present when the classifier needs more detail before it can decide. */
  follow_up_questions?: FollowUpQuestion[];
};
export type ConflictResult = FlowResult & {
  has_highest_conflict: boolean;
  responses: ConflictCheckResponses;
  opposing_parties: OpposingParties;
};
export type DomesticViolenceResult = FlowResult & { is_experiencing: boolean; perpetrators: string[] };
export type IncomeResult = FlowResult & {
  is_eligible: boolean;
  monthly_amount: number;
  listing: HouseholdIncome;
  household_size: number;
};
export type AssetsResult = FlowResult & {
  is_eligible: boolean;
  listing: AssetListing;
  total_value: number;
  receives_benefits: boolean;
};
export type CitizenshipResult = FlowResult & { is_citizen: boolean };
export type EmergencyResult = FlowResult & { is_emergency: boolean };

export type StepResult =
  | FlowResult
  | SystemPhoneNumberResult
  | PhoneNumberResult
  | NameResult
  | ServiceAreaResult
  | CaseTypeResult
  | ConflictResult
  | DomesticViolenceResult
  | IncomeResult
  | AssetsResult
  | CitizenshipResult
  | EmergencyResult;

type Recorded<T extends FlowResult> = Omit<T, "status" | "error">;

/** What each record step leaves behind, keyed the way the summary and logs read it. */
export type IntakeState = {
  phone?: Recorded<PhoneNumberResult>;
  name?: Recorded<NameResult>;
  service_area?: Recorded<ServiceAreaResult>;
  case_type?: Recorded<CaseTypeResult>;
  conflict?: Recorded<ConflictResult>;
  domestic_violence?: Recorded<DomesticViolenceResult>;
  income?: Recorded<IncomeResult>;
  assets?: Recorded<AssetsResult>;
  citizenship?: Recorded<CitizenshipResult>;
  emergency?: Recorded<EmergencyResult>;
};

export type CallSession = {
  callSid: string;
  /** Caller ID from the telephony provider, when it sent one. */
  callerId: string | null;
  state: IntakeState;
  step: StepName;
  startedAt: string;
};

export type FunctionOutcome = {
  result: StepResult | null;
  next: Step | null;
};
