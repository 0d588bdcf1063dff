import { IntakeConfigError } from "./errors.js";
import { stepInstructions } from "./prompts.js";
import type { EntryFunctionName, FunctionName, RecordStep, Step, StepName } from "./types.js";
import { RECORD_STEPS, TERMINAL_STEPS } from "./types.js";

// ─── Transition graph ─────────────────────────────────────────────────────────
//
// Every step a function may move to. The engine refuses to enter a step that is not
// listed for the function that produced it.

export const FUNCTION_TRANSITIONS: Readonly<Record<FunctionName, readonly StepName[]>> = {
  system_phone_number: ["record_phone_number"],
  record_phone_number: ["record_name"],
  record_name: ["record_service_area"],
  record_service_area: ["record_case_type", "ineligible"],
  record_case_type: ["record_conflict", "ineligible"],
  record_conflict: ["record_domestic_violence", "ineligible"],
  record_domestic_violence: ["record_income"],
  record_income: ["record_assets_receives_benefits", "confirm_income_over_limit"],
  record_assets_receives_benefits: ["record_citizenship", "record_assets_list"],
  record_assets_list: ["record_citizenship", "confirm_assets_over_limit"],
  record_citizenship: ["record_emergency"],
  record_emergency: ["complete_intake"],
  continue_intake: RECORD_STEPS,
  end_conversation: ["end"],
  caller_ended_conversation: ["caller_ended_conversation"]
};

const ESCAPE: readonly FunctionName[] = ["caller_ended_conversation"];

function stepFunctions(step: StepName, initialFunction: EntryFunctionName): readonly FunctionName[] {
  switch (step) {
    case "initial":
      return [initialFunction, "end_conversation", "caller_ended_conversation"];
    case "confirm_income_over_limit":
    case "confirm_assets_over_limit":
      return ["continue_intake", "caller_ended_conversation", "end_conversation"];
    case "ineligible":
    case "complete_intake":
      return ["end_conversation", ...ESCAPE];
    case "end":
    case "caller_ended_conversation":
      return [];
    default:
      return [step satisfies RecordStep, ...ESCAPE];
  }
}

export function isTerminal(step: StepName): boolean {
  return TERMINAL_STEPS.some((n) => n === step);
}

/**
 * The node descriptor for a step. Everything after the first question compacts the
 * conversation on entry; terminal steps hang up once the agent has finished speaking.
 */
export function buildStep(name: StepName, initialFunction: EntryFunctionName): Step {
  const terminal = isTerminal(name);
  return Object.freeze({
    name,
    instructions: stepInstructions(name),
    functions: Object.freeze([...stepFunctions(name, initialFunction)]),
    contextReset: !terminal && name !== "initial" && name !== "record_phone_number",
    ...(terminal ? { postAction: "end_conversation" as const } : {})
  });
}

export function assertTransition(fn: FunctionName, next: StepName): void {
  if (!FUNCTION_TRANSITIONS[fn].includes(next)) {
    throw new IntakeConfigError(`Function ${fn} may not move to step ${next}`);
  }
}

/** Steps reachable from `from` by following the functions each step exposes. */
export function reachableSteps(from: StepName, initialFunction: EntryFunctionName): Set<StepName> {
  const seen = new Set<StepName>([from]);
  const queue: StepName[] = [from];
  while (queue.length) {
    const step = queue.shift();
    if (step === undefined) break;
    for (const fn of stepFunctions(step, initialFunction)) {
      for (const next of FUNCTION_TRANSITIONS[fn]) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }
  }
  return seen;
}
