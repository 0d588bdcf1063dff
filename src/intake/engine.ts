import type { z } from "zod";
import { log as rootLog, type Logger } from "../utils/log.js";
import { CallCancelledError, IntakeConfigError } from "./errors.js";
import { describeZodError, functionArgsSchemas, type FunctionArgs } from "./schemas.js";
import { assertTransition, buildStep } from "./steps.js";
import type {
  CallSession,
  EntryFunctionName,
  FunctionName,
  FunctionOutcome,
  IntakeState,
  Step,
  StepName,
  StepResult
} from "./types.js";
import { isFunctionName, isRecordStep } from "./types.js";
import { appraiseAssets } from "./validators/assets.js";
import type { CaseTypeClassifier } from "./validators/caseType.js";
import type { ConflictChecker } from "./validators/conflict.js";
import { hasBlockingConflict } from "./validators/conflict.js";
import { checkIncome } from "./validators/income.js";
import { validatePhoneNumber } from "./validators/phoneNumber.js";
import type { PovertyScale } from "./validators/poverty.js";
import type { ServiceAreaMatcher } from "./validators/serviceArea.js";

export type IntakeDependencies = {
  serviceAreaMatcher: ServiceAreaMatcher;
  caseTypeClassifier: CaseTypeClassifier;
  conflictChecker: ConflictChecker;
  povertyScale: PovertyScale;
};

export type IntakeSettings = {
  initialFunction: EntryFunctionName;
  incomeMultiplier: number;
  assetLimit: number;
  /** Labels scored below this (0..1) trigger the classifier's follow-up questions. */
  caseTypeConfidenceThreshold: number;
  alternativeProviders: readonly string[];
};

type Handled = { result: StepResult | null; next: StepName | null };

type Handlers = { [K in FunctionName]: (args: FunctionArgs[K]) => Handled | Promise<Handled> };

const ARGS: { [K in FunctionName]: z.ZodType<FunctionArgs[K], z.ZodTypeDef, unknown> } = functionArgsSchemas;

const success = <T extends object>(fields: T) => ({ status: "success" as const, ...fields });
const failure = <T extends object>(error: string, fields: T) => ({ status: "error" as const, error, ...fields });

const stay = (result: StepResult): Handled => ({ result, next: null });
const go = (result: StepResult | null, next: StepName): Handled => ({ result, next });

/**
 * Drives one call through the screening questionnaire. The realtime session hands it
 * every function call the agent makes; it validates the arguments, runs the gate,
 * records the answer on the call session and names the step to continue with.
 *
 * Calls are processed one at a time in arrival order. After {@link cancel}, in-flight
 * remote lookups are aborted and every pending or later call rejects with
 * {@link CallCancelledError}.
 */
export class IntakeFlowEngine {
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private current: Step;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly session: CallSession,
    private readonly settings: IntakeSettings,
    private readonly deps: IntakeDependencies,
    logger: Logger = rootLog
  ) {
    this.log = logger.child({ callSid: session.callSid });
    this.current = buildStep(session.step, settings.initialFunction);
  }

  get step(): Step {
    return this.current;
  }

  get state(): IntakeState {
    return this.session.state;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  start(): Step {
    this.session.step = "initial";
    this.current = buildStep("initial", this.settings.initialFunction);
    this.log.info({ step: this.current.name }, "intake started");
    return this.current;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.controller.abort(new CallCancelledError(this.session.callSid));
    this.log.info({ step: this.current.name }, "intake cancelled");
  }

  handleFunctionCall(name: string, args: unknown): Promise<FunctionOutcome> {
    const run = this.queue.then(() => this.process(name, args));
    // Keep the chain alive after a failure; the caller still sees the rejection via `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async process(name: string, args: unknown): Promise<FunctionOutcome> {
    this.throwIfCancelled();

    if (!isFunctionName(name) || !this.current.functions.includes(name)) {
      this.log.warn({ fn: name, step: this.current.name }, "function not available at this step");
      return {
        result: { status: "error", error: `Function ${name} is not available at step ${this.current.name}` },
        next: null
      };
    }

    let handled: Handled;
    try {
      handled = await this.dispatch(name, args);
    } catch (err) {
      if (this.cancelled) throw new CallCancelledError(this.session.callSid);
      throw err;
    }
    this.throwIfCancelled();

    this.log.debug({ fn: name, status: handled.result?.status, state: this.session.state }, "function handled");

    if (!handled.next) return { result: handled.result, next: null };

    assertTransition(name, handled.next);
    this.session.step = handled.next;
    this.current = buildStep(handled.next, this.settings.initialFunction);
    this.log.info({ fn: name, step: this.current.name }, "step changed");
    return { result: handled.result, next: this.current };
  }

  private async dispatch<N extends FunctionName>(name: N, args: unknown): Promise<Handled> {
    const parsed = ARGS[name].safeParse(args ?? {});
    if (!parsed.success) {
      return stay({ status: "error", error: `There was an error validating the arguments: ${describeZodError(parsed.error)}` });
    }
    return this.handlers[name](parsed.data);
  }

  private throwIfCancelled(): void {
    if (this.cancelled) throw new CallCancelledError(this.session.callSid);
  }

  private withProviders(message: string): string {
    return `${message}. Alternate providers: ${this.settings.alternativeProviders.join(", ")}`;
  }

  private record<K extends keyof IntakeState>(key: K, value: IntakeState[K]): void {
    this.session.state[key] = value;
  }

  // ─── Handlers ───────────────────────────────────────────────────────────────

  private readonly handlers: Handlers = {
    system_phone_number: () => {
      const callerId = this.session.callerId ? validatePhoneNumber(this.session.callerId) : null;
      return go(success({ phone_number: callerId?.isValid ? callerId.phoneNumber : null }), "record_phone_number");
    },

    record_phone_number: ({ phone_number }) => {
      const { isValid, phoneNumber } = validatePhoneNumber(phone_number);
      const fields = { is_valid: isValid, phone_number: phoneNumber };
      this.record("phone", fields);
      return isValid ? go(success(fields), "record_name") : stay(failure("Not a valid US phone number", fields));
    },

    record_name: ({ first, middle, last }) => {
      const fields = { first, middle, last };
      if (!first || !last) return stay(failure("Required: first name and last name", fields));
      this.record("name", fields);
      return go(success(fields), "record_service_area");
    },

    record_service_area: ({ location }) => {
      const match = this.deps.serviceAreaMatcher.match(location);
      const fields = { is_eligible: match !== "" && match === location, location, match };
      this.record("service_area", fields);
      if (fields.is_eligible) return go(success(fields), "record_case_type");
      if (match) return stay(failure(`No exact match found. Maybe you meant ${match}?`, fields));
      return go(failure(this.withProviders("Not in our service area"), fields), "ineligible");
    },

    record_case_type: async ({ case_description }) => {
      const classification = await this.deps.caseTypeClassifier.classify(case_description, {
        signal: this.controller.signal
      });
      const best = classification.labels[0];
      if (!best) {
        this.record("case_type", { is_eligible: false });
        return go(failure(this.withProviders("Ineligible case type"), { is_eligible: false }), "ineligible");
      }

      const { label, confidence, legal_problem_code } = best;
      const unsure = confidence !== undefined && confidence < this.settings.caseTypeConfidenceThreshold;
      if (unsure && classification.follow_up_questions.length) {
        const fields = { label, confidence, follow_up_questions: classification.follow_up_questions };
        this.record("case_type", { label, confidence });
        return stay(failure("More information is needed to identify the legal problem", fields));
      }

      const fields = { is_eligible: Boolean(legal_problem_code), label, confidence, legal_problem_code };
      this.record("case_type", fields);
      return fields.is_eligible
        ? go(success(fields), "record_conflict")
        : go(failure(this.withProviders("Ineligible case type"), fields), "ineligible");
    },

    record_conflict: async ({ opposing_parties }) => {
      const responses = await this.deps.conflictChecker.check(opposing_parties, { signal: this.controller.signal });
      const fields = { has_highest_conflict: hasBlockingConflict(responses), responses, opposing_parties };
      this.record("conflict", fields);
      return fields.has_highest_conflict
        ? go(failure(this.withProviders("There is a representation conflict"), fields), "ineligible")
        : go(success(fields), "record_domestic_violence");
    },

    record_domestic_violence: ({ perpetrators }) => {
      const fields = { is_experiencing: perpetrators.length > 0, perpetrators };
      this.record("domestic_violence", fields);
      return go(success(fields), "record_income");
    },

    record_income: ({ income }) => {
      const check = checkIncome(income, this.deps.povertyScale, this.settings.incomeMultiplier);
      const fields = {
        is_eligible: check.isEligible,
        monthly_amount: check.monthlyIncome,
        listing: income,
        household_size: check.householdSize
      };
      this.record("income", fields);
      return check.isEligible
        ? go(success(fields), "record_assets_receives_benefits")
        : go(failure(this.withProviders("Over the household income limit"), fields), "confirm_income_over_limit");
    },

    record_assets_receives_benefits: ({ receives_benefits }) => {
      if (!receives_benefits) return go(null, "record_assets_list");
      const fields = { is_eligible: true, listing: [], total_value: 0, receives_benefits: true };
      this.record("assets", fields);
      return go(success(fields), "record_citizenship");
    },

    record_assets_list: ({ assets }) => {
      const { isEligible, totalValue } = appraiseAssets(assets, this.settings.assetLimit);
      const fields = { is_eligible: isEligible, listing: assets, total_value: totalValue, receives_benefits: false };
      this.record("assets", fields);
      return isEligible
        ? go(success(fields), "record_citizenship")
        : go(
            failure(this.withProviders("Over the household assets' value limit"), fields),
            "confirm_assets_over_limit"
          );
    },

    record_citizenship: ({ is_a_us_citizen }) => {
      const fields = { is_citizen: is_a_us_citizen };
      this.record("citizenship", fields);
      return go(success(fields), "record_emergency");
    },

    record_emergency: ({ is_emergency }) => {
      const fields = { is_emergency };
      this.record("emergency", fields);
      return go(success(fields), "complete_intake");
    },

    continue_intake: ({ next_step }) => {
      if (!isRecordStep(next_step)) throw new IntakeConfigError(`Unknown step: ${next_step}`);
      return go(null, next_step);
    },

    end_conversation: () => go(null, "end"),

    caller_ended_conversation: () => go(null, "caller_ended_conversation")
  };
}
