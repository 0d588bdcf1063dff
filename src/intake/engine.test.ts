import { describe, expect, it, vi } from "vitest";
import { IntakeFlowEngine, type IntakeDependencies, type IntakeSettings } from "./engine.js";
import { CallCancelledError, DependencyUnavailableError, IntakeConfigError } from "./errors.js";
import { loadCaseTypeTaxonomy, loadPovertyScale, loadServiceAreas } from "./referenceData.js";
import type { CallSession, StepName } from "./types.js";
import { StaticCaseTypeClassifier, type CaseTypeClassifier, type Classification } from "./validators/caseType.js";
import { StaticConflictChecker } from "./validators/conflict.js";
import { PovertyScale } from "./validators/poverty.js";
import { FuzzyServiceAreaMatcher } from "./validators/serviceArea.js";

const PROVIDERS = "Alternate providers: Center for Legal Help, Local Legal Help";

const settings: IntakeSettings = {
  initialFunction: "system_phone_number",
  incomeMultiplier: 3,
  assetLimit: 10000,
  caseTypeConfidenceThreshold: 0.5,
  alternativeProviders: ["Center for Legal Help", "Local Legal Help"]
};

function setup(opts: {
  step?: StepName;
  callerId?: string | null;
  deps?: Partial<IntakeDependencies>;
  settings?: Partial<IntakeSettings>;
} = {}) {
  const session: CallSession = {
    callSid: "CAtest",
    callerId: opts.callerId === undefined ? "+18665345243" : opts.callerId,
    state: {},
    step: opts.step ?? "initial",
    startedAt: "2026-01-01T00:00:00.000Z"
  };
  const deps: IntakeDependencies = {
    serviceAreaMatcher: new FuzzyServiceAreaMatcher(loadServiceAreas()),
    caseTypeClassifier: new StaticCaseTypeClassifier(loadCaseTypeTaxonomy()),
    conflictChecker: new StaticConflictChecker(),
    povertyScale: new PovertyScale(loadPovertyScale()),
    ...opts.deps
  };
  const engine = new IntakeFlowEngine(session, { ...settings, ...opts.settings }, deps);
  if (!opts.step) engine.start();
  return { engine, session };
}

const classifierReturning = (classification: Classification): CaseTypeClassifier => ({
  classify: async () => classification
});

describe("IntakeFlowEngine", () => {
  it("walks an eligible caller from greeting to completion", async () => {
    const { engine, session } = setup();
    expect(engine.step.name).toBe("initial");

    const phone = await engine.handleFunctionCall("system_phone_number", {});
    expect(phone.result).toEqual({ status: "success", phone_number: "(866) 534-5243" });
    expect(phone.next?.name).toBe("record_phone_number");
    expect(phone.next?.contextReset).toBe(false);

    const steps: [string, unknown, StepName][] = [
      ["record_phone_number", { phone_number: "866-534-5243" }, "record_name"],
      ["record_name", { first: "Ada", middle: "", last: "Lovelace" }, "record_service_area"],
      ["record_service_area", { location: "Amelia County" }, "record_case_type"],
      ["record_case_type", { case_description: "Divorce" }, "record_conflict"],
      ["record_conflict", { opposing_parties: [{ first: "Sam", last: "Smith" }] }, "record_domestic_violence"],
      ["record_domestic_violence", { perpetrators: ["Sam Smith"] }, "record_income"],
      ["record_income", { income: { "Ada Lovelace": { wages: { amount: 2000, period: "month" } } } }, "record_assets_receives_benefits"],
      ["record_assets_receives_benefits", { receives_benefits: false }, "record_assets_list"],
      ["record_assets_list", { assets: [{ car: 4000 }] }, "record_citizenship"],
      ["record_citizenship", { is_a_us_citizen: true }, "record_emergency"],
      ["record_emergency", { is_emergency: false }, "complete_intake"],
      ["end_conversation", {}, "end"]
    ];
    for (const [fn, args, next] of steps) {
      const outcome = await engine.handleFunctionCall(fn, args);
      expect(outcome.result?.status ?? "success").toBe("success");
      expect(outcome.next?.name).toBe(next);
    }

    expect(engine.step.postAction).toBe("end_conversation");
    expect(session.step).toBe("end");
    expect(session.state).toEqual({
      phone: { is_valid: true, phone_number: "(866) 534-5243" },
      name: { first: "Ada", middle: "", last: "Lovelace" },
      service_area: { is_eligible: true, location: "Amelia County", match: "Amelia County" },
      case_type: { is_eligible: true, label: "Divorce", confidence: 1, legal_problem_code: "32 Divorce/Separ./Annul." },
      conflict: {
        has_highest_conflict: false,
        responses: {
          counts: { lowest: 1, low: 0, high: 0, highest: 0 },
          results: [{ status: 200, message: "No match", interval: "lowest", score: 0 }]
        },
        opposing_parties: [{ first: "Sam", last: "Smith" }]
      },
      domestic_violence: { is_experiencing: true, perpetrators: ["Sam Smith"] },
      income: {
        is_eligible: true,
        monthly_amount: 2000,
        listing: { "Ada Lovelace": { wages: { amount: 2000, period: "month" } } },
        household_size: 1
      },
      assets: { is_eligible: true, listing: [{ car: 4000 }], total_value: 4000, receives_benefits: false },
      citizenship: { is_citizen: true },
      emergency: { is_emergency: false }
    });
  });

  describe("availability", () => {
    it("refuses a function the current step does not offer", async () => {
      const { engine } = setup();
      await expect(engine.handleFunctionCall("record_name", { first: "A", last: "B" })).resolves.toEqual({
        result: { status: "error", error: "Function record_name is not available at step initial" },
        next: null
      });
      expect(engine.step.name).toBe("initial");
    });

    it("refuses unknown functions", async () => {
      const { engine } = setup();
      const { result, next } = await engine.handleFunctionCall("do_magic", {});
      expect(result).toEqual({ status: "error", error: "Function do_magic is not available at step initial" });
      expect(next).toBeNull();
    });

    it("offers nothing once the call has ended", async () => {
      const { engine } = setup({ step: "record_income" });
      const ended = await engine.handleFunctionCall("caller_ended_conversation", {});
      expect(ended).toMatchObject({ result: null, next: { name: "caller_ended_conversation", postAction: "end_conversation" } });
      const after = await engine.handleFunctionCall("end_conversation", {});
      expect(after.result?.status).toBe("error");
    });

    it("starts with the configured entry function", async () => {
      const { engine } = setup({ settings: { initialFunction: "record_name" } });
      expect(engine.step.functions[0]).toBe("record_name");
      const outcome = await engine.handleFunctionCall("record_name", { first: "Ada", last: "Lovelace" });
      expect(outcome.next?.name).toBe("record_service_area");
    });
  });

  describe("phone and name", () => {
    it("echoes no number when the caller id is withheld or foreign", async () => {
      for (const callerId of [null, "+442079460958"]) {
        const { engine } = setup({ callerId });
        const outcome = await engine.handleFunctionCall("system_phone_number", {});
        expect(outcome.result).toEqual({ status: "success", phone_number: null });
        expect(outcome.next?.name).toBe("record_phone_number");
      }
    });

    it("keeps asking until the number is valid", async () => {
      const { engine, session } = setup({ step: "record_phone_number" });
      await expect(engine.handleFunctionCall("record_phone_number", { phone_number: "123" })).resolves.toEqual({
        result: { status: "error", error: "Not a valid US phone number", is_valid: false, phone_number: "123" },
        next: null
      });
      expect(session.step).toBe("record_phone_number");
    });

    it("requires first and last name", async () => {
      const { engine, session } = setup({ step: "record_name" });
      const outcome = await engine.handleFunctionCall("record_name", { first: "Ada", middle: "", last: " " });
      expect(outcome.result).toEqual({
        status: "error",
        error: "Required: first name and last name",
        first: "Ada",
        middle: "",
        last: ""
      });
      expect(outcome.next).toBeNull();
      expect(session.state.name).toBeUndefined();
    });
  });

  describe("service area", () => {
    it("suggests the closest jurisdiction without advancing", async () => {
      const { engine } = setup({ step: "record_service_area" });
      const outcome = await engine.handleFunctionCall("record_service_area", { location: "Amelia" });
      expect(outcome).toEqual({
        result: {
          status: "error",
          error: "No exact match found. Maybe you meant Amelia County?",
          is_eligible: false,
          location: "Amelia",
          match: "Amelia County"
        },
        next: null
      });
      const retry = await engine.handleFunctionCall("record_service_area", { location: "Amelia County" });
      expect(retry.next?.name).toBe("record_case_type");
    });

    it("sends callers outside the area to other providers", async () => {
      const { engine } = setup({ step: "record_service_area" });
      const outcome = await engine.handleFunctionCall("record_service_area", { location: "xyzzy" });
      expect(outcome.result).toMatchObject({ status: "error", error: `Not in our service area. ${PROVIDERS}` });
      expect(outcome.next?.name).toBe("ineligible");
      expect(outcome.next?.functions).toEqual(["end_conversation", "caller_ended_conversation"]);
    });
  });

  describe("case type", () => {
    it("turns away case types without a problem code", async () => {
      const { engine } = setup({ step: "record_case_type" });
      const outcome = await engine.handleFunctionCall("record_case_type", { case_description: "Criminal" });
      expect(outcome.result).toEqual({
        status: "error",
        error: `Ineligible case type. ${PROVIDERS}`,
        is_eligible: false,
        label: "Criminal",
        confidence: 1,
        legal_problem_code: ""
      });
      expect(outcome.next?.name).toBe("ineligible");
    });

    it("turns away descriptions the classifier cannot label", async () => {
      const { engine, session } = setup({
        step: "record_case_type",
        deps: { caseTypeClassifier: classifierReturning({ labels: [], follow_up_questions: [] }) }
      });
      const outcome = await engine.handleFunctionCall("record_case_type", { case_description: "something" });
      expect(outcome.result).toEqual({ status: "error", error: `Ineligible case type. ${PROVIDERS}`, is_eligible: false });
      expect(outcome.next?.name).toBe("ineligible");
      expect(session.state.case_type).toEqual({ is_eligible: false });
    });

    it("asks follow-up questions when the classifier is unsure", async () => {
      const followUp = { question: "Are you married to the other person?", format: "yes/no", options: undefined };
      const { engine } = setup({
        step: "record_case_type",
        deps: {
          caseTypeClassifier: classifierReturning({
            labels: [{ label: "Divorce", confidence: 0.3, legal_problem_code: "32 Divorce/Separ./Annul." }],
            follow_up_questions: [followUp]
          })
        }
      });
      const outcome = await engine.handleFunctionCall("record_case_type", { case_description: "family trouble" });
      expect(outcome).toEqual({
        result: {
          status: "error",
          error: "More information is needed to identify the legal problem",
          label: "Divorce",
          confidence: 0.3,
          follow_up_questions: [followUp]
        },
        next: null
      });
    });

    it("decides on a low-confidence label when there is nothing more to ask", async () => {
      const { engine } = setup({
        step: "record_case_type",
        deps: {
          caseTypeClassifier: classifierReturning({
            labels: [{ label: "Divorce", confidence: 0.3, legal_problem_code: "32 Divorce/Separ./Annul." }],
            follow_up_questions: []
          })
        }
      });
      const outcome = await engine.handleFunctionCall("record_case_type", { case_description: "family trouble" });
      expect(outcome.result?.status).toBe("success");
      expect(outcome.next?.name).toBe("record_conflict");
    });

    it("treats a label without a confidence as confident", async () => {
      const { engine } = setup({
        step: "record_case_type",
        deps: {
          caseTypeClassifier: classifierReturning({
            labels: [{ label: "Custody", legal_problem_code: "37 Custody/Visitation" }],
            follow_up_questions: [{ question: "Is there a court order?" }]
          })
        }
      });
      const outcome = await engine.handleFunctionCall("record_case_type", { case_description: "custody" });
      expect(outcome.next?.name).toBe("record_conflict");
    });
  });

  describe("conflict", () => {
    it("turns away callers with a representation conflict", async () => {
      const { engine, session } = setup({ step: "record_conflict" });
      const outcome = await engine.handleFunctionCall("record_conflict", {
        opposing_parties: [{ first: "Jimmy", last: "Dean" }]
      });
      expect(outcome.result).toMatchObject({
        status: "error",
        error: `There is a representation conflict. ${PROVIDERS}`,
        has_highest_conflict: true
      });
      expect(outcome.next?.name).toBe("ineligible");
      expect(session.state.conflict?.responses.counts.highest).toBe(1);
    });

    it("reports argument errors by path without recording anything", async () => {
      const { engine, session } = setup({ step: "record_conflict" });
      const outcome = await engine.handleFunctionCall("record_conflict", {
        opposing_parties: [{ first: "", last: "Dean" }]
      });
      expect(outcome).toEqual({
        result: {
          status: "error",
          error:
            "There was an error validating the arguments: opposing_parties.0.first: String must contain at least 1 character(s)"
        },
        next: null
      });
      expect(session.state.conflict).toBeUndefined();
    });
  });

  describe("income and assets", () => {
    it("asks before continuing past the income limit", async () => {
      const { engine, session } = setup({ step: "record_income" });
      const outcome = await engine.handleFunctionCall("record_income", {
        income: { Ada: { wages: { amount: 3913, period: "month" } } }
      });
      expect(outcome.result).toEqual({
        status: "error",
        error: `Over the household income limit. ${PROVIDERS}`,
        is_eligible: false,
        monthly_amount: 3913,
        listing: { Ada: { wages: { amount: 3913, period: "month" } } },
        household_size: 1
      });
      expect(outcome.next?.name).toBe("confirm_income_over_limit");

      const resumed = await engine.handleFunctionCall("continue_intake", { next_step: "record_assets_receives_benefits" });
      expect(resumed).toMatchObject({ result: null, next: { name: "record_assets_receives_benefits" } });
      expect(session.state.income?.is_eligible).toBe(false);
    });

    it("accepts income at the limit", async () => {
      const { engine } = setup({ step: "record_income" });
      const outcome = await engine.handleFunctionCall("record_income", {
        income: { Ada: { wages: { amount: 3912, period: "month" } } }
      });
      expect(outcome.next?.name).toBe("record_assets_receives_benefits");
    });

    it("rejects malformed income", async () => {
      const { engine, session } = setup({ step: "record_income" });
      const outcome = await engine.handleFunctionCall("record_income", {
        income: { Ada: { wages: { amount: 100, period: "week" } } }
      });
      expect(outcome.result).toEqual({
        status: "error",
        error:
          "There was an error validating the arguments: income.Ada.wages.period: Invalid enum value. Expected 'month' | 'year', received 'week'"
      });
      expect(outcome.next).toBeNull();
      expect(session.state.income).toBeUndefined();
    });

    it("skips the asset list for benefit recipients", async () => {
      const { engine, session } = setup({ step: "record_assets_receives_benefits" });
      const outcome = await engine.handleFunctionCall("record_assets_receives_benefits", { receives_benefits: true });
      expect(outcome.next?.name).toBe("record_citizenship");
      expect(session.state.assets).toEqual({ is_eligible: true, listing: [], total_value: 0, receives_benefits: true });
    });

    it("sums every asset named in an entry", async () => {
      const { engine, session } = setup({ step: "record_assets_list" });
      const outcome = await engine.handleFunctionCall("record_assets_list", {
        assets: [{ car: 5000, savings: 2000 }, { loan: -500 }]
      });
      expect(outcome.next?.name).toBe("record_citizenship");
      expect(session.state.assets).toEqual({
        is_eligible: true,
        listing: [{ car: 5000, savings: 2000 }, { loan: -500 }],
        total_value: 6500,
        receives_benefits: false
      });
    });

    it("asks before continuing past the asset limit", async () => {
      const { engine } = setup({ step: "record_assets_list" });
      const outcome = await engine.handleFunctionCall("record_assets_list", { assets: [{ savings: 10001 }] });
      expect(outcome.result).toMatchObject({
        status: "error",
        error: `Over the household assets' value limit. ${PROVIDERS}`,
        total_value: 10001
      });
      expect(outcome.next?.name).toBe("confirm_assets_over_limit");

      const resumed = await engine.handleFunctionCall("continue_intake", { next_step: "record_citizenship" });
      expect(resumed.next?.name).toBe("record_citizenship");
    });

    it("ends the call when the caller declines to continue", async () => {
      const { engine } = setup({ step: "confirm_assets_over_limit" });
      const outcome = await engine.handleFunctionCall("end_conversation", {});
      expect(outcome.next?.name).toBe("end");
    });

    it("refuses to continue with a step that does not exist", async () => {
      const { engine } = setup({ step: "confirm_income_over_limit" });
      await expect(engine.handleFunctionCall("continue_intake", { next_step: "record_pets" })).rejects.toThrow(
        new IntakeConfigError("Unknown step: record_pets")
      );
    });
  });

  it("completes the intake whatever the emergency answer", async () => {
    for (const is_emergency of [true, false]) {
      const { engine, session } = setup({ step: "record_emergency" });
      const outcome = await engine.handleFunctionCall("record_emergency", { is_emergency });
      expect(outcome.next?.name).toBe("complete_intake");
      expect(session.state.emergency).toEqual({ is_emergency });
    }
  });

  it("processes calls one at a time in arrival order", async () => {
    const { engine } = setup({ step: "record_name" });
    const first = engine.handleFunctionCall("record_name", { first: "Ada", last: "Lovelace" });
    const second = engine.handleFunctionCall("record_service_area", { location: "Amelia County" });
    await expect(first).resolves.toMatchObject({ next: { name: "record_service_area" } });
    await expect(second).resolves.toMatchObject({ next: { name: "record_case_type" } });
  });

  it("propagates an unavailable dependency without moving on", async () => {
    const { engine, session } = setup({
      step: "record_case_type",
      deps: {
        caseTypeClassifier: {
          classify: async () => {
            throw new DependencyUnavailableError("case type classifier", new Error("HTTP 503: down"));
          }
        }
      }
    });
    await expect(engine.handleFunctionCall("record_case_type", { case_description: "Divorce" })).rejects.toBeInstanceOf(
      DependencyUnavailableError
    );
    expect(session.step).toBe("record_case_type");
    expect(session.state.case_type).toBeUndefined();

    // The queue survives the failure.
    const next = await engine.handleFunctionCall("caller_ended_conversation", {});
    expect(next.next?.name).toBe("caller_ended_conversation");
  });

  describe("cancel", () => {
    it("aborts an in-flight lookup and discards its result", async () => {
      const classify = vi.fn<CaseTypeClassifier["classify"]>(
        (_description, opts) =>
          new Promise((_resolve, reject) => {
            opts?.signal?.addEventListener("abort", () =>
              reject(new DependencyUnavailableError("case type classifier", opts?.signal?.reason))
            );
          })
      );
      const { engine, session } = setup({ step: "record_case_type", deps: { caseTypeClassifier: { classify } } });

      const pending = engine.handleFunctionCall("record_case_type", { case_description: "Divorce" });
      await vi.waitFor(() => expect(classify).toHaveBeenCalledTimes(1));
      engine.cancel();

      await expect(pending).rejects.toBeInstanceOf(CallCancelledError);
      expect(session.state.case_type).toBeUndefined();
      expect(engine.cancelled).toBe(true);
    });

    it("rejects every later call", async () => {
      const { engine } = setup();
      engine.cancel();
      engine.cancel();
      await expect(engine.handleFunctionCall("system_phone_number", {})).rejects.toThrow("Call CAtest was cancelled");
    });
  });
});
