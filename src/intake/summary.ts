import { CONTEXT_SUMMARY_HEADER } from "./prompts.js";
import type { IntakeState } from "./types.js";

const yesNo = (v: boolean) => (v ? "yes" : "no");
const dollars = (v: number) => `$${v.toLocaleString("en-US")}`;

/**
 * Plain-text digest of everything recorded so far, in questionnaire order. Replaces the
 * dialogue history when a step compacts the conversation, so it must stand on its own.
 */
export function summarizeIntake(state: IntakeState): string {
  const lines: string[] = [];

  if (state.phone) lines.push(`- Phone number: ${state.phone.phone_number}${state.phone.is_valid ? "" : " (not valid)"}`);
  if (state.name) {
    const full = [state.name.first, state.name.middle, state.name.last].filter(Boolean).join(" ");
    lines.push(`- Name: ${full}`);
  }
  if (state.service_area) {
    const { location, match, is_eligible } = state.service_area;
    lines.push(`- Location: ${location}${is_eligible ? " (in service area)" : match ? ` (closest match ${match})` : " (outside service area)"}`);
  }
  if (state.case_type?.label) {
    const { label, is_eligible } = state.case_type;
    lines.push(`- Legal problem: ${label}${is_eligible === undefined ? "" : is_eligible ? " (accepted)" : " (not accepted)"}`);
  }
  if (state.conflict) {
    const names = state.conflict.opposing_parties.map((p) => `${p.first} ${p.last}`);
    lines.push(`- Opposing parties: ${names.length ? names.join(", ") : "none"}${state.conflict.has_highest_conflict ? " (conflict)" : ""}`);
  }
  if (state.domestic_violence) {
    const { is_experiencing, perpetrators } = state.domestic_violence;
    lines.push(`- Domestic violence: ${is_experiencing ? `yes (${perpetrators.join(", ")})` : "no"}`);
  }
  if (state.income) {
    const { monthly_amount, household_size, is_eligible } = state.income;
    lines.push(
      `- Household income: ${dollars(monthly_amount)}/month for ${household_size} ${household_size === 1 ? "person" : "people"}${is_eligible ? "" : " (over limit)"}`
    );
  }
  if (state.assets) {
    lines.push(
      state.assets.receives_benefits
        ? "- Assets: receives Medicaid, SSI, or TANF"
        : `- Assets: ${dollars(state.assets.total_value)} total${state.assets.is_eligible ? "" : " (over limit)"}`
    );
  }
  if (state.citizenship) lines.push(`- US citizen: ${yesNo(state.citizenship.is_citizen)}`);
  if (state.emergency) lines.push(`- Emergency: ${yesNo(state.emergency.is_emergency)}`);

  return lines.length ? lines.join("\n") : "- Nothing recorded yet.";
}

export function contextSummary(state: IntakeState): string {
  return `${CONTEXT_SUMMARY_HEADER}\n${summarizeIntake(state)}`;
}
