import type { HouseholdIncome } from "../schemas.js";
import type { PovertyScale } from "./poverty.js";

export type IncomeCheck = {
  isEligible: boolean;
  /** Whole dollars per month, truncated. */
  monthlyIncome: number;
  householdSize: number;
};

export function totalMonthlyIncome(income: HouseholdIncome): number {
  let total = 0;
  for (const member of Object.values(income)) {
    for (const detail of Object.values(member)) {
      total += detail.period === "year" ? detail.amount / 12 : detail.amount;
    }
  }
  return Math.trunc(total);
}

export function checkIncome(income: HouseholdIncome, scale: PovertyScale, multiplier: number): IncomeCheck {
  const monthlyIncome = totalMonthlyIncome(income);
  const householdSize = Object.keys(income).length;
  return {
    isEligible: scale.qualifies(monthlyIncome, householdSize, multiplier),
    monthlyIncome,
    householdSize
  };
}
