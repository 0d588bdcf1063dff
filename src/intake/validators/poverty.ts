import type { PovertyScaleTable } from "../referenceData.js";

export type PovertyScaleRegion = "contiguous" | "ak" | "hi";

/**
 * Rounds half to even, so x.5 goes to the nearest even integer. The monthly cap for a
 * single person at 3x ($46,950 / 12 = $3,912.50) therefore lands on $3,912.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function baseAndIncrement(table: PovertyScaleTable, region: PovertyScaleRegion): [number, number] {
  switch (region) {
    case "ak":
      return [table.poverty_base_ak, table.poverty_increment_ak];
    case "hi":
      return [table.poverty_base_hi, table.poverty_increment_hi];
    case "contiguous":
      return [table.poverty_base, table.poverty_increment];
  }
}

export class PovertyScale {
  constructor(
    private readonly table: PovertyScaleTable,
    private readonly region: PovertyScaleRegion = "contiguous"
  ) {}

  /** Annual household income limit. */
  incomeLimit(householdSize: number, multiplier: number): number {
    const [base, increment] = baseAndIncrement(this.table, this.region);
    const additional = Math.max(householdSize - 1, 0) * increment;
    return roundHalfEven((base + additional) * multiplier);
  }

  monthlyIncomeLimit(householdSize: number, multiplier: number): number {
    return roundHalfEven(this.incomeLimit(householdSize, multiplier) / 12);
  }

  qualifies(monthlyIncome: number, householdSize: number, multiplier: number): boolean {
    return this.monthlyIncomeLimit(householdSize, multiplier) >= Math.trunc(monthlyIncome);
  }
}
