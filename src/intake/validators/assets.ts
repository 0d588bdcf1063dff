import type { AssetListing } from "../schemas.js";

export type AssetCheck = {
  isEligible: boolean;
  totalValue: number;
};

/** Negative values are debts against the total, not invalid entries. Limit is inclusive. */
export function appraiseAssets(assets: AssetListing, limit: number): AssetCheck {
  let totalValue = 0;
  for (const entry of assets) {
    for (const value of Object.values(entry)) totalValue += value;
  }
  return { isEligible: totalValue <= limit, totalValue };
}
