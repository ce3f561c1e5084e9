import { Decimal } from "decimal.js";
import type { Reservation } from "./schemas.js";

const SECONDS_PER_YEAR = 365 * 24 * 60 * 60;
const HOURS_PER_YEAR = 365 * 24;

/**
 * Annualised cost of one unit of a reservation in USD, rounded to cents.
 *
 * The upfront payment is spread over the term; hourly recurring charges and
 * the usage price are billed for every hour of the year.
 *
 * @example
 * ```typescript
 * // 1-year term, $500 upfront, $0.02/hour recurring
 * annualCost({ fixedPrice: 500, durationSeconds: 31536000, usagePrice: 0,
 *   recurringCharges: [{ frequency: "Hourly", amount: 0.02 }] });
 * // 675.2
 * ```
 */
export function annualCost(
  pricing: Pick<
    Reservation,
    "fixedPrice" | "durationSeconds" | "usagePrice" | "recurringCharges"
  >
): number {
  const upfront = new Decimal(pricing.fixedPrice)
    .times(SECONDS_PER_YEAR)
    .dividedBy(pricing.durationSeconds);

  const recurring = pricing.recurringCharges
    .reduce((sum, charge) => sum.plus(charge.amount), new Decimal(0))
    .times(HOURS_PER_YEAR);

  const usage = new Decimal(pricing.usagePrice).times(HOURS_PER_YEAR);

  return upfront.plus(recurring).plus(usage).toDecimalPlaces(2).toNumber();
}

/**
 * Formats an annual cost the way the report prints it: whole dollars per year.
 */
export function formatAnnualCost(amount: number): string {
  return `$${new Decimal(amount).toFixed(0)}/yr`;
}
