import { InvalidSelectionError } from '../../common/errors/storefront.errors';

export const DURATIONS = [30, 60, 180, 365] as const;

export type DurationDays = (typeof DURATIONS)[number];

export type CatalogPlan = Readonly<{
  name: string;
  devices: number;
  prices: Readonly<Record<DurationDays, number>>;
}>;

export const CATALOG_CURRENCY = 'USD';

/** Telegram Stars invoices are issued in XTR at 100 units per catalog dollar. */
export const GATEWAY_CURRENCY = 'XTR';
export const GATEWAY_UNITS_PER_PRICE = 100;

export const PLANS: readonly CatalogPlan[] = Object.freeze([
  Object.freeze({ name: 'Basic', devices: 1, prices: Object.freeze({ 30: 5, 60: 9, 180: 25, 365: 45 }) }),
  Object.freeze({ name: 'Standard', devices: 3, prices: Object.freeze({ 30: 10, 60: 18, 180: 50, 365: 90 }) }),
  Object.freeze({ name: 'Premium', devices: 5, prices: Object.freeze({ 30: 15, 60: 27, 180: 75, 365: 135 }) }),
]);

export type Selection = {
  planIndex: number;
  plan: CatalogPlan;
  days: DurationDays;
  price: number;
};

export function isDuration(days: number): days is DurationDays {
  return DURATIONS.some((d) => d === days);
}

export function getPlan(index: number): CatalogPlan {
  const plan = Number.isInteger(index) ? PLANS[index] : undefined;
  if (!plan) throw new InvalidSelectionError(`Plan index ${index} is outside the catalog (0..${PLANS.length - 1})`);
  return plan;
}

export function resolveSelection(planIndex: number, days: number): Selection {
  const plan = getPlan(planIndex);
  if (!isDuration(days)) throw new InvalidSelectionError(`Duration ${days} is not offered for ${plan.name}`);
  return { planIndex, plan, days, price: plan.prices[days] };
}

/** Price per 30 days, two decimals. */
export function monthlyEquivalent(price: number, days: number): string {
  return (price / (days / 30)).toFixed(2);
}

export function gatewayAmount(price: number): number {
  return Math.round(price * GATEWAY_UNITS_PER_PRICE);
}
