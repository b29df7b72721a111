import {
  DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS,
  type CustomerIntelligenceOptions
} from "../config";
import { daysSince } from "../utils/dates";
import { classifySegment } from "./segment-classifier";
import type {
  CustomerEmail,
  CustomerRecord,
  CustomerSnapshot,
  OrderRecord,
  RfmProfile
} from "./types";

type ScoringOptions = Pick<
  CustomerIntelligenceOptions,
  "segments" | "recencySentinelDays"
>;

const QUINTILES = 5;

export function isRfmEligible(customer: CustomerRecord): boolean {
  return customer.ordersCount > 0 && customer.totalSpent > 0;
}

export function buildLastOrderIndex(
  orders: OrderRecord[]
): Map<CustomerEmail, Date> {
  const index = new Map<CustomerEmail, Date>();
  for (const order of orders) {
    if (!order.customerEmail) {
      continue;
    }
    const current = index.get(order.customerEmail);
    if (!current || order.createdAt.getTime() > current.getTime()) {
      index.set(order.customerEmail, order.createdAt);
    }
  }
  return index;
}

/**
 * Scores 1-5 aligned with `values`. The values are ranked ascending, ties
 * keep their input order, and rank `i` of `n` lands in bucket
 * `min(floor(i * 5 / n) + 1, 5)`. With `invert` the lowest values score 5.
 */
export function assignQuintiles(values: number[], invert: boolean): number[] {
  const n = values.length;
  const scores = new Array<number>(n).fill(1);

  const ranked = values
    .map((value, index) => ({ value, index }))
    .sort((a, b) => a.value - b.value || a.index - b.index);

  ranked.forEach((entry, rank) => {
    const bucket = Math.min(Math.floor((rank * QUINTILES) / n) + 1, QUINTILES);
    scores[entry.index] = invert ? QUINTILES + 1 - bucket : bucket;
  });

  return scores;
}

export function computeRfmProfiles(
  snapshot: CustomerSnapshot,
  now: Date,
  options: ScoringOptions = DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS
): RfmProfile[] {
  const eligible = snapshot.customers.filter(isRfmEligible);
  if (!eligible.length) {
    return [];
  }

  const lastOrders = buildLastOrderIndex(snapshot.orders);
  const withRecency = eligible.map((customer) => {
    const lastOrderAt = lastOrders.get(customer.email) ?? null;
    return {
      customer,
      lastOrderAt,
      daysSinceLastOrder: lastOrderAt
        ? daysSince(now, lastOrderAt)
        : options.recencySentinelDays
    };
  });

  const recency = assignQuintiles(
    withRecency.map((entry) => entry.daysSinceLastOrder),
    true
  );
  const frequency = assignQuintiles(
    eligible.map((customer) => customer.ordersCount),
    false
  );
  const monetary = assignQuintiles(
    eligible.map((customer) => customer.totalSpent),
    false
  );

  return withRecency.map((entry, index) => {
    const scores = {
      rScore: recency[index],
      fScore: frequency[index],
      mScore: monetary[index]
    };
    return {
      ...entry.customer,
      ...scores,
      daysSinceLastOrder: entry.daysSinceLastOrder,
      lastOrderAt: entry.lastOrderAt,
      segment: classifySegment(scores, options.segments).name
    };
  });
}
