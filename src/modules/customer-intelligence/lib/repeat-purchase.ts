import { average, percentOf, roundTo } from "../utils/number";
import { countInSegments } from "./segment-summary";
import type {
  CustomerRecord,
  DaysBetweenBucket,
  RepeatCurvePoint,
  RetentionKpis,
  RfmProfile
} from "./types";

const CHURNED_SEGMENTS = ["Lost", "Hibernating"] as const;

const RECENCY_BUCKETS = [
  { label: "0-30", min: 0, max: 30 },
  { label: "31-60", min: 31, max: 60 },
  { label: "61-90", min: 61, max: 90 },
  { label: "91-180", min: 91, max: 180 },
  { label: "181-365", min: 181, max: 365 },
  { label: "365+", min: 366, max: Number.POSITIVE_INFINITY }
];

/**
 * Share of purchasing customers who reached at least N orders, N = 1..maxOrders.
 * Non-increasing in N.
 */
export function computeRepeatCurve(
  customers: CustomerRecord[],
  maxOrders = 10
): RepeatCurvePoint[] {
  const purchasers = customers.filter((c) => c.ordersCount >= 1).length;
  const curve: RepeatCurvePoint[] = [];

  for (let orderNumber = 1; orderNumber <= maxOrders; orderNumber += 1) {
    const reached = customers.filter(
      (c) => c.ordersCount >= orderNumber
    ).length;
    curve.push({
      order_number: orderNumber,
      customers: reached,
      pct: percentOf(reached, purchasers)
    });
  }

  return curve;
}

// Buckets the recency of repeat customers; the sentinel marks "no order seen".
export function computeDaysBetweenDistribution(
  profiles: RfmProfile[],
  recencySentinelDays: number
): DaysBetweenBucket[] {
  const counts = RECENCY_BUCKETS.map(() => 0);

  for (const profile of profiles) {
    if (profile.ordersCount < 2) {
      continue;
    }
    const days = profile.daysSinceLastOrder;
    if (days >= recencySentinelDays) {
      continue;
    }
    const bucket = RECENCY_BUCKETS.findIndex(
      (b) => days >= b.min && days <= b.max
    );
    if (bucket >= 0) {
      counts[bucket] += 1;
    }
  }

  return RECENCY_BUCKETS.map((bucket, index) => ({
    label: bucket.label,
    count: counts[index]
  }));
}

export function computeRetentionKpis(profiles: RfmProfile[]): RetentionKpis {
  const repeatWithin = (days: number) =>
    profiles.filter(
      (p) => p.ordersCount >= 2 && p.daysSinceLastOrder <= days
    ).length;

  const retained30d = repeatWithin(30);
  const retained90d = repeatWithin(90);
  const loyal = profiles.filter((p) => p.ordersCount >= 3);

  return {
    retained_30d: retained30d,
    retention_30d_pct: percentOf(retained30d, profiles.length),
    retained_90d: retained90d,
    retention_90d_pct: percentOf(retained90d, profiles.length),
    churn_rate: percentOf(
      countInSegments(profiles, CHURNED_SEGMENTS),
      profiles.length
    ),
    avg_orders_loyal: roundTo(average(loyal.map((p) => p.ordersCount)), 1)
  };
}
