import { DAY_IN_MS, startOfUtcMonth, toMonthKey } from "../utils/dates";
import { average, percentOf, roundTo } from "../utils/number";
import { countInSegments } from "./segment-summary";
import type {
  AcquisitionTrendRow,
  CustomerRecord,
  OverviewKpis,
  RfmProfile
} from "./types";

type KpiOptions = {
  activeWindowDays: number;
  recencySentinelDays: number;
};

const AT_RISK_SEGMENTS = ["At Risk", "Hibernating"] as const;
const ACQUISITION_WINDOW_DAYS = 365;

export function computeOverviewKpis(
  customers: CustomerRecord[],
  profiles: RfmProfile[],
  now: Date,
  options: KpiOptions
): OverviewKpis {
  const monthStart = startOfUtcMonth(now).getTime();
  const purchasers = customers.filter((c) => c.ordersCount >= 1).length;
  const repeaters = customers.filter((c) => c.ordersCount >= 2).length;

  // Recency of repeat buyers; customers with no order row are left out.
  const repeatRecency = profiles
    .filter(
      (p) =>
        p.ordersCount >= 2 && p.daysSinceLastOrder < options.recencySentinelDays
    )
    .map((p) => p.daysSinceLastOrder);

  return {
    total_customers: customers.length,
    active_customers: profiles.filter(
      (p) => p.daysSinceLastOrder <= options.activeWindowDays
    ).length,
    avg_orders: roundTo(average(profiles.map((p) => p.ordersCount)), 1),
    avg_ltv: roundTo(average(profiles.map((p) => p.totalSpent)), 2),
    new_this_month: customers.filter(
      (c) => c.createdAt !== null && c.createdAt.getTime() >= monthStart
    ).length,
    repeat_rate: percentOf(repeaters, purchasers),
    at_risk_count: countInSegments(profiles, AT_RISK_SEGMENTS),
    avg_days_between: roundTo(average(repeatRecency), 0)
  };
}

export function computeAcquisitionTrend(
  customers: CustomerRecord[],
  now: Date
): AcquisitionTrendRow[] {
  const cutoff = now.getTime() - ACQUISITION_WINDOW_DAYS * DAY_IN_MS;
  const counts = new Map<string, number>();

  for (const customer of customers) {
    if (!customer.createdAt || customer.createdAt.getTime() < cutoff) {
      continue;
    }
    const month = toMonthKey(customer.createdAt);
    counts.set(month, (counts.get(month) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([month, count]) => ({ month, count }));
}
