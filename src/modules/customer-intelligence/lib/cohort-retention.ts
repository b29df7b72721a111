import { shiftMonthKey, toMonthKey } from "../utils/dates";
import { percentOf } from "../utils/number";
import type {
  CohortRetention,
  CohortRow,
  CustomerEmail,
  OrderRecord
} from "./types";

type CohortOptions = {
  cohortCount: number;
  cohortMonths: number;
};

/** Cohort month -> order month -> customers who ordered in that month. */
type CohortActivity = Map<string, Map<string, Set<CustomerEmail>>>;

export function buildFirstOrderIndex(
  orders: OrderRecord[]
): Map<CustomerEmail, Date> {
  const index = new Map<CustomerEmail, Date>();
  for (const order of orders) {
    if (!order.customerEmail) {
      continue;
    }
    const current = index.get(order.customerEmail);
    if (!current || order.createdAt.getTime() < current.getTime()) {
      index.set(order.customerEmail, order.createdAt);
    }
  }
  return index;
}

function buildCohortActivity(orders: OrderRecord[]): CohortActivity {
  const firstOrders = buildFirstOrderIndex(orders);
  const activity: CohortActivity = new Map();

  for (const order of orders) {
    const firstOrderAt = firstOrders.get(order.customerEmail);
    if (!firstOrderAt) {
      continue;
    }
    const cohort = toMonthKey(firstOrderAt);
    const month = toMonthKey(order.createdAt);

    let months = activity.get(cohort);
    if (!months) {
      months = new Map();
      activity.set(cohort, months);
    }
    let customers = months.get(month);
    if (!customers) {
      customers = new Set();
      months.set(month, customers);
    }
    customers.add(order.customerEmail);
  }

  return activity;
}

/**
 * Retention heatmap for the most recent `cohortCount` first-purchase months.
 * `retention[k]` is the share of the cohort that ordered in calendar month
 * cohort+k, so offset 0 is always 100.
 */
export function computeCohortRetention(
  orders: OrderRecord[],
  options: CohortOptions = { cohortCount: 12, cohortMonths: 12 }
): CohortRetention {
  const activity = buildCohortActivity(orders);
  if (!activity.size) {
    return { cohorts: [], max_months: 0 };
  }

  const cohortKeys = [...activity.keys()].sort().slice(-options.cohortCount);
  const cohorts: CohortRow[] = [];

  for (const cohort of cohortKeys) {
    const months = activity.get(cohort) ?? new Map<string, Set<CustomerEmail>>();
    const size = months.get(cohort)?.size ?? 0;
    if (size === 0) {
      continue;
    }

    const retention: number[] = [];
    for (let offset = 0; offset < options.cohortMonths; offset += 1) {
      const active = months.get(shiftMonthKey(cohort, offset))?.size ?? 0;
      retention.push(percentOf(active, size));
    }

    cohorts.push({ cohort, size, retention });
  }

  return { cohorts, max_months: options.cohortMonths };
}
