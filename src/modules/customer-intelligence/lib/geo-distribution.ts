import { roundTo, safeRatio } from "../utils/number";
import type { CustomerRecord, GeoDistributionRow } from "./types";

type GeoBucket = {
  city: string;
  state: string;
  country: string;
  customers: number;
  revenue: number;
  orders: number;
};

export function computeGeoDistribution(
  customers: CustomerRecord[],
  limit = 25
): GeoDistributionRow[] {
  const buckets = new Map<string, GeoBucket>();

  for (const customer of customers) {
    if (!customer.city) {
      continue;
    }
    const city = customer.city;
    const state = customer.region ?? "";
    const country = customer.country ?? "";
    const key = [city, state, country].join("\u0000");
    const bucket = buckets.get(key) ?? {
      city,
      state,
      country,
      customers: 0,
      revenue: 0,
      orders: 0
    };
    bucket.customers += 1;
    bucket.revenue += customer.totalSpent;
    bucket.orders += customer.ordersCount;
    buckets.set(key, bucket);
  }

  return [...buckets.values()]
    .sort((a, b) => b.revenue - a.revenue)
    .slice(0, limit)
    .map((bucket) => ({
      city: bucket.city,
      state: bucket.state,
      country: bucket.country,
      customer_count: bucket.customers,
      total_revenue: roundTo(bucket.revenue, 2),
      avg_orders: roundTo(safeRatio(bucket.orders, bucket.customers), 1)
    }));
}
