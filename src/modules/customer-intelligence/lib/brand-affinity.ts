import { roundTo } from "../utils/number";
import type { AffinityPair, CustomerEmail, OrderRecord } from "./types";

type AffinityOptions = {
  minCoPurchaseCount: number;
  limit: number;
};

type BrandIndex = {
  customerBrands: Map<CustomerEmail, Set<string>>;
  brandCustomers: Map<string, Set<CustomerEmail>>;
};

export function buildBrandIndex(orders: OrderRecord[]): BrandIndex {
  const customerBrands = new Map<CustomerEmail, Set<string>>();
  const brandCustomers = new Map<string, Set<CustomerEmail>>();

  for (const order of orders) {
    if (!order.customerEmail) {
      continue;
    }
    for (const item of order.lineItems) {
      if (!item.brand) {
        continue;
      }
      const brands = customerBrands.get(order.customerEmail) ?? new Set<string>();
      brands.add(item.brand);
      customerBrands.set(order.customerEmail, brands);

      const buyers = brandCustomers.get(item.brand) ?? new Set<CustomerEmail>();
      buyers.add(order.customerEmail);
      brandCustomers.set(item.brand, buyers);
    }
  }

  return { customerBrands, brandCustomers };
}

/**
 * Observed co-purchases over the count expected if the two brands were bought
 * independently. Returns null when nothing is expected.
 */
export function computeLift(
  coPurchaseCount: number,
  buyersOfA: number,
  buyersOfB: number,
  totalCustomers: number
): number | null {
  if (totalCustomers <= 0) {
    return null;
  }
  const expected =
    (buyersOfA / totalCustomers) * (buyersOfB / totalCustomers) * totalCustomers;
  return expected > 0 ? coPurchaseCount / expected : null;
}

export function computeBrandAffinity(
  orders: OrderRecord[],
  options: AffinityOptions = { minCoPurchaseCount: 3, limit: 20 }
): AffinityPair[] {
  const { customerBrands, brandCustomers } = buildBrandIndex(orders);
  const totalCustomers = customerBrands.size;
  if (totalCustomers === 0) {
    return [];
  }

  const pairCounts = new Map<string, { a: string; b: string; count: number }>();
  for (const brands of customerBrands.values()) {
    const sorted = [...brands].sort();
    for (let i = 0; i < sorted.length; i += 1) {
      for (let j = i + 1; j < sorted.length; j += 1) {
        const key = `${sorted[i]}\u0000${sorted[j]}`;
        const pair = pairCounts.get(key) ?? { a: sorted[i], b: sorted[j], count: 0 };
        pair.count += 1;
        pairCounts.set(key, pair);
      }
    }
  }

  const results: AffinityPair[] = [];
  for (const { a, b, count } of pairCounts.values()) {
    if (count < options.minCoPurchaseCount) {
      continue;
    }
    const lift = computeLift(
      count,
      brandCustomers.get(a)?.size ?? 0,
      brandCustomers.get(b)?.size ?? 0,
      totalCustomers
    );
    if (lift === null) {
      continue;
    }
    results.push({
      brand_a: a,
      brand_b: b,
      co_purchase_count: count,
      lift: roundTo(lift, 2)
    });
  }

  return results
    .sort((x, y) => y.co_purchase_count - x.co_purchase_count)
    .slice(0, options.limit);
}
