import { compareAsc } from "date-fns";
import { percentOf, roundTo, safeRatio, sum } from "../utils/number";
import type {
  CustomerEmail,
  CustomerRecord,
  GatewayProduct,
  LineItemRecord,
  OrderRecord
} from "./types";

type GatewayOptions = {
  minFirstOrders: number;
  limit: number;
};

const orderIdCollator = new Intl.Collator("en", { numeric: true });

export function compareOrders(a: OrderRecord, b: OrderRecord): number {
  return (
    compareAsc(a.createdAt, b.createdAt) ||
    orderIdCollator.compare(a.orderId, b.orderId)
  );
}

export function productKey(item: LineItemRecord): string {
  return item.title || item.sku || "Unknown";
}

export function findFirstOrders(
  orders: OrderRecord[]
): Map<CustomerEmail, OrderRecord> {
  const firstOrders = new Map<CustomerEmail, OrderRecord>();
  for (const order of orders) {
    if (!order.customerEmail) {
      continue;
    }
    const current = firstOrders.get(order.customerEmail);
    if (!current || compareOrders(order, current) < 0) {
      firstOrders.set(order.customerEmail, order);
    }
  }
  return firstOrders;
}

/**
 * Products that most often open a customer's history, with how many of
 * those customers came back and what they are worth over their lifetime.
 */
export function computeGatewayProducts(
  customers: CustomerRecord[],
  orders: OrderRecord[],
  options: GatewayOptions = { minFirstOrders: 3, limit: 20 }
): GatewayProduct[] {
  const productCustomers = new Map<string, Set<CustomerEmail>>();
  for (const [email, order] of findFirstOrders(orders)) {
    for (const item of order.lineItems) {
      const key = productKey(item);
      const buyers = productCustomers.get(key) ?? new Set<CustomerEmail>();
      buyers.add(email);
      productCustomers.set(key, buyers);
    }
  }

  const repeatBuyers = new Set(
    customers.filter((c) => c.ordersCount >= 2).map((c) => c.email)
  );
  const lifetimeValue = new Map(
    customers
      .filter((c) => c.ordersCount >= 1)
      .map((c): [CustomerEmail, number] => [c.email, c.totalSpent])
  );

  const results: GatewayProduct[] = [];
  for (const [product, buyers] of productCustomers) {
    const count = buyers.size;
    if (count < options.minFirstOrders) {
      continue;
    }
    const emails = [...buyers];
    const repeatCount = emails.filter((email) => repeatBuyers.has(email)).length;
    results.push({
      product,
      first_order_count: count,
      repeat_rate: percentOf(repeatCount, count),
      avg_customer_ltv: roundTo(
        safeRatio(sum(emails.map((email) => lifetimeValue.get(email) ?? 0)), count),
        2
      )
    });
  }

  return results
    .sort((a, b) => b.first_order_count - a.first_order_count)
    .slice(0, options.limit);
}
