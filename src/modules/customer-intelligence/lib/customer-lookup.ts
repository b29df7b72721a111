import { daysSince, toIsoDate } from "../utils/dates";
import { roundTo, safeRatio } from "../utils/number";
import { compareOrders } from "./gateway-products";
import { buildLastOrderIndex } from "./rfm-scorer";
import { displayName, fullName } from "./segment-summary";
import type {
  CustomerDetail,
  CustomerEmail,
  CustomerFlag,
  CustomerSearchResult,
  CustomerSnapshot,
  OrderRecord,
  RfmProfile
} from "./types";

type DetailOptions = {
  highValueThreshold: number;
  recentOrdersLimit: number;
};

const DAYS_PER_MONTH = 30;

export function flagsFor(
  profile: RfmProfile,
  highValueThreshold: number
): CustomerFlag[] {
  const flags: CustomerFlag[] = [];
  if (profile.segment === "Champions") {
    flags.push("Champion");
  }
  if (profile.segment === "Loyal") {
    flags.push("Loyal");
  }
  if (profile.segment === "At Risk" || profile.segment === "Hibernating") {
    flags.push("At Risk");
  }
  if (profile.segment === "Lost") {
    flags.push("Churned");
  }
  if (profile.totalSpent > highValueThreshold) {
    flags.push("High Value");
  }
  if (profile.segment === "New Customers" || profile.segment === "Promising") {
    flags.push("New");
  }
  return flags;
}

export function buildCustomerDetail(
  email: CustomerEmail,
  snapshot: CustomerSnapshot,
  profiles: RfmProfile[],
  now: Date,
  options: DetailOptions
): CustomerDetail | null {
  const customer = snapshot.customers.find((c) => c.email === email);
  if (!customer) {
    return null;
  }

  const profile = profiles.find((p) => p.email === email) ?? null;
  // Newest first.
  const orders = snapshot.orders
    .filter((order) => order.customerEmail === email)
    .sort((a, b) => compareOrders(b, a));
  const latest: OrderRecord | undefined = orders[0];
  const earliest: OrderRecord | undefined = orders[orders.length - 1];

  return {
    email: customer.email,
    name: displayName(customer),
    segment: profile?.segment ?? "Unknown",
    r_score: profile?.rScore ?? 0,
    f_score: profile?.fScore ?? 0,
    m_score: profile?.mScore ?? 0,
    total_orders: customer.ordersCount,
    total_spent: customer.totalSpent,
    avg_order_value: roundTo(
      safeRatio(customer.totalSpent, customer.ordersCount),
      2
    ),
    days_since_last_order: latest ? daysSince(now, latest.createdAt) : null,
    first_order_date: earliest ? toIsoDate(earliest.createdAt) : null,
    last_order_date: latest ? toIsoDate(latest.createdAt) : null,
    customer_since_months: customer.createdAt
      ? Math.max(
          1,
          Math.floor(daysSince(now, customer.createdAt) / DAYS_PER_MONTH)
        )
      : 0,
    city: customer.city ?? "",
    state: customer.region ?? "",
    country: customer.country ?? "",
    flags: profile ? flagsFor(profile, options.highValueThreshold) : [],
    orders: orders.slice(0, options.recentOrdersLimit).map((order) => ({
      order_number: order.orderNumber ?? order.orderId,
      total: order.totalPrice,
      date: toIsoDate(order.createdAt),
      status: order.financialStatus ?? "",
      fulfillment: order.fulfillmentStatus ?? ""
    }))
  };
}

export function searchCustomers(
  snapshot: CustomerSnapshot,
  term: string,
  now: Date,
  limit = 20
): CustomerSearchResult[] {
  const needle = term.trim().toLowerCase();
  if (!needle) {
    return [];
  }

  const matches = (value: string | null) =>
    value !== null && value.toLowerCase().includes(needle);
  const lastOrders = buildLastOrderIndex(snapshot.orders);

  return snapshot.customers
    .filter((c) => matches(c.email) || matches(c.firstName) || matches(c.lastName))
    .sort((a, b) => b.totalSpent - a.totalSpent)
    .slice(0, limit)
    .map((customer) => {
      const lastOrderAt = lastOrders.get(customer.email);
      return {
        email: customer.email,
        name: fullName(customer),
        orders: customer.ordersCount,
        total_spent: customer.totalSpent,
        days_since: lastOrderAt ? daysSince(now, lastOrderAt) : null,
        last_order: lastOrderAt ? toIsoDate(lastOrderAt) : null
      };
    });
}
