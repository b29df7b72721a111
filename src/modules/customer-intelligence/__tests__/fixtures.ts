import { DAY_IN_MS } from "../utils/dates";
import type {
  CustomerRecord,
  CustomerSnapshot,
  OrderRecord,
  RfmProfile
} from "../lib/types";

export const NOW = new Date("2025-06-15T12:00:00.000Z");

export const daysAgo = (days: number): Date =>
  new Date(NOW.getTime() - days * DAY_IN_MS);

export const buildCustomer = (
  overrides: Partial<CustomerRecord> & Pick<CustomerRecord, "email">
): CustomerRecord => ({
  firstName: null,
  lastName: null,
  ordersCount: 1,
  totalSpent: 50,
  createdAt: null,
  city: null,
  region: null,
  country: null,
  ...overrides
});

export const buildOrder = (
  overrides: Partial<OrderRecord> &
    Pick<OrderRecord, "orderId" | "customerEmail" | "createdAt">
): OrderRecord => ({
  orderNumber: null,
  totalPrice: 50,
  financialStatus: null,
  fulfillmentStatus: null,
  lineItems: [],
  ...overrides
});

export const buildProfile = (
  overrides: Partial<RfmProfile> & Pick<RfmProfile, "email">
): RfmProfile => ({
  ...buildCustomer({ email: overrides.email }),
  rScore: 3,
  fScore: 3,
  mScore: 3,
  daysSinceLastOrder: 30,
  lastOrderAt: null,
  segment: "Loyal",
  ...overrides
});

const LADDER = [
  { email: "a@example.com", orders: 1, spent: 10, recency: 80 },
  { email: "b@example.com", orders: 2, spent: 20, recency: 40 },
  { email: "c@example.com", orders: 3, spent: 30, recency: 20 },
  { email: "d@example.com", orders: 4, spent: 40, recency: 10 },
  { email: "e@example.com", orders: 5, spent: 100, recency: 5 }
];

/**
 * Five customers whose recency, frequency and spend rise together, so each
 * lands in its own quintile: a scores 1/1/1 and e scores 5/5/5.
 */
export const buildLadderSnapshot = (): CustomerSnapshot => ({
  customers: LADDER.map((entry) =>
    buildCustomer({
      email: entry.email,
      ordersCount: entry.orders,
      totalSpent: entry.spent
    })
  ),
  orders: LADDER.map((entry, index) =>
    buildOrder({
      orderId: String(1000 + index),
      customerEmail: entry.email,
      createdAt: daysAgo(entry.recency),
      totalPrice: entry.spent
    })
  )
});
