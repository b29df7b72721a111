import { computeAcquisitionTrend, computeOverviewKpis } from "../lib/overview-kpis";
import { classifyPulseStatus, computePulse, formatCurrency } from "../lib/pulse";
import type { OverviewKpis } from "../lib/types";
import { NOW, buildCustomer, buildProfile } from "./fixtures";

const kpiOptions = { activeWindowDays: 90, recencySentinelDays: 9999 };
const pulseOptions = { reportingCurrency: "usd", activeWindowDays: 90 };

describe("computeOverviewKpis", () => {
  const customers = [
    buildCustomer({
      email: "a@example.com",
      ordersCount: 3,
      totalSpent: 300,
      createdAt: new Date("2025-06-02T08:00:00.000Z")
    }),
    buildCustomer({
      email: "b@example.com",
      ordersCount: 1,
      totalSpent: 100,
      createdAt: new Date("2025-01-10T08:00:00.000Z")
    }),
    buildCustomer({
      email: "c@example.com",
      ordersCount: 0,
      totalSpent: 0,
      createdAt: new Date("2025-06-10T08:00:00.000Z")
    })
  ];
  const profiles = [
    buildProfile({ email: "a@example.com", ordersCount: 3, totalSpent: 300, daysSinceLastOrder: 10, segment: "Loyal" }),
    buildProfile({ email: "b@example.com", ordersCount: 1, totalSpent: 100, daysSinceLastOrder: 120, segment: "At Risk" })
  ];

  it("computes the headline figures", () => {
    expect(computeOverviewKpis(customers, profiles, NOW, kpiOptions)).toEqual({
      total_customers: 3,
      active_customers: 1,
      avg_orders: 2,
      avg_ltv: 200,
      new_this_month: 2,
      repeat_rate: 50,
      at_risk_count: 1,
      avg_days_between: 10
    });
  });

  it("leaves sentinel recency out of the days-between average", () => {
    const withOrphan = [
      ...profiles,
      buildProfile({ email: "z@example.com", ordersCount: 4, daysSinceLastOrder: 9999 })
    ];
    expect(
      computeOverviewKpis(customers, withOrphan, NOW, kpiOptions).avg_days_between
    ).toBe(10);
  });

  it("returns zeros when there are no customers", () => {
    expect(computeOverviewKpis([], [], NOW, kpiOptions)).toEqual({
      total_customers: 0,
      active_customers: 0,
      avg_orders: 0,
      avg_ltv: 0,
      new_this_month: 0,
      repeat_rate: 0,
      at_risk_count: 0,
      avg_days_between: 0
    });
  });

  it("counts sign-ups per month over the last year", () => {
    const trendCustomers = [
      ...customers,
      buildCustomer({ email: "old@example.com", createdAt: new Date("2024-01-01T00:00:00.000Z") }),
      buildCustomer({ email: "unknown@example.com", createdAt: null })
    ];
    expect(computeAcquisitionTrend(trendCustomers, NOW)).toEqual([
      { month: "2025-01", count: 1 },
      { month: "2025-06", count: 2 }
    ]);
  });
});

describe("classifyPulseStatus", () => {
  it.each([
    [0, "Thriving"],
    [9, "Thriving"],
    [10, "Stable"],
    [19, "Stable"],
    [20, "At Risk"],
    [39, "At Risk"],
    [40, "Critical"],
    [85, "Critical"]
  ] as const)("maps %d%% at risk to %s", (riskPct, status) => {
    expect(classifyPulseStatus(riskPct)).toBe(status);
  });
});

describe("computePulse", () => {
  const kpis: OverviewKpis = {
    total_customers: 1234,
    active_customers: 3,
    avg_orders: 2.4,
    avg_ltv: 440,
    new_this_month: 0,
    repeat_rate: 60,
    at_risk_count: 1,
    avg_days_between: 30
  };

  it("describes champion revenue and churn risk", () => {
    const profiles = [
      buildProfile({ email: "c1@example.com", totalSpent: 600, segment: "Champions" }),
      buildProfile({ email: "c2@example.com", totalSpent: 400, segment: "Champions" }),
      buildProfile({ email: "l1@example.com", totalSpent: 500, segment: "Loyal" }),
      buildProfile({ email: "r1@example.com", totalSpent: 200, segment: "At Risk" }),
      buildProfile({ email: "x1@example.com", totalSpent: 100, segment: "Lost" })
    ];

    expect(computePulse(profiles, kpis, pulseOptions)).toEqual({
      narrative:
        "3 active customers out of 1,234 total, 2 Champions driving 56% of revenue, " +
        "but 2 customers at risk of churning",
      status: "Critical",
      pro_narrative:
        "Customer base: 1,234 total, 3 active (90d). " +
        "RFM analysis identifies 2 Champions (56% of revenue). " +
        "2 customers classified At Risk/Hibernating/Lost (40% of purchasers). " +
        "Repeat rate: 60%. " +
        "Avg LTV: $440.00."
    });
  });

  it("omits the churn clause when nobody is at risk", () => {
    const profiles = [
      buildProfile({ email: "c1@example.com", totalSpent: 300, segment: "Champions" }),
      buildProfile({ email: "l1@example.com", totalSpent: 100, segment: "Loyal" })
    ];

    const pulse = computePulse(profiles, kpis, pulseOptions);

    expect(pulse.narrative).toBe(
      "3 active customers out of 1,234 total, 1 Champions driving 75% of revenue"
    );
    expect(pulse.status).toBe("Thriving");
  });

  it("formats lifetime value in the reporting currency", () => {
    expect(formatCurrency(1234.5, "usd")).toBe("$1,234.50");
  });
});
