import { safeRatio, sum } from "../utils/number";
import { countInSegments } from "./segment-summary";
import type { OverviewKpis, Pulse, PulseStatus, RfmProfile } from "./types";

type PulseOptions = {
  reportingCurrency: string;
  activeWindowDays: number;
};

const RISK_SEGMENTS = ["At Risk", "Hibernating", "Lost"] as const;

const STATUS_THRESHOLDS: Array<[number, PulseStatus]> = [
  [40, "Critical"],
  [20, "At Risk"],
  [10, "Stable"]
];

export function classifyPulseStatus(riskPct: number): PulseStatus {
  return STATUS_THRESHOLDS.find(([min]) => riskPct >= min)?.[1] ?? "Thriving";
}

const formatCount = (value: number): string => value.toLocaleString("en-US");

export function formatCurrency(value: number, currency: string): string {
  return new Intl.NumberFormat("en-US", {
    style: "currency",
    currency: currency.toUpperCase()
  }).format(value);
}

export function computePulse(
  profiles: RfmProfile[],
  kpis: OverviewKpis,
  options: PulseOptions
): Pulse {
  const total = formatCount(kpis.total_customers);
  const active = formatCount(kpis.active_customers);
  const atRisk = countInSegments(profiles, RISK_SEGMENTS);
  const champions = profiles.filter((p) => p.segment === "Champions");

  const championRevenue = sum(champions.map((p) => p.totalSpent));
  const totalRevenue = sum(profiles.map((p) => p.totalSpent));
  const championPct = Math.round(safeRatio(championRevenue, totalRevenue) * 100);
  const riskPct = Math.round(safeRatio(atRisk, profiles.length) * 100);

  let narrative =
    `${active} active customers out of ${total} total, ` +
    `${formatCount(champions.length)} Champions driving ${championPct}% of revenue`;
  if (atRisk > 0) {
    narrative += `, but ${formatCount(atRisk)} customers at risk of churning`;
  }

  const proNarrative = [
    `Customer base: ${total} total, ${active} active (${options.activeWindowDays}d).`,
    `RFM analysis identifies ${formatCount(champions.length)} Champions (${championPct}% of revenue).`,
    `${formatCount(atRisk)} customers classified At Risk/Hibernating/Lost (${riskPct}% of purchasers).`,
    `Repeat rate: ${kpis.repeat_rate}%.`,
    `Avg LTV: ${formatCurrency(kpis.avg_ltv, options.reportingCurrency)}.`
  ].join(" ");

  return {
    narrative,
    status: classifyPulseStatus(riskPct),
    pro_narrative: proNarrative
  };
}
