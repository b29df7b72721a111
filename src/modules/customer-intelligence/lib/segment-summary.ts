import {
  DEFAULT_SEGMENTS,
  SEGMENT_NAMES,
  type SegmentDefinition,
  type SegmentName
} from "../config";
import { toIsoDate } from "../utils/dates";
import { average, percentOf, roundTo, sum } from "../utils/number";
import { findSegmentDefinition } from "./segment-classifier";
import type {
  RfmProfile,
  SegmentDistributionRow,
  SegmentRevenueRow,
  SegmentSummaryRow,
  TopCustomerRow
} from "./types";

export function groupBySegment(
  profiles: RfmProfile[]
): Map<SegmentName, RfmProfile[]> {
  const groups = new Map<SegmentName, RfmProfile[]>(
    SEGMENT_NAMES.map((name): [SegmentName, RfmProfile[]] => [name, []])
  );
  for (const profile of profiles) {
    groups.get(profile.segment)?.push(profile);
  }
  return groups;
}

export function countInSegments(
  profiles: RfmProfile[],
  segments: readonly SegmentName[]
): number {
  return profiles.filter((profile) => segments.includes(profile.segment))
    .length;
}

export function computeSegmentDistribution(
  profiles: RfmProfile[],
  definitions: SegmentDefinition[] = DEFAULT_SEGMENTS
): SegmentDistributionRow[] {
  const groups = groupBySegment(profiles);
  return SEGMENT_NAMES.map((name) => {
    const count = groups.get(name)?.length ?? 0;
    return {
      segment: name,
      count,
      pct: percentOf(count, profiles.length),
      color: findSegmentDefinition(name, definitions).color
    };
  }).sort((a, b) => b.count - a.count);
}

export function computeRevenueBySegment(
  profiles: RfmProfile[],
  definitions: SegmentDefinition[] = DEFAULT_SEGMENTS
): SegmentRevenueRow[] {
  const groups = groupBySegment(profiles);
  return SEGMENT_NAMES.map((name) => ({
    segment: name,
    revenue: roundTo(
      sum((groups.get(name) ?? []).map((profile) => profile.totalSpent)),
      2
    ),
    color: findSegmentDefinition(name, definitions).color
  })).sort((a, b) => b.revenue - a.revenue);
}

export function summarizeSegments(
  profiles: RfmProfile[],
  definitions: SegmentDefinition[] = DEFAULT_SEGMENTS
): SegmentSummaryRow[] {
  const groups = groupBySegment(profiles);
  return SEGMENT_NAMES.map((name) => {
    const members = groups.get(name) ?? [];
    const definition = findSegmentDefinition(name, definitions);
    return {
      segment: name,
      count: members.length,
      pct: percentOf(members.length, profiles.length),
      avg_orders: roundTo(average(members.map((p) => p.ordersCount)), 1),
      avg_spend: roundTo(average(members.map((p) => p.totalSpent)), 2),
      avg_recency: roundTo(
        average(members.map((p) => p.daysSinceLastOrder)),
        0
      ),
      total_revenue: roundTo(sum(members.map((p) => p.totalSpent)), 2),
      color: definition.color,
      description: definition.description,
      action: definition.action
    };
  }).sort((a, b) => b.total_revenue - a.total_revenue);
}

/** First and last name joined, empty when neither is known. */
export function fullName(customer: {
  firstName: string | null;
  lastName: string | null;
}): string {
  return `${customer.firstName ?? ""} ${customer.lastName ?? ""}`.trim();
}

export function displayName(customer: {
  firstName: string | null;
  lastName: string | null;
  email: string;
}): string {
  return fullName(customer) || customer.email;
}

export function selectTopCustomers(
  profiles: RfmProfile[],
  limit: number
): TopCustomerRow[] {
  return profiles
    .slice()
    .sort((a, b) => b.totalSpent - a.totalSpent)
    .slice(0, limit)
    .map((profile) => ({
      name: displayName(profile),
      email: profile.email,
      orders: profile.ordersCount,
      total_spent: profile.totalSpent,
      last_order: profile.lastOrderAt ? toIsoDate(profile.lastOrderAt) : null,
      segment: profile.segment,
      days_since: profile.daysSinceLastOrder
    }));
}
