import type { Logger } from "@medusajs/framework/types";
import {
  DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS,
  type CustomerIntelligenceOptions
} from "../config";
import { computeBrandAffinity } from "./brand-affinity";
import { computeCohortRetention } from "./cohort-retention";
import { buildCustomerDetail, searchCustomers } from "./customer-lookup";
import { CustomerIntelligenceError, describeError } from "./errors";
import { computeGatewayProducts } from "./gateway-products";
import { computeGeoDistribution } from "./geo-distribution";
import { computeAcquisitionTrend, computeOverviewKpis } from "./overview-kpis";
import { computePulse } from "./pulse";
import {
  computeDaysBetweenDistribution,
  computeRepeatCurve,
  computeRetentionKpis
} from "./repeat-purchase";
import { computeRfmProfiles } from "./rfm-scorer";
import {
  computeRevenueBySegment,
  computeSegmentDistribution,
  selectTopCustomers,
  summarizeSegments
} from "./segment-summary";
import type {
  AffinityPair,
  CohortRetention,
  CustomerDashboard,
  CustomerDetail,
  CustomerOrderRepository,
  CustomerSearchResult,
  CustomerSnapshot,
  SegmentSummaryRow
} from "./types";

const LOG_PREFIX = "[customer-intelligence]";

export type CustomerIntelligenceLogger = Pick<Logger, "debug" | "info" | "error">;

export type CustomerIntelligenceDeps = {
  repository: CustomerOrderRepository;
  logger: CustomerIntelligenceLogger;
  options?: CustomerIntelligenceOptions;
};

export type CustomerIntelligence = {
  loadSnapshot: () => Promise<CustomerSnapshot>;
  buildDashboard: () => Promise<CustomerDashboard>;
  getRfmSegments: () => Promise<SegmentSummaryRow[]>;
  getCohortRetention: () => Promise<CohortRetention>;
  getBrandAffinity: () => Promise<AffinityPair[]>;
  getCustomerDetail: (email: string) => Promise<CustomerDetail | null>;
  searchCustomers: (
    term: string,
    limit?: number
  ) => Promise<CustomerSearchResult[]>;
};

/**
 * Full dashboard payload for one snapshot. RFM profiles are computed once
 * here and handed to every section that needs them.
 */
export function computeDashboard(
  snapshot: CustomerSnapshot,
  now: Date,
  options: CustomerIntelligenceOptions = DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS
): CustomerDashboard {
  const { customers, orders } = snapshot;
  const { segments } = options;

  const profiles = computeRfmProfiles(snapshot, now, options);
  const kpis = computeOverviewKpis(customers, profiles, now, options);

  return {
    pulse: computePulse(profiles, kpis, options),
    overview_kpis: kpis,
    rfm_distribution: computeSegmentDistribution(profiles, segments),
    revenue_by_segment: computeRevenueBySegment(profiles, segments),
    acquisition_trend: computeAcquisitionTrend(customers, now),
    top_customers: selectTopCustomers(profiles, options.topCustomersLimit),
    rfm_segments: summarizeSegments(profiles, segments),
    cohort_retention: computeCohortRetention(orders, options),
    repeat_curve: computeRepeatCurve(customers, options.repeatCurveMaxOrders),
    days_between_distribution: computeDaysBetweenDistribution(
      profiles,
      options.recencySentinelDays
    ),
    retention_kpis: computeRetentionKpis(profiles),
    gateway_products: computeGatewayProducts(customers, orders, {
      minFirstOrders: options.minGatewayFirstOrders,
      limit: options.gatewayProductLimit
    }),
    brand_affinity: computeBrandAffinity(orders, {
      minCoPurchaseCount: options.minCoPurchaseCount,
      limit: options.brandAffinityLimit
    }),
    geo_distribution: computeGeoDistribution(customers, options.geoLimit)
  };
}

export function createCustomerIntelligence({
  repository,
  logger,
  options = DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS
}: CustomerIntelligenceDeps): CustomerIntelligence {
  async function loadSnapshot(): Promise<CustomerSnapshot> {
    try {
      const [customers, orders] = await Promise.all([
        repository.listCustomers(),
        repository.listOrdersWithCustomerEmail()
      ]);
      logger.debug(
        `${LOG_PREFIX} Loaded ${customers.length} customers and ${orders.length} orders`
      );
      return { customers, orders };
    } catch (error) {
      logger.error(`${LOG_PREFIX} Snapshot load failed: ${describeError(error)}`);
      throw new CustomerIntelligenceError(
        "Customer and order data is unavailable",
        "REPOSITORY_UNAVAILABLE",
        { cause: describeError(error) }
      );
    }
  }

  async function buildDashboard(): Promise<CustomerDashboard> {
    const startedAt = Date.now();
    const snapshot = await loadSnapshot();
    const dashboard = computeDashboard(snapshot, new Date(), options);
    logger.info(
      `${LOG_PREFIX} Dashboard built in ${Date.now() - startedAt}ms ` +
        `(${dashboard.overview_kpis.total_customers} customers)`
    );
    return dashboard;
  }

  async function getRfmSegments(): Promise<SegmentSummaryRow[]> {
    const snapshot = await loadSnapshot();
    const profiles = computeRfmProfiles(snapshot, new Date(), options);
    return summarizeSegments(profiles, options.segments);
  }

  async function getCohortRetention(): Promise<CohortRetention> {
    const { orders } = await loadSnapshot();
    return computeCohortRetention(orders, options);
  }

  async function getBrandAffinity(): Promise<AffinityPair[]> {
    const { orders } = await loadSnapshot();
    return computeBrandAffinity(orders, {
      minCoPurchaseCount: options.minCoPurchaseCount,
      limit: options.brandAffinityLimit
    });
  }

  async function getCustomerDetail(email: string): Promise<CustomerDetail | null> {
    const snapshot = await loadSnapshot();
    const now = new Date();
    const profiles = computeRfmProfiles(snapshot, now, options);
    return buildCustomerDetail(email, snapshot, profiles, now, options);
  }

  async function search(
    term: string,
    limit = 20
  ): Promise<CustomerSearchResult[]> {
    const snapshot = await loadSnapshot();
    return searchCustomers(snapshot, term, new Date(), limit);
  }

  return {
    loadSnapshot,
    buildDashboard,
    getRfmSegments,
    getCohortRetention,
    getBrandAffinity,
    getCustomerDetail,
    searchCustomers: search
  };
}
