import type { SegmentDefinition, SegmentName } from "../config";

export type CustomerEmail = string;

export type CustomerRecord = {
  email: CustomerEmail;
  firstName: string | null;
  lastName: string | null;
  ordersCount: number;
  totalSpent: number;
  createdAt: Date | null;
  city: string | null;
  region: string | null;
  country: string | null;
};

export type LineItemRecord = {
  brand: string | null;
  title: string | null;
  sku: string | null;
};

export type OrderRecord = {
  orderId: string;
  orderNumber: string | null;
  customerEmail: CustomerEmail;
  createdAt: Date;
  totalPrice: number;
  financialStatus: string | null;
  fulfillmentStatus: string | null;
  lineItems: LineItemRecord[];
};

/**
 * Read-only source of the customer/order snapshot. Implementations are
 * expected to issue one bulk read per method.
 */
export interface CustomerOrderRepository {
  listCustomers(): Promise<CustomerRecord[]>;
  listOrdersWithCustomerEmail(): Promise<OrderRecord[]>;
}

export type CustomerSnapshot = {
  customers: CustomerRecord[];
  orders: OrderRecord[];
};

export type QuintileScores = {
  rScore: number;
  fScore: number;
  mScore: number;
};

export type RfmProfile = CustomerRecord &
  QuintileScores & {
    daysSinceLastOrder: number;
    lastOrderAt: Date | null;
    segment: SegmentName;
  };

export type SegmentMatch = {
  name: SegmentName;
  definition: SegmentDefinition;
};

export type PulseStatus = "Critical" | "At Risk" | "Stable" | "Thriving";

export type Pulse = {
  narrative: string;
  status: PulseStatus;
  pro_narrative: string;
};

export type OverviewKpis = {
  total_customers: number;
  active_customers: number;
  avg_orders: number;
  avg_ltv: number;
  new_this_month: number;
  repeat_rate: number;
  at_risk_count: number;
  avg_days_between: number;
};

export type SegmentDistributionRow = {
  segment: SegmentName;
  count: number;
  pct: number;
  color: string;
};

export type SegmentRevenueRow = {
  segment: SegmentName;
  revenue: number;
  color: string;
};

export type SegmentSummaryRow = {
  segment: SegmentName;
  count: number;
  pct: number;
  avg_orders: number;
  avg_spend: number;
  avg_recency: number;
  total_revenue: number;
  color: string;
  description: string;
  action: string;
};

export type AcquisitionTrendRow = {
  month: string;
  count: number;
};

export type TopCustomerRow = {
  name: string;
  email: CustomerEmail;
  orders: number;
  total_spent: number;
  last_order: string | null;
  segment: SegmentName;
  days_since: number;
};

export type CohortRow = {
  cohort: string;
  size: number;
  retention: number[];
};

export type CohortRetention = {
  cohorts: CohortRow[];
  max_months: number;
};

export type RepeatCurvePoint = {
  order_number: number;
  customers: number;
  pct: number;
};

export type DaysBetweenBucket = {
  label: string;
  count: number;
};

export type RetentionKpis = {
  retained_30d: number;
  retention_30d_pct: number;
  retained_90d: number;
  retention_90d_pct: number;
  churn_rate: number;
  avg_orders_loyal: number;
};

export type GatewayProduct = {
  product: string;
  first_order_count: number;
  repeat_rate: number;
  avg_customer_ltv: number;
};

export type AffinityPair = {
  brand_a: string;
  brand_b: string;
  co_purchase_count: number;
  lift: number;
};

export type GeoDistributionRow = {
  city: string;
  state: string;
  country: string;
  customer_count: number;
  total_revenue: number;
  avg_orders: number;
};

export type CustomerDashboard = {
  pulse: Pulse;
  overview_kpis: OverviewKpis;
  rfm_distribution: SegmentDistributionRow[];
  revenue_by_segment: SegmentRevenueRow[];
  acquisition_trend: AcquisitionTrendRow[];
  top_customers: TopCustomerRow[];
  rfm_segments: SegmentSummaryRow[];
  cohort_retention: CohortRetention;
  repeat_curve: RepeatCurvePoint[];
  days_between_distribution: DaysBetweenBucket[];
  retention_kpis: RetentionKpis;
  gateway_products: GatewayProduct[];
  brand_affinity: AffinityPair[];
  geo_distribution: GeoDistributionRow[];
};

export type CustomerFlag =
  | "Champion"
  | "Loyal"
  | "At Risk"
  | "Churned"
  | "High Value"
  | "New";

export type CustomerOrderSummary = {
  order_number: string;
  total: number;
  date: string;
  status: string;
  fulfillment: string;
};

export type CustomerDetail = {
  email: CustomerEmail;
  name: string;
  segment: SegmentName | "Unknown";
  r_score: number;
  f_score: number;
  m_score: number;
  total_orders: number;
  total_spent: number;
  avg_order_value: number;
  days_since_last_order: number | null;
  first_order_date: string | null;
  last_order_date: string | null;
  customer_since_months: number;
  city: string;
  state: string;
  country: string;
  flags: CustomerFlag[];
  orders: CustomerOrderSummary[];
};

export type CustomerSearchResult = {
  email: CustomerEmail;
  name: string;
  orders: number;
  total_spent: number;
  days_since: number | null;
  last_order: string | null;
};
