import type { Knex } from "knex";
import type {
  CustomerOrderRepository,
  CustomerRecord,
  LineItemRecord,
  OrderRecord
} from "../lib/types";
import { toDateOrNull } from "../utils/dates";
import { toNumber } from "../utils/number";

const CUSTOMERS_TABLE = "shopify_customers";
const ORDERS_TABLE = "shopify_orders";
const ORDER_ITEMS_TABLE = "shopify_order_items";

type Row = Record<string, unknown>;

const toText = (value: unknown): string | null => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : null;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return null;
};

/**
 * Reads the imported storefront tables. Each method issues a single query;
 * everything downstream works on the returned arrays.
 */
export class KnexCustomerOrderRepository implements CustomerOrderRepository {
  constructor(private readonly db: Knex) {}

  async listCustomers(): Promise<CustomerRecord[]> {
    const rows: Row[] = await this.db<Row>(CUSTOMERS_TABLE)
      .select([
        "email",
        "first_name",
        "last_name",
        "orders_count",
        "total_spent",
        "created_at",
        "default_address_city",
        "default_address_province",
        "default_address_country"
      ])
      .whereNotNull("email")
      .whereNot("email", "");

    const customers: CustomerRecord[] = [];
    for (const row of rows) {
      const email = toText(row.email);
      if (!email) {
        continue;
      }
      customers.push({
        email,
        firstName: toText(row.first_name),
        lastName: toText(row.last_name),
        ordersCount: toNumber(row.orders_count),
        totalSpent: toNumber(row.total_spent),
        createdAt: toDateOrNull(row.created_at),
        city: toText(row.default_address_city),
        region: toText(row.default_address_province),
        country: toText(row.default_address_country)
      });
    }
    return customers;
  }

  /**
   * Orders left-joined to their line items, folded back into one record per
   * order. Orders with an unparseable timestamp are dropped.
   */
  async listOrdersWithCustomerEmail(): Promise<OrderRecord[]> {
    const rows: Row[] = await this.db(`${ORDERS_TABLE} as o`)
      .leftJoin(
        `${ORDER_ITEMS_TABLE} as i`,
        "i.shopify_order_id",
        "o.shopify_order_id"
      )
      .select([
        "o.shopify_order_id as order_id",
        "o.order_number",
        "o.customer_email",
        "o.created_at",
        "o.total_price",
        "o.financial_status",
        "o.fulfillment_status",
        "i.vendor",
        "i.title",
        "i.sku",
        "i.id as item_id"
      ])
      .whereNotNull("o.customer_email")
      .whereNot("o.customer_email", "")
      .orderBy([
        { column: "o.created_at", order: "asc" },
        { column: "o.shopify_order_id", order: "asc" }
      ]);

    const orders = new Map<string, OrderRecord>();
    for (const row of rows) {
      const orderId = toText(row.order_id);
      const customerEmail = toText(row.customer_email);
      const createdAt = toDateOrNull(row.created_at);
      if (!orderId || !customerEmail || !createdAt) {
        continue;
      }

      let order = orders.get(orderId);
      if (!order) {
        order = {
          orderId,
          orderNumber: toText(row.order_number),
          customerEmail,
          createdAt,
          totalPrice: toNumber(row.total_price),
          financialStatus: toText(row.financial_status),
          fulfillmentStatus: toText(row.fulfillment_status),
          lineItems: []
        };
        orders.set(orderId, order);
      }

      if (row.item_id !== null && row.item_id !== undefined) {
        const item: LineItemRecord = {
          brand: toText(row.vendor),
          title: toText(row.title),
          sku: toText(row.sku)
        };
        order.lineItems.push(item);
      }
    }

    return [...orders.values()];
  }
}
