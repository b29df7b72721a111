import { KnexCustomerOrderRepository } from "../repositories/customer-order-repository";
import { buildFakeKnex } from "./fake-knex";

describe("KnexCustomerOrderRepository", () => {
  it("maps customer rows and skips rows without an email", async () => {
    const { db, calls } = buildFakeKnex({
      shopify_customers: [
        {
          email: " jane@example.com ",
          first_name: "Jane",
          last_name: "",
          orders_count: "3",
          total_spent: "310.00",
          created_at: "2024-11-02T15:30:00Z",
          default_address_city: "Austin",
          default_address_province: "TX",
          default_address_country: "US"
        },
        { email: "", orders_count: 1, total_spent: 10 }
      ]
    });

    const customers = await new KnexCustomerOrderRepository(db).listCustomers();

    expect(calls).toHaveBeenCalledWith("shopify_customers");
    expect(customers).toEqual([
      {
        email: "jane@example.com",
        firstName: "Jane",
        lastName: null,
        ordersCount: 3,
        totalSpent: 310,
        createdAt: new Date("2024-11-02T15:30:00.000Z"),
        city: "Austin",
        region: "TX",
        country: "US"
      }
    ]);
  });

  it("folds joined line items into their orders", async () => {
    const base = {
      order_number: "#1001",
      customer_email: "jane@example.com",
      created_at: "2025-03-01T10:00:00Z",
      total_price: "120.50",
      financial_status: "paid",
      fulfillment_status: null
    };
    const { db, queries } = buildFakeKnex({
      "shopify_orders as o": [
        { ...base, order_id: 1001, vendor: "Acme", title: "Serum", sku: "SER-1", item_id: 1 },
        { ...base, order_id: 1001, vendor: null, title: "Toner", sku: null, item_id: 2 },
        { ...base, order_id: 1002, created_at: "not a date", item_id: 3 },
        {
          order_id: 1003,
          order_number: null,
          customer_email: "sam@example.com",
          created_at: new Date("2025-04-01T00:00:00.000Z"),
          total_price: 40,
          financial_status: null,
          fulfillment_status: "fulfilled",
          vendor: null,
          title: null,
          sku: null,
          item_id: null
        }
      ]
    });

    const orders = await new KnexCustomerOrderRepository(db).listOrdersWithCustomerEmail();

    expect(queries.get("shopify_orders as o")?.calls[0]).toEqual([
      "leftJoin",
      ["shopify_order_items as i", "i.shopify_order_id", "o.shopify_order_id"]
    ]);
    expect(orders).toEqual([
      {
        orderId: "1001",
        orderNumber: "#1001",
        customerEmail: "jane@example.com",
        createdAt: new Date("2025-03-01T10:00:00.000Z"),
        totalPrice: 120.5,
        financialStatus: "paid",
        fulfillmentStatus: null,
        lineItems: [
          { brand: "Acme", title: "Serum", sku: "SER-1" },
          { brand: null, title: "Toner", sku: null }
        ]
      },
      {
        orderId: "1003",
        orderNumber: null,
        customerEmail: "sam@example.com",
        createdAt: new Date("2025-04-01T00:00:00.000Z"),
        totalPrice: 40,
        financialStatus: null,
        fulfillmentStatus: "fulfilled",
        lineItems: []
      }
    ]);
  });

  it("propagates query failures", async () => {
    const { db } = buildFakeKnex({ shopify_customers: new Error("relation does not exist") });

    await expect(new KnexCustomerOrderRepository(db).listCustomers()).rejects.toThrow(
      "relation does not exist"
    );
  });
});
