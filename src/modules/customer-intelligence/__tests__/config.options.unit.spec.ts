import {
  DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS,
  DEFAULT_SEGMENTS,
  SEGMENT_NAMES,
  optionsFromEnv,
  resolveOptions
} from "../config";
import { CustomerIntelligenceError } from "../lib/errors";

describe("resolveOptions", () => {
  it("fills every default", () => {
    const options = resolveOptions();

    expect(options).toEqual(DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS);
    expect(options).toMatchObject({
      reportingCurrency: "usd",
      activeWindowDays: 90,
      recencySentinelDays: 9999,
      cohortCount: 12,
      cohortMonths: 12,
      minGatewayFirstOrders: 3,
      minCoPurchaseCount: 3,
      highValueThreshold: 1000
    });
  });

  it("loads the bundled segment table in priority order", () => {
    expect(DEFAULT_SEGMENTS.map((segment) => segment.name)).toEqual([...SEGMENT_NAMES]);
    expect(DEFAULT_SEGMENTS.filter((segment) => segment.fallback).map((s) => s.name)).toEqual([
      "Lost"
    ]);
  });

  it("normalizes the currency code", () => {
    expect(resolveOptions({ reportingCurrency: "EUR" }).reportingCurrency).toBe("eur");
  });

  it("rejects invalid values with field errors", () => {
    let caught: unknown;
    try {
      resolveOptions({ activeWindowDays: -5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CustomerIntelligenceError);
    expect(caught).toMatchObject({
      code: "INVALID_OPTIONS",
      details: { issues: { activeWindowDays: expect.any(Array) } }
    });
  });

  it("rejects a currency code Intl cannot format", () => {
    expect(() => resolveOptions({ reportingCurrency: "US$" })).toThrow(CustomerIntelligenceError);
    expect(() => resolveOptions(optionsFromEnv({ CUSTOMER_INTELLIGENCE_CURRENCY: "12a" }))).toThrow(
      "Invalid customer intelligence options"
    );
  });

  it("rejects a segment table that repeats a segment", () => {
    const segments = [...DEFAULT_SEGMENTS, DEFAULT_SEGMENTS[0]];
    expect(() => resolveOptions({ segments })).toThrow("Invalid customer intelligence options");
  });

  it("rejects a between condition without a range", () => {
    const segments = DEFAULT_SEGMENTS.map((segment) =>
      segment.name === "Need Attention"
        ? { ...segment, all: [{ field: "r_score", operator: "between", value: 2 }] }
        : segment
    );
    expect(() => resolveOptions({ segments })).toThrow(CustomerIntelligenceError);
  });
});

describe("optionsFromEnv", () => {
  it("reads overrides and ignores blank variables", () => {
    expect(
      optionsFromEnv({
        CUSTOMER_INTELLIGENCE_CURRENCY: "EUR",
        CUSTOMER_INTELLIGENCE_ACTIVE_WINDOW_DAYS: "60",
        CUSTOMER_INTELLIGENCE_HIGH_VALUE_THRESHOLD: " ",
        UNRELATED: "x"
      })
    ).toEqual({
      reportingCurrency: "EUR",
      activeWindowDays: 60,
      highValueThreshold: undefined
    });
  });

  it("feeds resolveOptions", () => {
    const options = resolveOptions(
      optionsFromEnv({ CUSTOMER_INTELLIGENCE_HIGH_VALUE_THRESHOLD: "2500" })
    );
    expect(options.highValueThreshold).toBe(2500);
    expect(options.activeWindowDays).toBe(90);
  });

  it("rejects non-numeric windows", () => {
    expect(() =>
      optionsFromEnv({ CUSTOMER_INTELLIGENCE_ACTIVE_WINDOW_DAYS: "soon" })
    ).toThrow("Invalid customer intelligence environment");
  });
});
