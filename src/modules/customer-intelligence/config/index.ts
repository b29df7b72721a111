import { z } from "zod";
import rawSegments from "./segments.json";
import { CustomerIntelligenceError } from "../lib/errors";

export const SEGMENT_NAMES = [
  "Champions",
  "Loyal",
  "Potential Loyalist",
  "Promising",
  "New Customers",
  "Need Attention",
  "About to Sleep",
  "At Risk",
  "Hibernating",
  "Lost"
] as const;

export type SegmentName = (typeof SEGMENT_NAMES)[number];

const scoreSchema = z.number().int().min(1).max(5);

const conditionSchema = z
  .object({
    field: z.enum(["r_score", "f_score", "m_score"]),
    operator: z.enum(["eq", "gte", "lte", "between"]),
    value: z.union([scoreSchema, z.tuple([scoreSchema, scoreSchema])])
  })
  .superRefine((entry, ctx) => {
    if (entry.operator === "between") {
      if (!Array.isArray(entry.value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "between operator expects a tuple of two scores",
          path: ["value"]
        });
      } else if (entry.value[0] > entry.value[1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "between bounds must be ascending",
          path: ["value"]
        });
      }
    } else if (Array.isArray(entry.value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "operator expects a single score",
        path: ["value"]
      });
    }
  });

const segmentSchema = z.object({
  name: z.enum(SEGMENT_NAMES),
  priority: z.number().int(),
  color: z.string().regex(/^#[0-9a-fA-F]{6}$/),
  description: z.string().min(1),
  action: z.string().min(1),
  all: z.array(conditionSchema).optional(),
  none: z.array(conditionSchema).optional(),
  fallback: z.boolean().optional()
});

// Reporting iterates every segment, so a table must name each one exactly once.
const segmentTableSchema = z
  .array(segmentSchema)
  .superRefine((segments, ctx) => {
    const seen = new Set<SegmentName>();
    for (const segment of segments) {
      if (seen.has(segment.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `segment "${segment.name}" is defined more than once`
        });
      }
      seen.add(segment.name);
    }
    for (const name of SEGMENT_NAMES) {
      if (!seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `segment "${name}" is missing`
        });
      }
    }
    if (segments.filter((segment) => segment.fallback).length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "only one segment may be marked as fallback"
      });
    }
  })
  .transform((segments) =>
    segments.slice().sort((a, b) => a.priority - b.priority)
  );

export type SegmentCondition = z.infer<typeof conditionSchema>;
export type SegmentDefinition = z.infer<typeof segmentSchema>;

export const DEFAULT_SEGMENTS: SegmentDefinition[] = z
  .object({ segments: segmentTableSchema })
  .parse(rawSegments).segments;

const positiveInt = (fallback: number) =>
  z.number().int().positive().default(fallback);

const optionsSchema = z.object({
  /** Currency code used when the pulse narrative formats lifetime value */
  reportingCurrency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, "Expected a three-letter ISO 4217 code")
    .transform((value) => value.toLowerCase())
    .default("usd"),
  /** Segment rule table, evaluated in ascending priority order */
  segments: segmentTableSchema.default(DEFAULT_SEGMENTS),
  /** A customer counts as active when their last order is this recent */
  activeWindowDays: positiveInt(90),
  /** Recency assigned to scored customers with no order in the stream */
  recencySentinelDays: positiveInt(9999),
  cohortCount: positiveInt(12),
  cohortMonths: positiveInt(12),
  repeatCurveMaxOrders: positiveInt(10),
  minGatewayFirstOrders: positiveInt(3),
  minCoPurchaseCount: positiveInt(3),
  gatewayProductLimit: positiveInt(20),
  brandAffinityLimit: positiveInt(20),
  geoLimit: positiveInt(25),
  topCustomersLimit: positiveInt(20),
  recentOrdersLimit: positiveInt(10),
  /** Lifetime spend above which a customer is flagged "High Value" */
  highValueThreshold: z.number().nonnegative().default(1000)
});

export type CustomerIntelligenceOptions = z.output<typeof optionsSchema>;
export type CustomerIntelligenceOptionsInput = z.input<typeof optionsSchema>;

export const DEFAULT_CUSTOMER_INTELLIGENCE_OPTIONS: CustomerIntelligenceOptions =
  optionsSchema.parse({});

export function resolveOptions(
  input: unknown = {}
): CustomerIntelligenceOptions {
  const parsed = optionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new CustomerIntelligenceError(
      "Invalid customer intelligence options",
      "INVALID_OPTIONS",
      { issues: parsed.error.flatten().fieldErrors }
    );
  }
  return parsed.data;
}

const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(
    (value) =>
      typeof value === "string" && value.trim() === "" ? undefined : value,
    schema.optional()
  );

const envSchema = z
  .object({
    CUSTOMER_INTELLIGENCE_CURRENCY: optionalEnv(z.string()),
    CUSTOMER_INTELLIGENCE_ACTIVE_WINDOW_DAYS: optionalEnv(
      z.coerce.number().int().positive()
    ),
    CUSTOMER_INTELLIGENCE_HIGH_VALUE_THRESHOLD: optionalEnv(
      z.coerce.number().nonnegative()
    )
  })
  .passthrough();

/**
 * Reads module overrides from `CUSTOMER_INTELLIGENCE_*` variables.
 * Unset or blank variables leave the defaults in place.
 */
export function optionsFromEnv(
  env: Record<string, string | undefined>
): CustomerIntelligenceOptionsInput {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new CustomerIntelligenceError(
      "Invalid customer intelligence environment",
      "INVALID_OPTIONS",
      { issues: parsed.error.flatten().fieldErrors }
    );
  }
  return {
    reportingCurrency: parsed.data.CUSTOMER_INTELLIGENCE_CURRENCY,
    activeWindowDays: parsed.data.CUSTOMER_INTELLIGENCE_ACTIVE_WINDOW_DAYS,
    highValueThreshold: parsed.data.CUSTOMER_INTELLIGENCE_HIGH_VALUE_THRESHOLD
  };
}
