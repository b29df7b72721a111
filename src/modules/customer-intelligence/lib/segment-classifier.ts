import {
  DEFAULT_SEGMENTS,
  type SegmentCondition,
  type SegmentDefinition,
  type SegmentName
} from "../config";
import type { QuintileScores, SegmentMatch } from "./types";

const LOST_SEGMENT: SegmentDefinition = {
  name: "Lost",
  priority: 999,
  color: "#6b7280",
  description: "Lowest recency, frequency, and monetary scores.",
  action: "Revive with aggressive win-back campaign or accept and focus elsewhere.",
  fallback: true
};

function getScore(
  scores: QuintileScores,
  field: SegmentCondition["field"]
): number {
  switch (field) {
    case "r_score":
      return scores.rScore;
    case "f_score":
      return scores.fScore;
    case "m_score":
      return scores.mScore;
  }
}

export function evaluateCondition(
  condition: SegmentCondition,
  scores: QuintileScores
): boolean {
  const value = getScore(scores, condition.field);
  const target = condition.value;

  if (Array.isArray(target)) {
    return (
      condition.operator === "between" &&
      value >= target[0] &&
      value <= target[1]
    );
  }

  switch (condition.operator) {
    case "eq":
      return value === target;
    case "gte":
      return value >= target;
    case "lte":
      return value <= target;
    default:
      return false;
  }
}

function matchesSegment(
  definition: SegmentDefinition,
  scores: QuintileScores
): boolean {
  if (definition.fallback) {
    return false;
  }

  const all =
    definition.all?.every((condition) =>
      evaluateCondition(condition, scores)
    ) ?? true;

  if (!all) {
    return false;
  }

  const none =
    definition.none?.some((condition) =>
      evaluateCondition(condition, scores)
    ) ?? false;

  return !none;
}

/**
 * First matching definition wins; `definitions` must already be in priority
 * order. A fallback entry only applies once every other rule has failed.
 */
export function classifySegment(
  scores: QuintileScores,
  definitions: SegmentDefinition[] = DEFAULT_SEGMENTS
): SegmentMatch {
  let fallback: SegmentDefinition | undefined;

  for (const definition of definitions) {
    if (definition.fallback) {
      fallback = definition;
      continue;
    }

    if (matchesSegment(definition, scores)) {
      return { name: definition.name, definition };
    }
  }

  const resolved = fallback ?? LOST_SEGMENT;
  return { name: resolved.name, definition: resolved };
}

export function findSegmentDefinition(
  name: SegmentName,
  definitions: SegmentDefinition[]
): SegmentDefinition {
  return (
    definitions.find((definition) => definition.name === name) ??
    DEFAULT_SEGMENTS.find((definition) => definition.name === name) ??
    LOST_SEGMENT
  );
}
