export const toOptionalNumber = (value: unknown): number | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed !== "") {
      const parsed = Number(trimmed);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
  }
  return undefined;
};

export const toNumber = (value: unknown): number => toOptionalNumber(value) ?? 0;

export const roundTo = (value: number, digits = 0): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/** `numerator / denominator`, or 0 when the denominator is not positive. */
export const safeRatio = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;

export const percentOf = (part: number, whole: number, digits = 1): number =>
  roundTo(safeRatio(part, whole) * 100, digits);

export const average = (values: number[]): number =>
  safeRatio(
    values.reduce((sum, value) => sum + value, 0),
    values.length
  );

export const sum = (values: number[]): number =>
  values.reduce((total, value) => total + value, 0);
