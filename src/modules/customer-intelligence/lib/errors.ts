export type CustomerIntelligenceErrorCode =
  | "REPOSITORY_UNAVAILABLE"
  | "INVALID_OPTIONS";

export class CustomerIntelligenceError extends Error {
  constructor(
    message: string,
    public readonly code: CustomerIntelligenceErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CustomerIntelligenceError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
