/**
 * Failures the volatility pipeline can surface. Each carries the HTTP status
 * the route answers with.
 */
export class VolatilityServiceError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "VolatilityServiceError";
  }
}

/** Outbound request to the exchange failed, or its payload was unusable. */
export class DataSourceError extends VolatilityServiceError {
  /** Status the exchange answered with, when it answered at all. */
  public readonly upstreamStatus?: number;

  constructor(message: string, options?: { cause?: unknown; upstreamStatus?: number }) {
    super(500, message, options);
    this.name = "DataSourceError";
    this.upstreamStatus = options?.upstreamStatus;
  }
}

export class NotFoundError extends VolatilityServiceError {
  constructor(public readonly symbol: string) {
    super(404, `No data found for ${symbol}`);
    this.name = "NotFoundError";
  }
}

export class ComputationError extends VolatilityServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message, options);
    this.name = "ComputationError";
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
