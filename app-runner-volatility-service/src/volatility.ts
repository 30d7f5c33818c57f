import { ComputationError } from "./errors.js";
import type { Series, VolatilityEstimate, VolatilitySummary } from "./types.js";

// Window and scaling assume 5-minute candles whatever interval was fetched.
export const MINUTES_PER_CANDLE = 5;
export const INTERVALS_PER_HOUR = 60 / MINUTES_PER_CANDLE;
export const DEFAULT_WINDOW_SIZE = INTERVALS_PER_HOUR;

const BPS_PER_UNIT = 10_000;

export type EstimateOptions = {
  windowSize?: number;
  intervalsPerHour?: number;
};

/** `ln(close[i] / close[i - 1])`, with null at index 0. */
export function logReturns(closes: readonly number[]): (number | null)[] {
  return closes.map((close, i) => {
    if (i === 0) return null;
    const prev = closes[i - 1];
    if (!(prev > 0) || !(close > 0)) {
      throw new ComputationError(`Cannot take log return of non-positive close at index ${i}`);
    }
    return Math.log(close / prev);
  });
}

/** Sample standard deviation (n - 1); null below two values. */
export function sampleStd(values: readonly number[]): number | null {
  const n = values.length;
  if (n < 2) return null;
  const mean = values.reduce((a, b) => a + b, 0) / n;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1);
  return Math.sqrt(variance);
}

/**
 * Standard deviation of the `windowSize` returns ending at each index. Null
 * until a full window of defined returns is available. Windows need at least
 * two returns for a sample deviation.
 */
export function rollingStd(returns: readonly (number | null)[], windowSize: number): (number | null)[] {
  if (!Number.isInteger(windowSize) || windowSize < 2) {
    throw new ComputationError(`Window size must be an integer of at least 2, got ${windowSize}`);
  }

  return returns.map((_, i) => {
    if (i + 1 < windowSize) return null;
    const window: number[] = [];
    for (let j = i - windowSize + 1; j <= i; j++) {
      const r = returns[j];
      if (r === null) return null;
      window.push(r);
    }
    return sampleStd(window);
  });
}

export function estimateVolatility(series: Series, opts: EstimateOptions = {}): VolatilityEstimate {
  const windowSize = opts.windowSize ?? DEFAULT_WINDOW_SIZE;
  const intervalsPerHour = opts.intervalsPerHour ?? INTERVALS_PER_HOUR;
  const scale = Math.sqrt(intervalsPerHour) * BPS_PER_UNIT;

  const returns = logReturns(series.map((p) => p.close));
  const rollingVolBps = rollingStd(returns, windowSize).map((s) => (s === null ? null : s * scale));

  const defined = returns.filter((r): r is number => r !== null);
  const aggregate = sampleStd(defined);

  return {
    returns,
    rollingVolBps,
    aggregateVolBps: aggregate === null ? null : aggregate * scale,
  };
}

/**
 * Transport view of an estimate: undefined points become 0 and the extremes
 * are taken over that zero-filled series.
 */
export function summarizeVolatility(estimate: VolatilityEstimate): VolatilitySummary {
  const rollingVols = estimate.rollingVolBps.map((v) => v ?? 0);
  const hasPoints = rollingVols.length > 0;

  return {
    averageVol: estimate.aggregateVolBps ?? 0,
    maxVol: hasPoints ? rollingVols.reduce((a, b) => Math.max(a, b)) : 0,
    minVol: hasPoints ? rollingVols.reduce((a, b) => Math.min(a, b)) : 0,
    currentVol: hasPoints ? rollingVols[rollingVols.length - 1] : 0,
    rollingVols,
  };
}
