import { fetchKlineRange } from "./binance.js";
import type { KlineSource } from "./binance.js";
import { ComputationError, errorMessage } from "./errors.js";
import { normalizeKlines } from "./normalize.js";
import type { KlineInterval, VolatilityResponse } from "./types.js";
import { DEFAULT_WINDOW_SIZE, INTERVALS_PER_HOUR, estimateVolatility, summarizeVolatility } from "./volatility.js";

export type VolatilityRequest = {
  /** Echoed back unchanged; upper-cased only for the exchange. */
  symbol: string;
  lookbackHours: number;
  interval: KlineInterval;
};

export type PipelineDeps = KlineSource & {
  now?: number;
};

/**
 * Fetch, normalize and estimate for one request. Fetch failures surface as
 * they are; anything thrown afterwards becomes a ComputationError.
 */
export async function computeVolatility(req: VolatilityRequest, deps: PipelineDeps = {}): Promise<VolatilityResponse> {
  const rows = await fetchKlineRange({
    ...deps,
    symbol: req.symbol,
    interval: req.interval,
    lookbackHours: req.lookbackHours,
  });

  try {
    const series = normalizeKlines(rows);
    const estimate = estimateVolatility(series, {
      windowSize: DEFAULT_WINDOW_SIZE,
      intervalsPerHour: INTERVALS_PER_HOUR,
    });
    const summary = summarizeVolatility(estimate);

    return {
      symbol: req.symbol,
      average_vol: summary.averageVol,
      max_vol: summary.maxVol,
      min_vol: summary.minVol,
      current_vol: summary.currentVol,
      timestamps: series.map((p) => p.time.toISOString()),
      rolling_vols: summary.rollingVols,
      prices: series.map((p) => p.close),
    };
  } catch (err) {
    if (err instanceof ComputationError) throw err;
    throw new ComputationError(errorMessage(err), { cause: err });
  }
}
