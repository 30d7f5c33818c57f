import { z } from "zod";

import { ComputationError } from "./errors.js";
import type { Candle, RawKline, Series } from "./types.js";

/**
 * Numeric field as the exchange sends it: a JSON number or a decimal string.
 * Empty strings, non-numeric text and non-finite values are rejected.
 */
export const WireNumber = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite());

function parseField(row: RawKline, index: number, field: keyof Candle) {
  const parsed = WireNumber.safeParse(row[index]);
  if (!parsed.success) {
    throw new ComputationError(`Non-numeric ${field} in kline row: ${JSON.stringify(row[index]) ?? "missing"}`);
  }
  return parsed.data;
}

export function toCandle(row: RawKline): Candle {
  return Object.freeze({
    openTime: parseField(row, 0, "openTime"),
    open: parseField(row, 1, "open"),
    high: parseField(row, 2, "high"),
    low: parseField(row, 3, "low"),
    close: parseField(row, 4, "close"),
    volume: parseField(row, 5, "volume"),
    closeTime: parseField(row, 6, "closeTime"),
    quoteVolume: parseField(row, 7, "quoteVolume"),
    tradeCount: parseField(row, 8, "tradeCount"),
    takerBuyBase: parseField(row, 9, "takerBuyBase"),
    takerBuyQuote: parseField(row, 10, "takerBuyQuote"),
  });
}

/**
 * Klines to a close-price series ordered by open time. The sort is stable and
 * only the first row seen for a given open time is kept.
 */
export function normalizeKlines(rows: readonly RawKline[]): Series {
  const candles = rows.map(toCandle).sort((a, b) => a.openTime - b.openTime);

  const series: Series = [];
  let lastOpenTime: number | undefined;
  for (const c of candles) {
    if (c.openTime === lastOpenTime) continue;
    lastOpenTime = c.openTime;
    series.push({ time: new Date(c.openTime), close: c.close });
  }
  return series;
}
