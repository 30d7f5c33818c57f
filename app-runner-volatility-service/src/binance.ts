import { z } from "zod";

import { DataSourceError, NotFoundError, errorMessage } from "./errors.js";
import { WireNumber } from "./normalize.js";
import type { KlineInterval, RawKline } from "./types.js";

export const KLINES_PAGE_LIMIT = 1000;
export const SYMBOL_PATTERN = /^[A-Za-z0-9]{3,20}$/;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const INTERVAL_MS: Record<KlineInterval, number> = {
  "1s": 1000,
  "1m": MINUTE_MS,
  "3m": 3 * MINUTE_MS,
  "5m": 5 * MINUTE_MS,
  "15m": 15 * MINUTE_MS,
  "30m": 30 * MINUTE_MS,
  "1h": HOUR_MS,
  "2h": 2 * HOUR_MS,
  "4h": 4 * HOUR_MS,
  "6h": 6 * HOUR_MS,
  "8h": 8 * HOUR_MS,
  "12h": 12 * HOUR_MS,
  "1d": DAY_MS,
  "3d": 3 * DAY_MS,
  "1w": 7 * DAY_MS,
  "1M": 30 * DAY_MS,
};

const WireValue = z.union([z.string(), z.number()]);

const BinanceKlineRow = z.tuple([
  WireValue, // open time
  WireValue, // open
  WireValue, // high
  WireValue, // low
  WireValue, // close
  WireValue, // volume
  WireValue, // close time
  WireValue, // quote asset volume
  WireValue, // number of trades
  WireValue, // taker buy base asset volume
  WireValue, // taker buy quote asset volume
  WireValue, // ignore
]);

const BinanceKlines = z.array(BinanceKlineRow);

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type KlineSource = {
  baseUrl?: string;
  userAgent?: string;
  /** Defaults to the global fetch. */
  fetchImpl?: FetchLike;
};

export function intervalToMs(interval: KlineInterval) {
  return INTERVAL_MS[interval];
}

export function normalizeBinanceSymbol(raw: string) {
  return raw.trim().toUpperCase();
}

function openTimeOf(row: RawKline) {
  const parsed = WireNumber.safeParse(row[0]);
  if (!parsed.success) {
    throw new DataSourceError(`Unexpected kline open time: ${JSON.stringify(row[0])}`);
  }
  return parsed.data;
}

export async function fetchKlinePage(
  opts: KlineSource & {
    symbol: string;
    interval: KlineInterval;
    startTime: number;
    endTime: number;
    limit?: number;
  }
): Promise<RawKline[]> {
  const baseUrl = (opts.baseUrl || "https://api.binance.com").replace(/\/+$/, "");
  const fetchImpl = opts.fetchImpl ?? fetch;
  const limit = Math.max(1, Math.min(KLINES_PAGE_LIMIT, Math.floor(opts.limit ?? KLINES_PAGE_LIMIT)));

  const url = new URL(baseUrl + "/api/v3/klines");
  url.searchParams.set("symbol", normalizeBinanceSymbol(opts.symbol));
  url.searchParams.set("interval", opts.interval);
  url.searchParams.set("startTime", String(opts.startTime));
  url.searchParams.set("endTime", String(opts.endTime));
  url.searchParams.set("limit", String(limit));

  let res: Response;
  try {
    res = await fetchImpl(url.toString(), {
      headers: {
        "User-Agent": opts.userAgent || "volatility-service/1.0",
      },
    });
  } catch (e) {
    throw new DataSourceError(`Binance request failed: ${errorMessage(e)}`, { cause: e });
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    const preview = body.slice(0, 200);
    throw new DataSourceError(`Binance request failed: ${res.status} ${preview}`, {
      cause: new Error(`HTTP ${res.status}: ${preview}`),
      upstreamStatus: res.status,
    });
  }

  let json: unknown;
  try {
    json = await res.json();
  } catch (e) {
    throw new DataSourceError(`Binance returned invalid JSON: ${errorMessage(e)}`, { cause: e });
  }

  const rows = BinanceKlines.safeParse(json);
  if (!rows.success) {
    const issue = rows.error.issues[0];
    const where = issue && issue.path.length ? ` at [${issue.path.join(",")}]` : "";
    throw new DataSourceError(`Unexpected klines payload${where}: ${issue?.message ?? "invalid"}`, {
      cause: rows.error,
    });
  }
  return rows.data;
}

/**
 * Pulls every kline in `[now - lookbackHours, now]`, one page at a time.
 * Each page starts one interval after the previous page's last open time, so
 * pages do not overlap while the exchange keeps its usual alignment.
 */
export async function fetchKlineRange(
  opts: KlineSource & {
    symbol: string;
    interval: KlineInterval;
    lookbackHours: number;
    now?: number;
  }
): Promise<RawKline[]> {
  const symbol = normalizeBinanceSymbol(opts.symbol);
  const intervalMs = intervalToMs(opts.interval);
  const endMs = opts.now ?? Date.now();
  const startMs = endMs - opts.lookbackHours * HOUR_MS;

  const all: RawKline[] = [];
  let cursor = startMs;
  let pages = 0;

  while (cursor < endMs) {
    const page = await fetchKlinePage({
      baseUrl: opts.baseUrl,
      userAgent: opts.userAgent,
      fetchImpl: opts.fetchImpl,
      symbol,
      interval: opts.interval,
      startTime: cursor,
      endTime: endMs,
      limit: KLINES_PAGE_LIMIT,
    });
    pages += 1;
    if (page.length === 0) break;

    for (const row of page) all.push(row);
    cursor = openTimeOf(page[page.length - 1]) + intervalMs;

    // A short page means the exchange has nothing further in range.
    if (page.length < KLINES_PAGE_LIMIT) break;
  }

  console.log(`[volatility] fetched ${symbol} ${opts.interval}: ${all.length} candles in ${pages} page(s)`);

  if (all.length === 0) throw new NotFoundError(opts.symbol);
  return all;
}
