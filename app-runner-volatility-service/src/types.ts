export const KLINE_INTERVALS = [
  "1s",
  "1m",
  "3m",
  "5m",
  "15m",
  "30m",
  "1h",
  "2h",
  "4h",
  "6h",
  "8h",
  "12h",
  "1d",
  "3d",
  "1w",
  "1M",
] as const;

export const MAX_LOOKBACK_HOURS = 24 * 365;

export type KlineInterval = (typeof KLINE_INTERVALS)[number];

// Wire row as sent by /api/v3/klines; fields arrive as strings or numbers.
export type RawKline = ReadonlyArray<string | number>;

export type Candle = {
  readonly openTime: number; // ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number; // base asset volume
  readonly closeTime: number; // ms
  readonly quoteVolume: number;
  readonly tradeCount: number;
  readonly takerBuyBase: number;
  readonly takerBuyQuote: number;
};

export type SeriesPoint = {
  time: Date;
  close: number;
};

export type Series = SeriesPoint[];

export type VolatilityEstimate = {
  /** Log returns aligned with the series; index 0 is always null. */
  returns: (number | null)[];
  rollingVolBps: (number | null)[];
  aggregateVolBps: number | null;
};

export type VolatilitySummary = {
  averageVol: number;
  maxVol: number;
  minVol: number;
  currentVol: number;
  rollingVols: number[];
};

export type VolatilityResponse = {
  symbol: string;
  average_vol: number;
  max_vol: number;
  min_vol: number;
  current_vol: number;
  timestamps: string[];
  rolling_vols: number[];
  prices: number[];
};
