import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { KLINES_PAGE_LIMIT, fetchKlinePage, fetchKlineRange, intervalToMs, normalizeBinanceSymbol } from "../binance.js";
import type { FetchLike } from "../binance.js";
import { DataSourceError, NotFoundError } from "../errors.js";
import type { RawKline } from "../types.js";
import { FIVE_MINUTES, createFakeBinance, jsonResponse, klineRow } from "./fakeBinance.js";

// Not aligned to a 5-minute boundary (remainder 200_000 ms).
const NOW = 1_700_000_000_000;
const HOUR = 3_600_000;

describe("binance klines", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("intervalToMs", () => {
    it("maps minute, hour, day and month intervals", () => {
      expect(intervalToMs("5m")).toBe(300_000);
      expect(intervalToMs("1h")).toBe(3_600_000);
      expect(intervalToMs("1d")).toBe(86_400_000);
      expect(intervalToMs("1M")).toBe(30 * 86_400_000);
    });
  });

  describe("normalizeBinanceSymbol", () => {
    it("trims and upper-cases", () => {
      expect(normalizeBinanceSymbol("  btcusdt ")).toBe("BTCUSDT");
    });
  });

  describe("fetchKlinePage", () => {
    it("builds the klines query and sends a User-Agent", async () => {
      const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse([klineRow(0, "1")]));

      const rows = await fetchKlinePage({
        baseUrl: "https://example.test/",
        userAgent: "test-agent",
        fetchImpl,
        symbol: "ethusdt",
        interval: "1m",
        startTime: 10,
        endTime: 20,
        limit: 5000,
      });

      expect(rows).toHaveLength(1);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      const [input, init] = fetchImpl.mock.calls[0];
      expect(input).toBe(
        "https://example.test/api/v3/klines?symbol=ETHUSDT&interval=1m&startTime=10&endTime=20&limit=1000"
      );
      expect(init?.headers).toEqual({ "User-Agent": "test-agent" });
    });

    it("accepts numeric and string fields in the same row", async () => {
      const row: RawKline = [1, 2, "3", 4, "5", 6, 7, "8", 9, "10", 11, "0"];
      const fetchImpl: FetchLike = async () => jsonResponse([row]);

      const rows = await fetchKlinePage({ fetchImpl, symbol: "BTCUSDT", interval: "5m", startTime: 0, endTime: 1 });

      expect(rows).toEqual([row]);
    });

    it("wraps HTTP failures with the status and body", async () => {
      const fetchImpl: FetchLike = async () => new Response('{"code":-1121,"msg":"Invalid symbol."}', { status: 400 });

      const err = await fetchKlinePage({ fetchImpl, symbol: "NOPE", interval: "5m", startTime: 0, endTime: 1 }).catch(
        (e: unknown) => e
      );

      expect(err).toBeInstanceOf(DataSourceError);
      expect(err).toMatchObject({
        message: 'Binance request failed: 400 {"code":-1121,"msg":"Invalid symbol."}',
        upstreamStatus: 400,
        status: 500,
      });
      const cause = err instanceof DataSourceError ? err.cause : undefined;
      expect(cause).toBeInstanceOf(Error);
      expect(cause).toMatchObject({ message: 'HTTP 400: {"code":-1121,"msg":"Invalid symbol."}' });
    });

    it("wraps transport failures and keeps the cause", async () => {
      const cause = new TypeError("fetch failed");
      const fetchImpl: FetchLike = async () => {
        throw cause;
      };

      const err = await fetchKlinePage({ fetchImpl, symbol: "BTCUSDT", interval: "5m", startTime: 0, endTime: 1 }).catch(
        (e: unknown) => e
      );

      expect(err).toBeInstanceOf(DataSourceError);
      expect(err).toMatchObject({ message: "Binance request failed: fetch failed", cause });
    });

    it("rejects a body that is not JSON", async () => {
      const fetchImpl: FetchLike = async () => new Response("<html>busy</html>", { status: 200 });

      await expect(
        fetchKlinePage({ fetchImpl, symbol: "BTCUSDT", interval: "5m", startTime: 0, endTime: 1 })
      ).rejects.toThrow(/^Binance returned invalid JSON: /);
    });

    it("rejects a payload that is not an array of klines", async () => {
      const fetchImpl: FetchLike = async () => jsonResponse({ code: 0, msg: "ok" });

      await expect(
        fetchKlinePage({ fetchImpl, symbol: "BTCUSDT", interval: "5m", startTime: 0, endTime: 1 })
      ).rejects.toBeInstanceOf(DataSourceError);
    });

    it("rejects rows of the wrong length", async () => {
      const fetchImpl: FetchLike = async () => jsonResponse([[1, "2", "3"]]);

      await expect(
        fetchKlinePage({ fetchImpl, symbol: "BTCUSDT", interval: "5m", startTime: 0, endTime: 1 })
      ).rejects.toThrow(/^Unexpected klines payload at \[0\]/);
    });
  });

  describe("fetchKlineRange", () => {
    it("covers 48 hours of 5m candles with a single page", async () => {
      const fake = createFakeBinance();

      const rows = await fetchKlineRange({
        fetchImpl: fake.fetchImpl,
        symbol: "BTCUSDT",
        interval: "5m",
        lookbackHours: 48,
        now: NOW,
      });

      expect(rows).toHaveLength(576);
      expect(fake.calls).toHaveLength(1);
      expect(fake.calls[0].searchParams.get("startTime")).toBe(String(NOW - 48 * HOUR));
      expect(fake.calls[0].searchParams.get("endTime")).toBe(String(NOW));
      expect(fake.calls[0].searchParams.get("limit")).toBe(String(KLINES_PAGE_LIMIT));
    });

    it("upper-cases the symbol before querying", async () => {
      const fake = createFakeBinance();

      await fetchKlineRange({ fetchImpl: fake.fetchImpl, symbol: "btcusdt", interval: "5m", lookbackHours: 1, now: NOW });

      expect(fake.calls[0].searchParams.get("symbol")).toBe("BTCUSDT");
    });

    it("advances each page one interval past the last open time", async () => {
      const fake = createFakeBinance();
      const start = NOW - 100 * HOUR;
      const firstOpen = start + 100_000;

      const rows = await fetchKlineRange({
        fetchImpl: fake.fetchImpl,
        symbol: "BTCUSDT",
        interval: "5m",
        lookbackHours: 100,
        now: NOW,
      });

      expect(fake.calls).toHaveLength(2);
      expect(fake.calls[1].searchParams.get("startTime")).toBe(String(firstOpen + 1000 * FIVE_MINUTES));
      expect(rows).toHaveLength(1200);
      const openTimes = rows.map((r) => r[0]);
      expect(new Set(openTimes).size).toBe(1200);
      expect(openTimes[0]).toBe(firstOpen);
      expect(openTimes[1199]).toBe(NOW - 200_000);
    });

    it("stops after a full page that reaches the end of the range", async () => {
      // 1000h of 1h candles; NOW is not on an hour boundary, so exactly 1000 open times fit.
      const fake = createFakeBinance({ intervalMs: HOUR });

      const rows = await fetchKlineRange({
        fetchImpl: fake.fetchImpl,
        symbol: "BTCUSDT",
        interval: "1h",
        lookbackHours: 1000,
        now: NOW,
      });

      expect(fake.calls).toHaveLength(1);
      expect(rows).toHaveLength(KLINES_PAGE_LIMIT);
      expect(rows[KLINES_PAGE_LIMIT - 1][0]).toBe(Math.floor(NOW / HOUR) * HOUR);
    });

    it("stops on an empty page", async () => {
      const start = NOW - 200 * HOUR;
      const full = Array.from({ length: KLINES_PAGE_LIMIT }, (_, i) => klineRow(start + 100_000 + i * FIVE_MINUTES, 100));
      const fetchImpl = vi
        .fn<FetchLike>()
        .mockResolvedValueOnce(jsonResponse(full))
        .mockResolvedValueOnce(jsonResponse([]));

      const rows = await fetchKlineRange({ fetchImpl, symbol: "BTCUSDT", interval: "5m", lookbackHours: 200, now: NOW });

      expect(fetchImpl).toHaveBeenCalledTimes(2);
      expect(rows).toHaveLength(KLINES_PAGE_LIMIT);
    });

    it("throws NotFoundError when the range holds no candles", async () => {
      const fetchImpl: FetchLike = async () => jsonResponse([]);

      const err = await fetchKlineRange({ fetchImpl, symbol: "dogeusdt", interval: "5m", lookbackHours: 24, now: NOW }).catch(
        (e: unknown) => e
      );

      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).toMatchObject({ message: "No data found for dogeusdt", status: 404 });
    });

    it("aborts the whole range when a later page fails", async () => {
      const start = NOW - 200 * HOUR;
      const full = Array.from({ length: KLINES_PAGE_LIMIT }, (_, i) => klineRow(start + 100_000 + i * FIVE_MINUTES, 100));
      const fetchImpl = vi
        .fn<FetchLike>()
        .mockResolvedValueOnce(jsonResponse(full))
        .mockResolvedValueOnce(new Response("Service Unavailable", { status: 503 }));

      await expect(
        fetchKlineRange({ fetchImpl, symbol: "BTCUSDT", interval: "5m", lookbackHours: 200, now: NOW })
      ).rejects.toThrow("Binance request failed: 503 Service Unavailable");
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });
  });
});
