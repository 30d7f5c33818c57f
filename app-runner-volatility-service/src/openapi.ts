import { KLINE_INTERVALS, MAX_LOOKBACK_HOURS } from "./types.js";

const errorBody = {
  type: "object",
  properties: {
    error: { type: "string" },
    message: { type: "string" },
  },
};

export const swaggerDoc = {
  openapi: "3.0.1",
  info: {
    title: "Crypto Volatility Service",
    version: "1.0.0",
    description: "Rolling hourly-equivalent volatility, in basis points, from Binance klines.",
  },
  servers: [{ url: "/" }],
  paths: {
    "/health": {
      get: {
        summary: "Health check",
        responses: { 200: { description: "OK" } },
      },
    },
    "/volatility/{symbol}": {
      get: {
        summary: "Get rolling volatility for a trading pair",
        parameters: [
          { name: "symbol", in: "path", required: true, schema: { type: "string", example: "BTCUSDT" } },
          {
            name: "lookback_hours",
            in: "query",
            schema: { type: "integer", minimum: 1, maximum: MAX_LOOKBACK_HOURS, default: 24 },
          },
          {
            name: "interval",
            in: "query",
            schema: { type: "string", enum: [...KLINE_INTERVALS], default: "5m" },
          },
        ],
        responses: {
          200: {
            description: "Volatility series",
            content: {
              "application/json": {
                schema: {
                  type: "object",
                  properties: {
                    symbol: { type: "string" },
                    average_vol: { type: "number" },
                    max_vol: { type: "number" },
                    min_vol: { type: "number" },
                    current_vol: { type: "number" },
                    timestamps: { type: "array", items: { type: "string", format: "date-time" } },
                    rolling_vols: { type: "array", items: { type: "number" } },
                    prices: { type: "array", items: { type: "number" } },
                  },
                },
              },
            },
          },
          400: { description: "Invalid request" },
          404: { description: "No data for symbol", content: { "application/json": { schema: errorBody } } },
          500: { description: "Upstream or computation failure", content: { "application/json": { schema: errorBody } } },
        },
      },
    },
  },
};
