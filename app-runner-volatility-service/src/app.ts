import cors from "cors";
import express from "express";
import swaggerUi from "swagger-ui-express";
import { z } from "zod";

import { SYMBOL_PATTERN } from "./binance.js";
import type { FetchLike } from "./binance.js";
import type { ServiceConfig } from "./config.js";
import { VolatilityServiceError, errorMessage } from "./errors.js";
import { swaggerDoc } from "./openapi.js";
import { computeVolatility } from "./pipeline.js";
import { KLINE_INTERVALS, MAX_LOOKBACK_HOURS } from "./types.js";

const ParamsSchema = z.object({
  symbol: z.string().regex(SYMBOL_PATTERN, "Symbol must be 3-20 letters or digits"),
});

const QuerySchema = z.object({
  lookback_hours: z.coerce.number().int().min(1).max(MAX_LOOKBACK_HOURS).default(24),
  interval: z.enum(KLINE_INTERVALS).default("5m"),
});

export type AppDeps = {
  /** Outbound fetch used for the exchange; defaults to the global fetch. */
  fetchImpl?: FetchLike;
};

function asyncHandler(
  fn: (req: express.Request, res: express.Response, next: express.NextFunction) => Promise<unknown>
) {
  return (req: express.Request, res: express.Response, next: express.NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function createApp(config: ServiceConfig, deps: AppDeps = {}) {
  const app = express();
  app.use(cors({ origin: config.corsOrigins.includes("*") ? "*" : [...config.corsOrigins] }));

  app.get("/", (_req, res) => {
    res.json({ message: "Crypto Volatility API. Use /volatility/{symbol} to get volatility metrics." });
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "volatility", ts: new Date().toISOString() });
  });

  app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDoc));
  app.get("/openapi.json", (_req, res) => res.json(swaggerDoc));

  /**
   * Rolling volatility for one symbol over the lookback window.
   * Every request pulls fresh klines; nothing is cached between requests.
   */
  app.get(
    "/volatility/:symbol",
    asyncHandler(async (req, res) => {
      const params = ParamsSchema.safeParse(req.params);
      const query = QuerySchema.safeParse(req.query);
      if (!params.success || !query.success) {
        const issues = [
          ...(params.success ? [] : params.error.issues),
          ...(query.success ? [] : query.error.issues),
        ];
        return res.status(400).json({ error: "Invalid request", issues });
      }

      const body = await computeVolatility(
        {
          symbol: params.data.symbol,
          lookbackHours: query.data.lookback_hours,
          interval: query.data.interval,
        },
        {
          baseUrl: config.binanceBaseUrl,
          userAgent: config.userAgent,
          fetchImpl: deps.fetchImpl,
        }
      );
      return res.json(body);
    })
  );

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = errorMessage(err);
    console.error("[volatility] request failed:", message);
    if (err instanceof VolatilityServiceError) {
      return res.status(err.status).json({ error: err.name, message: message.slice(0, 500) });
    }
    return res.status(500).json({ error: "Internal error", message: message.slice(0, 500) });
  });

  return app;
}
