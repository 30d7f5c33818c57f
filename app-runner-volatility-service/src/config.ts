import { z } from "zod";

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  BINANCE_BASE_URL: z
    .string()
    .trim()
    .url()
    .default("https://api.binance.com")
    .transform((v) => v.replace(/\/+$/, "")),
  CORS_ORIGINS: z
    .string()
    .default("*")
    .transform((v) =>
      v
        .split(",")
        .map((o) => o.trim())
        .filter((o) => o.length > 0)
    ),
  USER_AGENT: z.string().trim().min(1).default("volatility-service/1.0"),
});

export type ServiceConfig = Readonly<{
  port: number;
  host: string;
  binanceBaseUrl: string;
  /** "*" alone means any origin. */
  corsOrigins: readonly string[];
  userAgent: string;
}>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  // Blank variables fall back to their defaults.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const result = ConfigSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new Error(`Invalid service configuration: ${JSON.stringify(issues, null, 2)}`);
  }

  const c = result.data;
  return Object.freeze({
    port: c.PORT,
    host: c.HOST,
    binanceBaseUrl: c.BINANCE_BASE_URL,
    corsOrigins: Object.freeze(c.CORS_ORIGINS.length ? c.CORS_ORIGINS : ["*"]),
    userAgent: c.USER_AGENT,
  });
}
