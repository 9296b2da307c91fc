import { z } from "zod";

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    if (typeof v === "boolean") return v;
    const s = String(v).trim().toLowerCase();
    if (["true", "1", "yes", "y", "on"].includes(s)) return true;
    if (["false", "0", "no", "n", "off"].includes(s)) return false;
    return v;
  }, z.boolean());

const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s.split(",").map((x) => x.trim()).filter(Boolean);
  }, z.array(z.string()));

const optionalTrimmed = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().trim().optional(),
);

const envObject = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    APP_NAME: z.string().trim().default("perp-market-stream"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),

    PORT: toInt(3001).pipe(z.number().int().min(1).max(65535)),

    MARKET_STREAM_ENABLED: toBool(true).default(true),
    MARKET_STREAM_TRADING_PAIRS: csv(["BTC-USDT", "ETH-USDT"]).default(["BTC-USDT", "ETH-USDT"]),

    OKX_PERPETUAL_DOMAIN: z.enum(["okx_perpetual", "okx_perpetual_aws"]).default("okx_perpetual"),
    OKX_PERPETUAL_REST_URL: optionalTrimmed,
    OKX_PERPETUAL_WS_URL: optionalTrimmed,
    OKX_API_KEY: optionalTrimmed,
    OKX_SECRET_KEY: optionalTrimmed,
    OKX_PASSPHRASE: optionalTrimmed,

    MARKET_DATA_REST_TIMEOUT_MS: toInt(10_000).pipe(z.number().int().min(1000).max(120_000)),
    MARKET_STREAM_CONNECT_TIMEOUT_MS: toInt(10_000).pipe(z.number().int().min(1000).max(120_000)),
    MARKET_STREAM_MESSAGE_TIMEOUT_SECONDS: toInt(25).pipe(z.number().int().min(1).max(300)),
    MARKET_STREAM_RECONNECT_DELAY_SECONDS: toInt(5).pipe(z.number().int().min(0).max(600)),
    MARKET_STREAM_SUBSCRIBE_PACING_MS: toInt(400).pipe(z.number().int().min(0).max(10_000)),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  const credentials = [env.OKX_API_KEY, env.OKX_SECRET_KEY, env.OKX_PASSPHRASE];
  const provided = credentials.filter((value) => value !== undefined).length;
  if (provided > 0 && provided < credentials.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["OKX_API_KEY"],
      message: "OKX_API_KEY, OKX_SECRET_KEY and OKX_PASSPHRASE must be set together",
    });
  }

  if (env.MARKET_STREAM_ENABLED && env.MARKET_STREAM_TRADING_PAIRS.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["MARKET_STREAM_TRADING_PAIRS"],
      message: "MARKET_STREAM_TRADING_PAIRS must list at least one pair when the stream is enabled",
    });
  }
});

export const EnvSchema = envSchemaWithRefinements;
export type Env = z.infer<typeof envSchemaWithRefinements>;
