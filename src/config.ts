import { z } from "zod";
import { logger } from "./logger.js";

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),

  BOOK_SYMBOL: z.string().min(1).default("BTC-USDT"),

  FEED_ENABLED: booleanString.default("true"),
  FEED_URL: z.string().url().default("wss://ws.okx.com:8443/ws/v5/public"),
  FEED_CHANNEL: z.enum(["books", "books-l2-tbt", "books50-l2-tbt"]).default("books"),
  FEED_INST_ID: z.string().min(1).optional(),
  FEED_RECONNECT_DELAY_MS: z.coerce.number().int().min(0).default(3000),
  FEED_PING_INTERVAL_MS: z.coerce.number().int().min(0).default(25_000),
  FEED_MAX_SEQUENCE_FAULTS: z.coerce.number().int().min(1).default(3),

  DEPTH_LEVELS: z.coerce.number().int().min(1).max(100).default(5),
  DEPTH_DISPLAY_INTERVAL_MS: z.coerce.number().int().min(0).default(0),
});

export type Env = z.infer<typeof envSchema>;

export interface Config extends Env {
  /** Instrument subscribed on the feed; defaults to the book symbol. */
  feedInstId: string;
}

export class ConfigError extends Error {
  readonly fieldErrors: Record<string, string[] | undefined>;

  constructor(fieldErrors: Record<string, string[] | undefined>) {
    const fields = Object.keys(fieldErrors).join(", ");
    super(`Invalid environment variables: ${fields}`);
    this.name = "ConfigError";
    this.fieldErrors = fieldErrors;
  }
}

export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.flatten().fieldErrors);
  }
  return { ...result.data, feedInstId: result.data.FEED_INST_ID ?? result.data.BOOK_SYMBOL };
}

export function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ fieldErrors: err.fieldErrors }, err.message);
      process.exit(1);
    }
    throw err;
  }
}
