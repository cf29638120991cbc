import { describe, it, expect } from "vitest";
import { ConfigError, parseConfig } from "../src/config.js";

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig({});
    expect(config).toMatchObject({
      PORT: 4000,
      BOOK_SYMBOL: "BTC-USDT",
      FEED_ENABLED: true,
      FEED_CHANNEL: "books",
      FEED_MAX_SEQUENCE_FAULTS: 3,
      DEPTH_LEVELS: 5,
      DEPTH_DISPLAY_INTERVAL_MS: 0,
      feedInstId: "BTC-USDT",
    });
  });

  it("coerces numbers and booleans from strings", () => {
    const config = parseConfig({
      PORT: "8080",
      FEED_ENABLED: "false",
      BOOK_SYMBOL: "ETH-USDT",
      FEED_INST_ID: "ETH-USDT-SWAP",
      DEPTH_LEVELS: "10",
    });
    expect(config.PORT).toBe(8080);
    expect(config.FEED_ENABLED).toBe(false);
    expect(config.DEPTH_LEVELS).toBe(10);
    expect(config.feedInstId).toBe("ETH-USDT-SWAP");
  });

  it("throws ConfigError naming the bad fields", () => {
    let error: unknown = null;
    try {
      parseConfig({ PORT: "not-a-port", FEED_CHANNEL: "trades" });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(Object.keys(error.fieldErrors).sort()).toEqual(["FEED_CHANNEL", "PORT"]);
  });
});
