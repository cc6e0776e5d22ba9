import { describe, expect, it } from "vitest";
import { loadConfig, requireRedditCredentials } from "../src/config.js";

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig({});

    expect(config.DATASET_STORE).toBe("csv");
    expect(config.SCRAPE_RATE_LIMIT_MS).toBe(1000);
    expect(config.SCRAPE_MAX_RETRY_ATTEMPTS).toBe(5);
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.REDDIT_CLIENT_ID).toBeUndefined();
  });

  it("parses numeric settings", () => {
    const config = loadConfig({ SCRAPE_RATE_LIMIT_MS: "250", DATASET_STORE: "postgres" });

    expect(config.SCRAPE_RATE_LIMIT_MS).toBe(250);
    expect(config.DATASET_STORE).toBe("postgres");
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ SCRAPE_MAX_RETRY_ATTEMPTS: "0" })).toThrow();
    expect(() => loadConfig({ SCRAPE_RATE_LIMIT_MS: "soon" })).toThrow();
    expect(() => loadConfig({ DATASET_STORE: "s3" })).toThrow();
  });
});

describe("requireRedditCredentials", () => {
  it("returns the app credentials", () => {
    const config = loadConfig({
      REDDIT_CLIENT_ID: "test-client",
      REDDIT_CLIENT_SECRET: "test-secret",
      REDDIT_USERNAME: "  ",
    });

    expect(requireRedditCredentials(config)).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      username: undefined,
      password: undefined,
    });
  });

  it("fails without a client secret", () => {
    const config = loadConfig({ REDDIT_CLIENT_ID: "test-client" });
    expect(() => requireRedditCredentials(config)).toThrow(
      "Reddit API credentials not configured",
    );
  });
});
