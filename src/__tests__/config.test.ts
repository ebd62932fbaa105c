import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const clearEnv = () => {
  const keys = [
    "REST_PORT",
    "REST_API_KEY",
    "YAHOO_TIMEOUT_MS",
    "EXCHANGE_SUFFIX",
    "EXCHANGE_TIMEZONE",
    "EXPORT_FILENAME",
    "DEFAULT_CODES",
    "SCREEN_LOOKBACK_DAYS",
    "SCREEN_MIN_SPIKE_RATIO",
    "SCREEN_TOP_N",
  ];
  for (const key of keys) {
    delete process.env[key];
  }
};

const loadConfig = async () => {
  const module = await import("../config.js");
  return module.config;
};

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  afterEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  it("uses Tokyo defaults when nothing is set", async () => {
    const cfg = await loadConfig();
    expect(cfg.rest.port).toBe(3000);
    expect(cfg.rest.apiKey).toBe("");
    expect(cfg.yahoo.timeoutMs).toBe(8000);
    expect(cfg.screen.exchangeSuffix).toBe(".T");
    expect(cfg.screen.timeZone).toBe("Asia/Tokyo");
    expect(cfg.screen.exportFilename).toBe("tse_volume_initial_move.csv");
  });

  it("has screen defaults matching the parameter form", async () => {
    const cfg = await loadConfig();
    expect(cfg.screen.defaults).toEqual({
      lookbackDays: 160,
      recentDays: 5,
      baseDays: 20,
      minRecentRatio: 1.5,
      spikeDays: 20,
      minSpikeRatio: 3,
      maxDayChangePct: 5,
      minBaseAvgVolume: 100_000,
      topN: 50,
    });
  });

  it("reads REST_API_KEY into rest.apiKey", async () => {
    vi.stubEnv("REST_API_KEY", "test-secret");
    const cfg = await loadConfig();
    expect(cfg.rest.apiKey).toBe("test-secret");
  });

  it("parses numeric overrides", async () => {
    vi.stubEnv("REST_PORT", "8080");
    vi.stubEnv("SCREEN_LOOKBACK_DAYS", "220");
    vi.stubEnv("SCREEN_MIN_SPIKE_RATIO", "2.5");
    const cfg = await loadConfig();
    expect(cfg.rest.port).toBe(8080);
    expect(cfg.screen.defaults.lookbackDays).toBe(220);
    expect(cfg.screen.defaults.minSpikeRatio).toBe(2.5);
  });

  it("lets another exchange be configured", async () => {
    vi.stubEnv("EXCHANGE_SUFFIX", ".HK");
    vi.stubEnv("EXCHANGE_TIMEZONE", "Asia/Hong_Kong");
    const cfg = await loadConfig();
    expect(cfg.screen.exchangeSuffix).toBe(".HK");
    expect(cfg.screen.timeZone).toBe("Asia/Hong_Kong");
  });

  it("yields NaN for a non-numeric value, left for the validator to report", async () => {
    vi.stubEnv("SCREEN_TOP_N", "many");
    const cfg = await loadConfig();
    expect(cfg.screen.defaults.topN).toBeNaN();
  });
});
