import { enabledLogLevels, loadPipelineConfig } from "./pipeline.config";

describe("loadPipelineConfig", () => {
  it("applies defaults", () => {
    expect(loadPipelineConfig({})).toEqual({
      env: "development",
      logLevel: "log",
      historyTimeoutMs: 5000,
      trendWindowDays: 30,
      encryptionKey: null,
    });
  });

  it("coerces numeric settings and decodes the key", () => {
    const config = loadPipelineConfig({
      HISTORY_TIMEOUT_MS: "250",
      TREND_WINDOW_DAYS: "14",
      DATA_ENCRYPTION_KEY: "ab".repeat(32),
    });

    expect(config.historyTimeoutMs).toBe(250);
    expect(config.trendWindowDays).toBe(14);
    expect(config.encryptionKey?.length).toBe(32);
  });

  it("requires a key in production", () => {
    expect(() => loadPipelineConfig({ NODE_ENV: "production" })).toThrow(
      "Invalid pipeline configuration: DATA_ENCRYPTION_KEY: Required in production",
    );
  });

  it("rejects a malformed key", () => {
    expect(() => loadPipelineConfig({ DATA_ENCRYPTION_KEY: "test-secret" })).toThrow(
      "DATA_ENCRYPTION_KEY: Expected 32 bytes as 64 hex characters",
    );
  });

  it("rejects an out-of-range window", () => {
    expect(() => loadPipelineConfig({ TREND_WINDOW_DAYS: "3" })).toThrow(/TREND_WINDOW_DAYS/);
  });
});

describe("enabledLogLevels", () => {
  it("enables the configured level and everything more severe", () => {
    expect(enabledLogLevels("warn")).toEqual(["error", "warn"]);
    expect(enabledLogLevels("verbose")).toEqual(["error", "warn", "log", "debug", "verbose"]);
  });
});
