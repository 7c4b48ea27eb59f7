import { describe, expect, it } from "vitest";

import { SettingsError, loadSettings } from "../../../src/shared/config/settings.js";

describe("loadSettings", () => {
  it("applies defaults for an empty environment", () => {
    const settings = loadSettings({});
    expect(settings).toEqual({
      calculatorUrl: "https://calculator.aws/#/",
      browser: { headless: false, executablePath: undefined, channel: undefined },
      runTimeoutMs: 600_000,
      retry: { locateRetries: 2, applyRetries: 1, baseDelayMs: 500 },
      schemasPath: undefined,
      openai: { apiKey: undefined, baseUrl: undefined, model: "gpt-4o-mini", concurrency: 3 },
      service: { host: "127.0.0.1", port: 3000, basePath: "/api/v1", maxConcurrentRuns: 1 }
    });
  });

  it("parses flags, numbers and trims optional text", () => {
    const settings = loadSettings({
      BROWSER_HEADLESS: "Yes",
      LOCATE_RETRIES: "4",
      OPENAI_API_KEY: "  test-secret  ",
      BROWSER_CHANNEL: "   ",
      ESTIMATE_SERVICE_BASE_PATH: "/estimates/",
      ESTIMATE_MAX_CONCURRENT_RUNS: "2"
    });
    expect(settings.browser.headless).toBe(true);
    expect(settings.browser.channel).toBeUndefined();
    expect(settings.retry.locateRetries).toBe(4);
    expect(settings.openai.apiKey).toBe("test-secret");
    expect(settings.service.basePath).toBe("/estimates");
    expect(settings.service.maxConcurrentRuns).toBe(2);
  });

  it("reports invalid values with their variable names", () => {
    expect(() => loadSettings({ LOCATE_RETRIES: "many" })).toThrow(SettingsError);
    expect(() => loadSettings({ ESTIMATE_SERVICE_BASE_PATH: "api" })).toThrow(/ESTIMATE_SERVICE_BASE_PATH/);
  });
});
