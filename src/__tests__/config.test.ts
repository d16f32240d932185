import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      env: "development",
      port: 8080,
      host: "0.0.0.0",
      logLevel: "info",
      steps: { provider: "stub", timeoutMs: 300_000, stubDelayMs: 0 },
      researchTools: { baseUrl: undefined, apiKey: undefined },
      jobs: { maxRetained: 500 },
    });
  });

  it("reads numeric settings from strings", () => {
    const config = loadConfig({ PORT: "3000", STEP_TIMEOUT_SECONDS: "1.5", MAX_RETAINED_JOBS: "0" });

    expect(config.port).toBe(3000);
    expect(config.steps.timeoutMs).toBe(1500);
    expect(config.jobs.maxRetained).toBe(0);
  });

  it("requires a tools url for the http provider", () => {
    expect(() => loadConfig({ STEP_PROVIDER: "http" })).toThrow("RESEARCH_TOOLS_URL is required when STEP_PROVIDER=http");
  });

  it("strips a trailing slash from the tools url", () => {
    const config = loadConfig({
      STEP_PROVIDER: "http",
      RESEARCH_TOOLS_URL: "http://tools.test/api/",
      RESEARCH_TOOLS_API_KEY: "test-key",
    });

    expect(config.researchTools).toEqual({ baseUrl: "http://tools.test/api", apiKey: "test-key" });
  });

  it("rejects unknown providers", () => {
    expect(() => loadConfig({ STEP_PROVIDER: "carrier-pigeon" })).toThrow();
  });
});
