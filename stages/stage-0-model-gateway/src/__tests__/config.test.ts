import { describe, expect, it } from "vitest";

import { loadGlobalConfig, readIntEnv } from "../../../../config/index.js";

describe("loadGlobalConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadGlobalConfig({})).toEqual({
      defaultModel: undefined,
      logLevel: "info",
      maxRetries: 3,
      attemptTimeoutMs: 30_000,
    });
  });

  it("reads extraction settings and ignores malformed numbers", () => {
    expect(
      loadGlobalConfig({
        DEFAULT_MODEL: " gpt-4o ",
        LOG_LEVEL: "error",
        EXTRACT_MAX_RETRIES: "5",
        EXTRACT_ATTEMPT_TIMEOUT_MS: "soon",
      })
    ).toEqual({
      defaultModel: "gpt-4o",
      logLevel: "error",
      maxRetries: 5,
      attemptTimeoutMs: 30_000,
    });
  });
});

describe("readIntEnv", () => {
  it("accepts non-negative integers only", () => {
    expect(readIntEnv({ N: "0" }, "N", 7)).toBe(0);
    expect(readIntEnv({ N: "-1" }, "N", 7)).toBe(7);
    expect(readIntEnv({ N: "2.5" }, "N", 7)).toBe(7);
    expect(readIntEnv({}, "N", 7)).toBe(7);
  });
});
