import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      timeoutMs: 10000,
      crawler: { pageDelayMs: 1000 },
      processor: { maxEdits: 19, maxPerMinute: 30, baseSleepMs: 10000 }
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      GEOTAG_MAX_EDITS: "100000",
      GEOTAG_MAX_EDITS_PER_MIN: "120",
      GEOTAG_SLEEP_MS: "0",
      GEOTAG_PAGE_DELAY_MS: "60000",
      COMMONS_TIMEOUT_MS: "60000"
    });

    expect(runtime).toEqual({
      timeoutMs: 60000,
      crawler: { pageDelayMs: 60000 },
      processor: { maxEdits: 100000, maxPerMinute: 120, baseSleepMs: 0 }
    });
  });

  it.each([
    {
      env: { GEOTAG_MAX_EDITS: "0" },
      message: "GEOTAG_MAX_EDITS=0 is out of allowed range [1..100000]"
    },
    {
      env: { GEOTAG_MAX_EDITS_PER_MIN: "121" },
      message: "GEOTAG_MAX_EDITS_PER_MIN=121 is out of allowed range [1..120]"
    },
    {
      env: { GEOTAG_SLEEP_MS: "1.5" },
      message: "GEOTAG_SLEEP_MS=1.5 is out of allowed range [0..600000]"
    },
    {
      env: { GEOTAG_PAGE_DELAY_MS: "-1" },
      message: "GEOTAG_PAGE_DELAY_MS=-1 is out of allowed range [0..60000]"
    },
    {
      env: { COMMONS_TIMEOUT_MS: "999" },
      message: "COMMONS_TIMEOUT_MS=999 is out of allowed range [1000..60000]"
    }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });
});
