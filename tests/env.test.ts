import { describe, expect, it } from "vitest";
import { parseEnv } from "../src/env";

describe("parseEnv", () => {
  it("fills in defaults", () => {
    expect(parseEnv({})).toEqual({
      PORT: 3000,
      DATA_FILE: undefined,
      DATASET_TZ: "UTC",
      LOG_LEVEL: "info",
      DATASET_CACHE_MAX: 16,
    });
  });

  it("coerces numbers and drops a blank DATA_FILE", () => {
    const env = parseEnv({ PORT: "8080", DATA_FILE: "  ", DATASET_CACHE_MAX: "4" });
    expect(env.PORT).toBe(8080);
    expect(env.DATA_FILE).toBeUndefined();
    expect(env.DATASET_CACHE_MAX).toBe(4);
  });

  it("rejects an unknown time zone", () => {
    expect(() => parseEnv({ DATASET_TZ: "Mars/Olympus" })).toThrow(
      "DATASET_TZ precisa ser um fuso IANA válido"
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => parseEnv({ LOG_LEVEL: "debug" })).toThrow();
  });
});
