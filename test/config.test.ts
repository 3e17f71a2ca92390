import { afterEach, describe, expect, test, vi } from "vitest";
import { createValueCache, loadValueConfig } from "../src/common/config";
import { ConfigurationError } from "../src/common/errors";
import { logger } from "../src/common/logger";

describe("Configuration", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("defaults", () => {
    expect(loadValueConfig({})).toEqual({
      objectCache: true,
      objectCacheSize: 1024,
      objectCacheRetention: "weak",
    });
  });

  test("explicit settings", () => {
    const config = loadValueConfig({
      SQL_VALUES_OBJECT_CACHE: "0",
      SQL_VALUES_OBJECT_CACHE_SIZE: "64",
      SQL_VALUES_OBJECT_CACHE_RETENTION: "strong",
    });
    expect(config).toEqual({ objectCache: false, objectCacheSize: 64, objectCacheRetention: "strong" });
  });

  test("rejects a size that is not a power of two", () => {
    let caught: unknown;
    try {
      loadValueConfig({ SQL_VALUES_OBJECT_CACHE_SIZE: "1000" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues).toEqual(["SQL_VALUES_OBJECT_CACHE_SIZE: must be a power of two"]);
      expect(caught.code).toBe("INVALID_CONFIGURATION");
    }
  });

  test("rejects an unknown flag value", () => {
    expect(() => loadValueConfig({ SQL_VALUES_OBJECT_CACHE: "maybe" })).toThrow(ConfigurationError);
  });

  test("warns about unknown settings", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);
    loadValueConfig({ SQL_VALUES_TYPO: "1", UNRELATED: "x" });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("ignoring unknown setting SQL_VALUES_TYPO");
  });

  test("createValueCache follows the settings", () => {
    const cache = createValueCache({ objectCache: false, objectCacheSize: 8, objectCacheRetention: "strong" });
    expect(cache.enabled).toBe(false);
    expect(cache.size).toBe(8);
    expect(cache.retention).toBe("strong");
  });
});
