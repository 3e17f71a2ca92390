// Configuration
// Environment-driven settings for the value cache

import { z } from "zod";
import { ValueCache } from "../cache/value-cache";
import { ConfigurationError } from "./errors";
import { logger } from "./logger";

const booleanFlag = z
  .enum(["true", "false", "TRUE", "FALSE", "1", "0"])
  .transform((text) => text === "true" || text === "TRUE" || text === "1");

const powerOfTwo = z.coerce
  .number()
  .int()
  .positive()
  .refine((n) => (n & (n - 1)) === 0, { message: "must be a power of two" });

export const ValueConfigSchema = z.object({
  SQL_VALUES_OBJECT_CACHE: booleanFlag.default("true"),
  SQL_VALUES_OBJECT_CACHE_SIZE: powerOfTwo.default(1024),
  SQL_VALUES_OBJECT_CACHE_RETENTION: z.enum(["weak", "strong"]).default("weak"),
});

export interface ValueConfig {
  objectCache: boolean;
  objectCacheSize: number;
  objectCacheRetention: "weak" | "strong";
}

/**
 * Read the value core settings from environment variables.
 *
 * @throws ConfigurationError when a variable is present but invalid
 */
export function loadValueConfig(env: Readonly<Record<string, string | undefined>> = process.env): ValueConfig {
  for (const name of Object.keys(env)) {
    if (name.startsWith("SQL_VALUES_") && !(name in ValueConfigSchema.shape)) {
      logger.warn(`ignoring unknown setting ${name}`);
    }
  }
  const parsed = ValueConfigSchema.safeParse({
    SQL_VALUES_OBJECT_CACHE: env["SQL_VALUES_OBJECT_CACHE"],
    SQL_VALUES_OBJECT_CACHE_SIZE: env["SQL_VALUES_OBJECT_CACHE_SIZE"],
    SQL_VALUES_OBJECT_CACHE_RETENTION: env["SQL_VALUES_OBJECT_CACHE_RETENTION"],
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(issues);
  }
  const config: ValueConfig = {
    objectCache: parsed.data.SQL_VALUES_OBJECT_CACHE,
    objectCacheSize: parsed.data.SQL_VALUES_OBJECT_CACHE_SIZE,
    objectCacheRetention: parsed.data.SQL_VALUES_OBJECT_CACHE_RETENTION,
  };
  logger.debug("loaded value config", config);
  return config;
}

/**
 * Build a cache from loaded settings.
 */
export function createValueCache(config: ValueConfig = loadValueConfig()): ValueCache {
  if (!config.objectCache) {
    logger.debug("value cache disabled by configuration");
  }
  return new ValueCache({
    enabled: config.objectCache,
    size: config.objectCacheSize,
    retention: config.objectCacheRetention,
  });
}
