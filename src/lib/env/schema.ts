import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const integerFromString = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(min), v.maxValue(max));

export const envSchema = v.object({
  // Server
  PORT: v.optional(integerFromString(1, 65535), "8000"),
  HOST: v.optional(v.pipe(v.string(), v.minLength(1)), "0.0.0.0"),
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Analysis engines
  WHITEPAPER_ANALYZER_URL: v.optional(v.pipe(v.string(), v.url()), "http://localhost:8101"),
  SERVICE_ANALYZER_URL: v.optional(v.pipe(v.string(), v.url()), "http://localhost:8102"),
  ANALYZER_TIMEOUT_MS: v.optional(integerFromString(1), "30000"),

  // Monitoring
  HEALTH_CHECK_INTERVAL_MS: v.optional(integerFromString(1000), "30000"),
  ALERT_CHECK_INTERVAL_MS: v.optional(integerFromString(1000), "60000"),
  HEALTH_MAX_RSS_MB: v.optional(integerFromString(1), "1024"),

  // AWS
  AWS_REGION: v.optional(v.pipe(v.string(), v.minLength(1))),
});

export type Env = v.InferOutput<typeof envSchema>;
