import { getEnv } from "./env";

const env = getEnv();

export const config = {
  server: {
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
  },
  analyzers: {
    whitepaperUrl: env.WHITEPAPER_ANALYZER_URL,
    serviceUrl: env.SERVICE_ANALYZER_URL,
    timeoutMs: env.ANALYZER_TIMEOUT_MS,
  },
  monitoring: {
    healthCheckIntervalMs: env.HEALTH_CHECK_INTERVAL_MS,
    alertCheckIntervalMs: env.ALERT_CHECK_INTERVAL_MS,
    maxRssMb: env.HEALTH_MAX_RSS_MB,
  },
  aws: {
    region: env.AWS_REGION,
  },
} as const;
