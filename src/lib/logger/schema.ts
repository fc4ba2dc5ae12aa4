import * as v from "valibot";

export const logLevelSchema = v.picklist(["debug", "info", "warn", "error"]);

export type LogLevel = v.InferOutput<typeof logLevelSchema>;

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** True when a message at `level` passes a logger set to `threshold`. */
export const isLevelEnabled = (level: LogLevel, threshold: LogLevel): boolean =>
  LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[threshold];
