export {
  createLogFileStream,
  createLogger,
  type Logger,
  type LoggerConfig,
} from "./logger";

export { isLevelEnabled, logLevelSchema, type LogLevel } from "./schema";
