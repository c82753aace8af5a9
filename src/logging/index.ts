// biome-ignore lint/performance/noBarrelFile: Public API entry point for logging module
export {
  createLogger,
  type Log,
  type LoggerConfig,
  type LogLevel,
  type TaskLogger,
} from "./logger";
