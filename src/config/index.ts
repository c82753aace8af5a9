// biome-ignore lint/performance/noBarrelFile: Public API entry point for configuration
export {
  type AppConfig,
  DEFAULT_CORS_ORIGINS,
  loadConfig,
  SERVER_NAME,
  SERVER_VERSION,
} from "./config";
