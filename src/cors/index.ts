// biome-ignore lint/performance/noBarrelFile: Public API entry point for CORS
export {
  applyCorsConfig,
  buildDefaultCorsOptions,
  createOriginResolver,
} from "./cors";
export type { CorsConfig, CorsOptions } from "./types";
