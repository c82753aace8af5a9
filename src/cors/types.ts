import type { cors } from "hono/cors";

/**
 * CORS options accepted by Hono's cors middleware
 */
export type CorsOptions = NonNullable<Parameters<typeof cors>[0]>;

/**
 * CORS configuration for the REST app
 */
export interface CorsConfig {
  /**
   * Enable or disable CORS
   * - `true` (default): apply CORS using `allowedOrigins` and `defaults`
   * - `false`: no CORS headers are set
   */
  enabled?: boolean;

  /**
   * Overrides merged over the built-in options
   */
  defaults?: CorsOptions;
}
