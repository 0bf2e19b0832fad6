/**
 * Runtime settings resolved from environment variables.
 *
 *   SWGOH_API_KEY           - swgoh.gg bot access key (required for fetching)
 *   SWGOH_API_BASE_URL      - API root (default: https://swgoh.gg/api)
 *   SWGOH_CACHE_DIR         - response cache directory (default: .cache/swgoh)
 *   SWGOH_CACHE_TTL_HOURS   - cache entry lifetime (default: 1)
 *   SWGOH_FETCH_CONCURRENCY - parallel roster requests (default: 5)
 *   SWGOH_FETCH_DELAY_MS    - pause between sequential roster requests (default: 1000)
 *
 * Any of these may also come from a .env file; values already set in the
 * shell take precedence.
 */

import { config as loadDotenv } from "dotenv";
import { ConfigurationError } from "../errors";

export interface EnvironmentConfig {
  apiKey: string | undefined;
  apiBaseUrl: string;
  cacheDir: string;
  cacheTtlHours: number;
  fetchConcurrency: number;
  fetchDelayMs: number;
}

export const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  apiKey: undefined,
  apiBaseUrl: "https://swgoh.gg/api",
  cacheDir: ".cache/swgoh",
  cacheTtlHours: 1,
  fetchConcurrency: 5,
  fetchDelayMs: 1000,
};

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  { integer = false, min = 0 }: { integer?: boolean; min?: number } = {}
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(`${key} must be ${integer ? "an integer" : "a number"} >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Copy variables from a .env file into process.env. A missing file is not an error.
 */
export function loadEnvFile(path: string = ".env"): void {
  const { error } = loadDotenv({ path });
  if (error && !("code" in error && error.code === "ENOENT")) {
    throw new ConfigurationError(`Could not read ${path}: ${error.message}`);
  }
}

/**
 * Resolve runtime settings from the environment
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const apiKey = env.SWGOH_API_KEY?.trim();

  return {
    apiKey: apiKey ? apiKey : undefined,
    apiBaseUrl: (env.SWGOH_API_BASE_URL?.trim() || DEFAULT_ENVIRONMENT.apiBaseUrl).replace(/\/+$/, ""),
    cacheDir: env.SWGOH_CACHE_DIR?.trim() || DEFAULT_ENVIRONMENT.cacheDir,
    cacheTtlHours: readNumber(env, "SWGOH_CACHE_TTL_HOURS", DEFAULT_ENVIRONMENT.cacheTtlHours),
    fetchConcurrency: readNumber(env, "SWGOH_FETCH_CONCURRENCY", DEFAULT_ENVIRONMENT.fetchConcurrency, {
      integer: true,
      min: 1,
    }),
    fetchDelayMs: readNumber(env, "SWGOH_FETCH_DELAY_MS", DEFAULT_ENVIRONMENT.fetchDelayMs, { integer: true }),
  };
}

/**
 * Return the API key or fail with setup instructions
 */
export function requireApiKey(config: EnvironmentConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError(
      "SWGOH_API_KEY is not set. Add it to a .env file or export it in your shell before fetching data."
    );
  }
  return config.apiKey;
}
