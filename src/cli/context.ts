/**
 * CLI Context - Shared state and initialization for all CLI commands.
 */

import { SwgohClient, HttpGetter } from "../data/SwgohClient";
import { ResponseCache } from "../data/ResponseCache";
import { UnitRepository } from "../data/UnitRepository";
import { AnalysisConfig, AnalysisConfigOverrides, mergeConfig } from "../config/analysisConfig";
import { EnvironmentConfig, loadEnvironment, requireApiKey } from "../config/environment";

/**
 * Shared context for CLI operations.
 */
export interface CliContext {
  /** API client (cached unless disabled) */
  readonly client: SwgohClient;
  /** Unit catalog */
  readonly units: UnitRepository;
  /** Analysis configuration */
  readonly config: AnalysisConfig;
  /** Runtime settings from the environment */
  readonly environment: EnvironmentConfig;
  /** Progress reporting */
  readonly onProgress: (message: string) => void;
}

/**
 * Options for initializing the CLI context.
 */
export interface CliContextOptions {
  /** Override default configuration */
  config?: AnalysisConfigOverrides;
  /** Environment to read settings from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip the response cache */
  noCache?: boolean;
  /** Override the cache directory */
  cacheDir?: string;
  /** Transport override (tests) */
  httpGet?: HttpGetter;
  /** Callback for progress updates */
  onProgress?: (message: string) => void;
}

/**
 * Build the API client described by the environment and options.
 */
export function createClient(environment: EnvironmentConfig, options: CliContextOptions = {}): SwgohClient {
  const { noCache = false, cacheDir, httpGet, onProgress } = options;

  const cache = noCache
    ? undefined
    : new ResponseCache({
        cacheDir: cacheDir ?? environment.cacheDir,
        ttlHours: environment.cacheTtlHours,
      });

  return new SwgohClient({
    apiKey: requireApiKey(environment),
    baseUrl: environment.apiBaseUrl,
    cache,
    httpGet,
    onProgress,
  });
}

/**
 * Initialize the CLI context by loading the unit catalog.
 * This is the entry point for all analysis operations.
 */
export async function initializeContext(options: CliContextOptions = {}): Promise<CliContext> {
  const { config: configOverrides, env = process.env, onProgress = () => {} } = options;

  const config = mergeConfig(configOverrides);
  const environment = loadEnvironment(env);
  const client = createClient(environment, { ...options, onProgress });

  const units = new UnitRepository(await client.getUnits());
  onProgress(`Loaded ${units.size} units.`);

  return {
    client,
    units,
    config,
    environment,
    onProgress,
  };
}
