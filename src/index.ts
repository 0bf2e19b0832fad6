/**
 * SWGOH Roster Tools
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from "./models/types";
export * from "./models/platoonTypes";
export * from "./errors";

export * from "./calculators";

export { GearRepository } from "./data/GearRepository";
export { UnitRepository } from "./data/UnitRepository";
export { ResponseCache } from "./data/ResponseCache";
export type { ResponseCacheOptions } from "./data/ResponseCache";
export { SwgohClient, httpsGetJson } from "./data/SwgohClient";
export type { HttpGetter, SwgohClientOptions, RosterFetchOptions } from "./data/SwgohClient";
export { normalizeAllyCode, formatAllyCode } from "./data/allyCode";
export {
  DEFAULT_REQUIREMENTS_PATH,
  parseRequirements,
  loadRequirements,
  filterRequirementsByPhase,
} from "./data/requirements";
export type { PhaseFilterOptions } from "./data/requirements";

export {
  DEFAULT_CONFIG,
  mergeConfig,
  salvageDisplayName,
  territoryPhase,
} from "./config/analysisConfig";
export type { AnalysisConfig, AnalysisConfigOverrides } from "./config/analysisConfig";
export { DEFAULT_ENVIRONMENT, loadEnvFile, loadEnvironment, requireApiKey } from "./config/environment";
export type { EnvironmentConfig } from "./config/environment";

export { formatSalvageReport, formatPlatoonReport } from "./output/display";
