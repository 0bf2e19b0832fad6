/**
 * Settings for salvage requirement analysis
 */
export interface SalvageSettings {
  /** Raw salvage ids to track, mapped to their display names */
  readonly trackedSalvage: Readonly<Record<string, string>>;
  /** Ingredient id representing credits (contributes no material) */
  readonly currencySentinel: string;
  /** Highest gear tier a character can reach */
  readonly maxGearTier: number;
}

/**
 * Settings for turning raw roster values into effective tiers
 */
export interface CoverageSettings {
  /** Ships below this star rarity are not eligible */
  readonly shipMinRarity: number;
  /** Encoded relic values below this mean "no relic" (not eligible) */
  readonly minEncodedRelic: number;
  /** Offset between the API relic encoding and the actual relic level */
  readonly relicOffset: number;
  /** Thresholds reported by the per-unit coverage summary */
  readonly summaryThresholds: readonly number[];
}

/**
 * Thresholds for gap severity classification
 */
export interface GapSettings {
  /** Fewer available players than this (with a shortfall) is critical */
  readonly criticalThreshold: number;
  /** Surplus at or above this is healthy */
  readonly warningThreshold: number;
  /** Surplus at or above this is overfilled */
  readonly overfillMargin: number;
}

export interface BottleneckSettings {
  /** Units with at most this many owners are reported as scarce */
  readonly scarcityThreshold: number;
}

export interface TerritorySettings {
  /** Territory name -> phase label ("b" marks a bonus planet) */
  readonly territoryPhase: Readonly<Record<string, string>>;
  /** Phase labels in play order */
  readonly phaseOrder: readonly string[];
}

/**
 * Complete analysis configuration
 */
export interface AnalysisConfig {
  readonly salvage: SalvageSettings;
  readonly coverage: CoverageSettings;
  readonly gaps: GapSettings;
  readonly bottlenecks: BottleneckSettings;
  readonly territories: TerritorySettings;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: AnalysisConfig = {
  salvage: {
    trackedSalvage: {
      "172Salvage": "Mk 7 Kyrotech Shock Prod Prototype Salvage",
      "173Salvage": "Mk 9 Kyrotech Battle Computer Prototype Salvage",
      "174Salvage": "Mk 5 Kyrotech Power Cell Prototype Salvage",
    },
    currencySentinel: "GRIND",
    maxGearTier: 13,
  },
  coverage: {
    shipMinRarity: 7,
    minEncodedRelic: 3,
    relicOffset: 2,
    summaryThresholds: [5, 6, 7, 8, 9],
  },
  gaps: {
    criticalThreshold: 3,
    warningThreshold: 10,
    overfillMargin: 10,
  },
  bottlenecks: {
    scarcityThreshold: 3,
  },
  territories: {
    territoryPhase: {
      Coruscant: "1",
      Mustafar: "1",
      Corellia: "1",
      Bracca: "2",
      Geonosis: "2",
      Felucia: "2",
      Kashyyyk: "3",
      Dathomir: "3",
      Tatooine: "3",
      Zeffo: "3b",
      Lothal: "4",
      Kessel: "4",
      "Haven-class Medical Station": "4",
      Mandalore: "4b",
      Scarif: "5",
      Malachor: "5",
      Vandor: "5",
      "Ring of Kafrene": "6",
      Hoth: "6",
      "Death Star": "6",
    },
    phaseOrder: ["1", "2", "3", "3b", "4", "4b", "5", "5b", "6"],
  },
};

/**
 * Partial overrides, one level deep
 */
export type AnalysisConfigOverrides = {
  [K in keyof AnalysisConfig]?: Partial<AnalysisConfig[K]>;
};

/**
 * Merge partial config with defaults.
 * Nested tables and lists are copied, so the result shares nothing with the defaults.
 */
export function mergeConfig(partial: AnalysisConfigOverrides = {}): AnalysisConfig {
  const salvage = { ...DEFAULT_CONFIG.salvage, ...partial.salvage };
  const coverage = { ...DEFAULT_CONFIG.coverage, ...partial.coverage };
  const territories = { ...DEFAULT_CONFIG.territories, ...partial.territories };

  return {
    salvage: { ...salvage, trackedSalvage: { ...salvage.trackedSalvage } },
    coverage: { ...coverage, summaryThresholds: [...coverage.summaryThresholds] },
    gaps: { ...DEFAULT_CONFIG.gaps, ...partial.gaps },
    bottlenecks: { ...DEFAULT_CONFIG.bottlenecks, ...partial.bottlenecks },
    territories: {
      phaseOrder: [...territories.phaseOrder],
      territoryPhase: { ...territories.territoryPhase },
    },
  };
}

/**
 * Display name for a salvage id, falling back to the id itself
 */
export function salvageDisplayName(
  salvageId: string,
  config: AnalysisConfig = DEFAULT_CONFIG
): string {
  return config.salvage.trackedSalvage[salvageId] ?? salvageId;
}

/**
 * Phase label for a territory, if known
 */
export function territoryPhase(
  territory: string,
  config: AnalysisConfig = DEFAULT_CONFIG
): string | undefined {
  return config.territories.territoryPhase[territory];
}
