import { UnitKind } from "./types";

// ─────────────────────────────────────────────────────────────
// Platoon Requirements
// ─────────────────────────────────────────────────────────────

/**
 * The three Territory Battle paths
 */
export type TerritoryPath = "dark_side" | "neutral" | "light_side";

export const TERRITORY_PATHS: readonly TerritoryPath[] = ["dark_side", "neutral", "light_side"];

/**
 * A unit required at a minimum relic (or star) level in a territory's platoons
 */
export interface UnitRequirement {
  unitId: string;
  unitName: string;
  /** Minimum effective tier: relic level for characters, stars for ships */
  minRelic: number;
  path: TerritoryPath;
  territory: string;
  /** Number of platoon slots requiring this unit */
  count: number;
  unitType: UnitKind;
}

/**
 * Requirement list as authored in the requirements file
 */
export interface PlatoonRequirements {
  version: string;
  lastUpdated: string;
  notes?: string;
  requirements: UnitRequirement[];
}

// ─────────────────────────────────────────────────────────────
// Coverage
// ─────────────────────────────────────────────────────────────

/**
 * A player's ownership of a unit at an effective tier
 */
export interface PlayerUnitInfo {
  readonly playerName: string;
  readonly allyCode: number;
  /** Effective tier: actual relic level (0-9) for characters, stars for ships */
  readonly tier: number;
}

/**
 * Coverage for a single requirement
 */
export interface RequirementCoverage {
  readonly requirement: UnitRequirement;
  readonly playersAvailable: number;
  readonly playerNames: readonly string[];
  /** playersAvailable / guild member count */
  readonly coverageRatio: number;
}

/**
 * Slot totals for one territory on one path
 */
export interface TerritoryCoverage {
  readonly path: TerritoryPath;
  readonly territory: string;
  readonly totalSlots: number;
  readonly coveredSlots: number;
}

// ─────────────────────────────────────────────────────────────
// Gaps
// ─────────────────────────────────────────────────────────────

export type GapSeverity = "critical" | "warning" | "healthy" | "overfilled";

/**
 * Coverage of a requirement classified by severity
 */
export interface PlatoonGap {
  readonly unitId: string;
  readonly unitName: string;
  readonly path: TerritoryPath;
  readonly territory: string;
  readonly minRelic: number;
  readonly slotsNeeded: number;
  readonly playersAvailable: number;
  readonly playerNames: readonly string[];
  readonly coverageRatio: number;
  readonly severity: GapSeverity;
  /** Slots that no guild member can fill */
  readonly slotsUnfillable: number;
  /** Fewer players than slots */
  readonly isGap: boolean;
}

// ─────────────────────────────────────────────────────────────
// Bottlenecks
// ─────────────────────────────────────────────────────────────

/**
 * A required unit that few members own at the needed level
 */
export interface ScarceUnit {
  readonly unitId: string;
  readonly unitName: string;
  readonly minRelic: number;
  readonly ownerNames: readonly string[];
  readonly ownerCount: number;
  /** Territories needing this unit at this level, in requirement order */
  readonly territoriesNeeded: readonly string[];
  /** Slot demand summed across those territories */
  readonly totalSlotsNeeded: number;
  readonly isSoleOwner: boolean;
  /** Fewer than three owners */
  readonly isCritical: boolean;
}

// ─────────────────────────────────────────────────────────────
// Report
// ─────────────────────────────────────────────────────────────

/**
 * Everything the platoon report shows for one guild
 */
export interface PlatoonAnalysis {
  readonly guildName: string;
  readonly guildId: string;
  readonly memberCount: number;
  /** Units with at least one eligible owner */
  readonly unitsCovered: number;
  readonly requirementCount: number;
  readonly territories: readonly TerritoryCoverage[];
  /** minRelic -> unit name -> unfillable slots */
  readonly unfillableByTier: ReadonlyMap<number, ReadonlyMap<string, number>>;
  readonly criticalGaps: readonly PlatoonGap[];
  readonly scarceUnits: readonly ScarceUnit[];
}
