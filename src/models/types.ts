/**
 * An ingredient needed to craft a gear piece.
 * `gearId` is either another gear piece or the currency sentinel ("GRIND").
 */
export interface GearIngredient {
  gearId: string;
  amount: number;
}

/**
 * Represents a craftable (or raw) piece of equipment
 */
export interface GearPiece {
  baseId: string;
  name: string;
  tier: number;
  ingredients: GearIngredient[];
}

/**
 * Gear required by a character at a single gear tier.
 * The same gear id may appear more than once.
 */
export interface GearTier {
  tier: number;
  gear: string[];
}

export type UnitKind = "character" | "ship";

export type Alignment = "light" | "dark" | "neutral";

/**
 * Static metadata for a playable unit
 */
export interface Unit {
  baseId: string;
  name: string;
  combatType: UnitKind;
  alignment: Alignment;
  categories: string[];
  gearLevels: GearTier[];
}

/**
 * A single gear slot on an owned unit
 */
export interface GearSlot {
  slot: number;
  baseId: string;
  isObtained: boolean;
}

/**
 * A unit as owned by a player
 */
export interface OwnedUnit {
  baseId: string;
  name: string;
  combatType: UnitKind;
  gearLevel: number;
  rarity: number;
  /**
   * Relic tier in the API encoding: null below G13, 1-2 for G13 without
   * relic, 3 for R1 ... 11 for R9.
   */
  relicTier: number | null;
  gear: GearSlot[];
}

/**
 * A player's profile and owned units
 */
export interface PlayerRoster {
  name: string;
  allyCode: number;
  guildId: string;
  guildName: string;
  units: OwnedUnit[];
}

/**
 * Guild profile with the ally codes of every member
 */
export interface GuildProfile {
  guildId: string;
  name: string;
  memberAllyCodes: string[];
}

/**
 * Raw salvage id -> count still required
 */
export type NeedMap = Readonly<Record<string, number>>;

/**
 * One row of the salvage report
 */
export interface SalvageReportRow {
  readonly unitId: string;
  readonly name: string;
  readonly currentTier: number;
  readonly needs: NeedMap;
  readonly total: number;
}
