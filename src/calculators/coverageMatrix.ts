/**
 * Coverage Matrix
 *
 * Guild-wide index of which members own which units at which effective
 * tier. Buckets hold the exact tier; "at or above" queries sum buckets at
 * read time.
 */

import { Alignment, PlayerRoster, UnitKind } from "../models/types";
import { PlayerUnitInfo } from "../models/platoonTypes";
import { UnitRepository } from "../data/UnitRepository";
import { AnalysisConfig, DEFAULT_CONFIG } from "../config/analysisConfig";

// ─────────────────────────────────────────────────────────────
// Unit Coverage
// ─────────────────────────────────────────────────────────────

export interface UnitCoverageMeta {
  unitId: string;
  unitName: string;
  alignment: Alignment;
  combatType: UnitKind;
  categories: readonly string[];
}

/**
 * Ownership of a single unit across the guild
 */
export class UnitCoverage {
  readonly unitId: string;
  readonly unitName: string;
  readonly alignment: Alignment;
  readonly combatType: UnitKind;
  readonly categories: readonly string[];
  private readonly playersByTier: ReadonlyMap<number, readonly PlayerUnitInfo[]>;

  constructor(meta: UnitCoverageMeta, playersByTier: ReadonlyMap<number, readonly PlayerUnitInfo[]>) {
    this.unitId = meta.unitId;
    this.unitName = meta.unitName;
    this.alignment = meta.alignment;
    this.combatType = meta.combatType;
    this.categories = [...meta.categories];
    this.playersByTier = playersByTier;
  }

  /**
   * Players at exactly one tier
   */
  playersAtTier(tier: number): readonly PlayerUnitInfo[] {
    return this.playersByTier.get(tier) ?? [];
  }

  /**
   * Tiers that have at least one owner, ascending
   */
  tiers(): number[] {
    return [...this.playersByTier.keys()].sort((a, b) => a - b);
  }

  countAtOrAbove(threshold: number): number {
    let count = 0;
    for (const [tier, players] of this.playersByTier) {
      if (tier >= threshold) count += players.length;
    }
    return count;
  }

  playersAtOrAbove(threshold: number): PlayerUnitInfo[] {
    const result: PlayerUnitInfo[] = [];
    for (const [tier, players] of this.playersByTier) {
      if (tier >= threshold) result.push(...players);
    }
    return result;
  }
}

// ─────────────────────────────────────────────────────────────
// Coverage Matrix
// ─────────────────────────────────────────────────────────────

export class CoverageMatrix {
  readonly guildName: string;
  readonly guildId: string;
  readonly memberCount: number;
  private readonly units: ReadonlyMap<string, UnitCoverage>;
  private readonly summaryThresholds: readonly number[];

  constructor(
    guild: { guildName: string; guildId: string; memberCount: number },
    units: ReadonlyMap<string, UnitCoverage>,
    summaryThresholds: readonly number[] = DEFAULT_CONFIG.coverage.summaryThresholds
  ) {
    this.guildName = guild.guildName;
    this.guildId = guild.guildId;
    this.memberCount = guild.memberCount;
    this.units = units;
    this.summaryThresholds = summaryThresholds;
  }

  getCoverage(unitId: string): UnitCoverage | undefined {
    return this.units.get(unitId);
  }

  /**
   * All covered units
   */
  getAllCoverage(): UnitCoverage[] {
    return [...this.units.values()];
  }

  get unitCount(): number {
    return this.units.size;
  }

  /**
   * Number of players owning a unit at or above a threshold
   */
  countAtOrAbove(unitId: string, threshold: number): number {
    return this.units.get(unitId)?.countAtOrAbove(threshold) ?? 0;
  }

  /**
   * Players owning a unit at or above a threshold
   */
  playersAtOrAbove(unitId: string, threshold: number): PlayerUnitInfo[] {
    return this.units.get(unitId)?.playersAtOrAbove(threshold) ?? [];
  }

  /**
   * Player counts at or above each summary threshold.
   *
   * @example
   * ```ts
   * matrix.getCoverageSummary("VADER"); // Map { 5 => 45, 6 => 42, 7 => 38, 8 => 12, 9 => 3 }
   * ```
   */
  getCoverageSummary(unitId: string): Map<number, number> {
    const coverage = this.units.get(unitId);
    return new Map(this.summaryThresholds.map((t) => [t, coverage?.countAtOrAbove(t) ?? 0]));
  }
}

// ─────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────

/**
 * Folds guild rosters and unit metadata into a coverage matrix.
 */
export class CoverageMatrixBuilder {
  private readonly units: UnitRepository;
  private readonly config: AnalysisConfig;

  constructor(units: UnitRepository, config: AnalysisConfig = DEFAULT_CONFIG) {
    this.units = units;
    this.config = config;
  }

  /**
   * Effective tier for an owned unit, or null if it is not eligible.
   *
   * Ships use star rarity (7 stars minimum). Characters use the API relic
   * encoding, where 3 means R1 ... 11 means R9, so the actual relic is the
   * encoded value minus 2; anything below 3 has no relic.
   */
  effectiveTier(kind: UnitKind, rarity: number, relicTier: number | null): number | null {
    const { shipMinRarity, minEncodedRelic, relicOffset } = this.config.coverage;

    if (kind === "ship") {
      return rarity >= shipMinRarity ? rarity : null;
    }
    if (relicTier === null || relicTier < minEncodedRelic) return null;
    return relicTier - relicOffset;
  }

  build(rosters: readonly PlayerRoster[], guildName: string, guildId: string): CoverageMatrix {
    const pending = new Map<string, { meta: UnitCoverageMeta; buckets: Map<number, PlayerUnitInfo[]> }>();

    for (const roster of rosters) {
      for (const owned of roster.units) {
        const meta = this.units.getById(owned.baseId);
        if (!meta) continue;

        const tier = this.effectiveTier(meta.combatType, owned.rarity, owned.relicTier);
        if (tier === null) continue;

        let entry = pending.get(meta.baseId);
        if (!entry) {
          entry = {
            meta: {
              unitId: meta.baseId,
              unitName: meta.name,
              alignment: meta.alignment,
              combatType: meta.combatType,
              categories: meta.categories,
            },
            buckets: new Map(),
          };
          pending.set(meta.baseId, entry);
        }

        const info: PlayerUnitInfo = { playerName: roster.name, allyCode: roster.allyCode, tier };
        const bucket = entry.buckets.get(tier);
        if (bucket) {
          bucket.push(info);
        } else {
          entry.buckets.set(tier, [info]);
        }
      }
    }

    const coverage = new Map<string, UnitCoverage>();
    for (const [unitId, { meta, buckets }] of pending) {
      coverage.set(unitId, new UnitCoverage(meta, buckets));
    }

    return new CoverageMatrix(
      { guildName, guildId, memberCount: rosters.length },
      coverage,
      this.config.coverage.summaryThresholds
    );
  }
}
