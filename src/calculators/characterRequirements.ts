import { countBy } from "es-toolkit";
import { GearTier, NeedMap } from "../models/types";
import { AnalysisConfig, DEFAULT_CONFIG } from "../config/analysisConfig";
import { SalvageResolver, accumulateNeeds } from "./salvage";

/**
 * Applies the salvage resolver across a character's remaining gear tiers.
 */
export class CharacterRequirementCalculator {
  private readonly resolver: SalvageResolver;
  private readonly maxGearTier: number;

  constructor(resolver: SalvageResolver, config: AnalysisConfig = DEFAULT_CONFIG) {
    this.resolver = resolver;
    this.maxGearTier = config.salvage.maxGearTier;
  }

  /**
   * Salvage still needed to take a character from `currentTier` to max gear.
   *
   * Gear at the current tier is offset by what is already equipped: with
   * `["172", "172", "172"]` required and two "172" equipped, only the third
   * copy counts. Every piece of every later tier up to the max counts.
   *
   * @param gearLevels - The character's full tier ladder
   * @param currentTier - Current gear tier
   * @param equipped - Gear ids equipped at the current tier
   */
  compute(gearLevels: readonly GearTier[], currentTier: number, equipped: readonly string[] = []): NeedMap {
    const needs: Record<string, number> = {};
    if (currentTier >= this.maxGearTier) return needs;

    const equippedCounts = countBy(equipped, (id) => id);

    for (const gearTier of gearLevels) {
      if (gearTier.tier < currentTier || gearTier.tier > this.maxGearTier) continue;

      if (gearTier.tier === currentTier) {
        const seen: Record<string, number> = {};
        for (const gearId of gearTier.gear) {
          seen[gearId] = (seen[gearId] ?? 0) + 1;
          if (seen[gearId] <= (equippedCounts[gearId] ?? 0)) continue;
          accumulateNeeds(needs, this.resolver.resolve(gearId));
        }
        continue;
      }

      for (const gearId of gearTier.gear) {
        accumulateNeeds(needs, this.resolver.resolve(gearId));
      }
    }

    return needs;
  }
}
