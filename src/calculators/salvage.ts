/**
 * Salvage Resolution
 *
 * Reduces a gear piece to the raw salvage needed to craft it by walking the
 * recipe graph. Only the configured tracked salvage ids are counted.
 */

import { NeedMap } from "../models/types";
import { GearRepository } from "../data/GearRepository";
import { AnalysisConfig, DEFAULT_CONFIG } from "../config/analysisConfig";
import { CyclicDependencyError } from "../errors";

const EMPTY_NEEDS: NeedMap = Object.freeze({});

/**
 * Add `source * multiplier` into `target` in place.
 */
export function accumulateNeeds(
  target: Record<string, number>,
  source: NeedMap,
  multiplier: number = 1
): void {
  for (const [salvageId, count] of Object.entries(source)) {
    const amount = count * multiplier;
    if (amount === 0) continue;
    target[salvageId] = (target[salvageId] ?? 0) + amount;
  }
}

/**
 * Sum of all counts in a need map
 */
export function totalNeeds(needs: NeedMap): number {
  let total = 0;
  for (const count of Object.values(needs)) {
    total += count;
  }
  return total;
}

export function isEmptyNeeds(needs: NeedMap): boolean {
  return Object.keys(needs).length === 0;
}

/**
 * Resolves gear ids to raw salvage quantities.
 *
 * Results are memoized per gear id for the lifetime of the resolver; the
 * catalog is never mutated so the cache is safe to share across calls.
 * Returned maps are frozen and shared, copy before modifying.
 */
export class SalvageResolver {
  private readonly gear: GearRepository;
  private readonly tracked: ReadonlySet<string>;
  private readonly currencySentinel: string;
  private readonly cache: Map<string, NeedMap> = new Map();

  constructor(gear: GearRepository, config: AnalysisConfig = DEFAULT_CONFIG) {
    this.gear = gear;
    this.tracked = new Set(Object.keys(config.salvage.trackedSalvage));
    this.currencySentinel = config.salvage.currencySentinel;
  }

  /**
   * Whether a salvage id is counted
   */
  isTracked(salvageId: string): boolean {
    return this.tracked.has(salvageId);
  }

  /**
   * Raw tracked salvage needed to craft one `gearId`.
   *
   * Unknown ids resolve to an empty map. A shared sub-ingredient reached
   * through two parents is counted once per parent.
   *
   * @throws CyclicDependencyError if the recipe graph loops back on itself
   *
   * @example
   * ```ts
   * // "172" = 1x "172Prototype" (50x 172Salvage) + 1x "173Prototype" (50x 173Salvage)
   * resolver.resolve("172"); // { "172Salvage": 50, "173Salvage": 50 }
   * ```
   */
  resolve(gearId: string): NeedMap {
    return this.resolveWithin(gearId, []);
  }

  private resolveWithin(gearId: string, path: string[]): NeedMap {
    const cached = this.cache.get(gearId);
    if (cached) return cached;

    if (path.includes(gearId)) {
      throw new CyclicDependencyError([...path.slice(path.indexOf(gearId)), gearId]);
    }

    const piece = this.gear.getById(gearId);
    if (!piece) return EMPTY_NEEDS;

    if (this.gear.isRawMaterial(piece)) {
      const needs: NeedMap = this.tracked.has(gearId) ? Object.freeze({ [gearId]: 1 }) : EMPTY_NEEDS;
      this.cache.set(gearId, needs);
      return needs;
    }

    path.push(gearId);
    const needs: Record<string, number> = {};

    for (const { gearId: ingredientId, amount } of piece.ingredients) {
      if (ingredientId === this.currencySentinel) continue;

      if (this.tracked.has(ingredientId)) {
        accumulateNeeds(needs, { [ingredientId]: amount });
      } else {
        accumulateNeeds(needs, this.resolveWithin(ingredientId, path), amount);
      }
    }

    path.pop();
    const frozen = Object.freeze(needs);
    this.cache.set(gearId, frozen);
    return frozen;
  }
}
