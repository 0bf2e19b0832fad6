import { orderBy, uniqBy } from "es-toolkit";
import { PlatoonRequirements, ScarceUnit } from "../models/platoonTypes";
import { AnalysisConfig, DEFAULT_CONFIG } from "../config/analysisConfig";
import { CoverageMatrix } from "./coverageMatrix";

/**
 * Demand for one unit at one minimum level, merged across territories
 */
interface UnitDemand {
  unitId: string;
  minRelic: number;
  territories: string[];
  totalSlots: number;
}

/**
 * Identifies required units owned by very few guild members.
 */
export class BottleneckAnalyzer {
  private readonly matrix: CoverageMatrix;
  private readonly requirements: PlatoonRequirements;
  private readonly scarcityThreshold: number;

  constructor(
    matrix: CoverageMatrix,
    requirements: PlatoonRequirements,
    config: AnalysisConfig = DEFAULT_CONFIG
  ) {
    this.matrix = matrix;
    this.requirements = requirements;
    this.scarcityThreshold = config.bottlenecks.scarcityThreshold;
  }

  /**
   * Merge requirements sharing (unit, minimum level)
   */
  private collectDemand(): UnitDemand[] {
    const demand = new Map<string, UnitDemand>();

    for (const req of this.requirements.requirements) {
      const key = `${req.unitId}@${req.minRelic}`;
      let entry = demand.get(key);
      if (!entry) {
        entry = { unitId: req.unitId, minRelic: req.minRelic, territories: [], totalSlots: 0 };
        demand.set(key, entry);
      }
      entry.territories.push(req.territory);
      entry.totalSlots += req.count;
    }

    return [...demand.values()];
  }

  /**
   * Units with at most `scarcityThreshold` owners at the required level,
   * fewest owners first, then most slots needed.
   */
  identifyScarceUnits(): ScarceUnit[] {
    const scarce: ScarceUnit[] = [];

    for (const { unitId, minRelic, territories, totalSlots } of this.collectDemand()) {
      const owners = uniqBy(this.matrix.playersAtOrAbove(unitId, minRelic), (p) => p.allyCode);
      const ownerCount = owners.length;
      if (ownerCount > this.scarcityThreshold) continue;

      scarce.push({
        unitId,
        unitName: this.matrix.getCoverage(unitId)?.unitName ?? unitId,
        minRelic,
        ownerNames: owners.map((p) => p.playerName),
        ownerCount,
        territoriesNeeded: territories,
        totalSlotsNeeded: totalSlots,
        isSoleOwner: ownerCount === 1,
        isCritical: ownerCount < 3,
      });
    }

    return orderBy(scarce, ["ownerCount", "totalSlotsNeeded"], ["asc", "desc"]);
  }
}
