import {
  GapSeverity,
  PlatoonGap,
  PlatoonRequirements,
  UnitRequirement,
} from "../models/platoonTypes";
import { AnalysisConfig, DEFAULT_CONFIG, GapSettings } from "../config/analysisConfig";
import { CoverageMatrix } from "./coverageMatrix";
import { coverageRatio } from "./coverage";

/**
 * Classify how well `playersAvailable` covers `slotsNeeded`.
 *
 * - surplus >= overfillMargin: overfilled
 * - surplus >= warningThreshold: healthy
 * - any other surplus (including none): warning
 * - shortfall with fewer than criticalThreshold players: critical
 * - any other shortfall: warning
 *
 * With the default settings the overfilled and healthy bands coincide, so
 * every non-negative surplus below 10 is a warning.
 */
export function classifySeverity(
  playersAvailable: number,
  slotsNeeded: number,
  settings: GapSettings = DEFAULT_CONFIG.gaps
): GapSeverity {
  if (playersAvailable >= slotsNeeded + settings.overfillMargin) {
    return "overfilled";
  }
  if (playersAvailable >= slotsNeeded) {
    const buffer = playersAvailable - slotsNeeded;
    return buffer >= settings.warningThreshold ? "healthy" : "warning";
  }
  return playersAvailable < settings.criticalThreshold ? "critical" : "warning";
}

/**
 * Finds platoon requirements the guild cannot fully staff.
 */
export class GapAnalyzer {
  private readonly matrix: CoverageMatrix;
  private readonly requirements: PlatoonRequirements;
  private readonly settings: GapSettings;

  constructor(
    matrix: CoverageMatrix,
    requirements: PlatoonRequirements,
    config: AnalysisConfig = DEFAULT_CONFIG
  ) {
    this.matrix = matrix;
    this.requirements = requirements;
    this.settings = config.gaps;
  }

  classifySeverity(playersAvailable: number, slotsNeeded: number): GapSeverity {
    return classifySeverity(playersAvailable, slotsNeeded, this.settings);
  }

  analyzeRequirement(req: UnitRequirement): PlatoonGap {
    const players = this.matrix.playersAtOrAbove(req.unitId, req.minRelic);
    const playersAvailable = players.length;

    return {
      unitId: req.unitId,
      unitName: this.matrix.getCoverage(req.unitId)?.unitName ?? req.unitId,
      path: req.path,
      territory: req.territory,
      minRelic: req.minRelic,
      slotsNeeded: req.count,
      playersAvailable,
      playerNames: players.map((p) => p.playerName),
      coverageRatio: coverageRatio(playersAvailable, this.matrix.memberCount),
      severity: this.classifySeverity(playersAvailable, req.count),
      slotsUnfillable: Math.max(0, req.count - playersAvailable),
      isGap: playersAvailable < req.count,
    };
  }

  /**
   * Every requirement analyzed, in requirement order
   */
  analyzeAll(): PlatoonGap[] {
    return this.requirements.requirements.map((req) => this.analyzeRequirement(req));
  }

  /**
   * Shortfalls with almost no available players
   */
  getCriticalGaps(): PlatoonGap[] {
    return this.analyzeAll().filter((gap) => gap.severity === "critical" && gap.isGap);
  }

  /**
   * Every requirement with fewer players than slots
   */
  getAllGaps(): PlatoonGap[] {
    return this.analyzeAll().filter((gap) => gap.isGap);
  }

  /**
   * Unfillable slots grouped by minimum relic, then unit name
   */
  unfillableByTier(): Map<number, Map<string, number>> {
    const byTier = new Map<number, Map<string, number>>();

    for (const gap of this.getAllGaps()) {
      if (gap.slotsUnfillable === 0) continue;

      let units = byTier.get(gap.minRelic);
      if (!units) {
        units = new Map();
        byTier.set(gap.minRelic, units);
      }
      units.set(gap.unitName, (units.get(gap.unitName) ?? 0) + gap.slotsUnfillable);
    }

    return byTier;
  }
}
