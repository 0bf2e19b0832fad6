import {
  PlatoonRequirements,
  RequirementCoverage,
  TerritoryCoverage,
  TerritoryPath,
  UnitRequirement,
} from "../models/platoonTypes";
import { CoverageMatrix, UnitCoverage } from "./coverageMatrix";

// ─────────────────────────────────────────────────────────────
// Requirement Coverage
// ─────────────────────────────────────────────────────────────

/**
 * Fraction of the guild able to fill a slot (0 for an empty guild)
 */
export function coverageRatio(playersAvailable: number, memberCount: number): number {
  return memberCount > 0 ? playersAvailable / memberCount : 0;
}

/**
 * Matches the coverage matrix against platoon requirements.
 */
export class CoverageAnalyzer {
  private readonly matrix: CoverageMatrix;
  private readonly requirements: PlatoonRequirements;

  constructor(matrix: CoverageMatrix, requirements: PlatoonRequirements) {
    this.matrix = matrix;
    this.requirements = requirements;
  }

  analyzeRequirement(requirement: UnitRequirement): RequirementCoverage {
    const players = this.matrix.playersAtOrAbove(requirement.unitId, requirement.minRelic);

    return Object.freeze({
      requirement,
      playersAvailable: players.length,
      playerNames: Object.freeze(players.map((p) => p.playerName)),
      coverageRatio: coverageRatio(players.length, this.matrix.memberCount),
    });
  }

  analyzeAllRequirements(): RequirementCoverage[] {
    return this.requirements.requirements.map((req) => this.analyzeRequirement(req));
  }

  /**
   * Slot totals per (path, territory), in first-seen order.
   *
   * Covered slots are capped per requirement, so one player owning two
   * units needed in the same territory counts toward both.
   */
  summaryByTerritory(): TerritoryCoverage[] {
    const summary = new Map<string, { path: TerritoryPath; territory: string; totalSlots: number; coveredSlots: number }>();

    for (const req of this.requirements.requirements) {
      const key = `${req.path}\u0000${req.territory}`;
      let entry = summary.get(key);
      if (!entry) {
        entry = { path: req.path, territory: req.territory, totalSlots: 0, coveredSlots: 0 };
        summary.set(key, entry);
      }

      entry.totalSlots += req.count;
      const available = this.matrix.countAtOrAbove(req.unitId, req.minRelic);
      entry.coveredSlots += Math.min(available, req.count);
    }

    return [...summary.values()];
  }
}

// ─────────────────────────────────────────────────────────────
// Path Eligibility
// ─────────────────────────────────────────────────────────────

/**
 * Dark side path takes dark units, light side takes light units, neutral takes all
 */
export function isEligibleForPath(coverage: UnitCoverage, path: TerritoryPath): boolean {
  switch (path) {
    case "dark_side":
      return coverage.alignment === "dark";
    case "light_side":
      return coverage.alignment === "light";
    case "neutral":
      return true;
  }
}

/**
 * Covered units eligible for a path
 */
export function filterByPath(matrix: CoverageMatrix, path: TerritoryPath): UnitCoverage[] {
  return matrix.getAllCoverage().filter((c) => isEligibleForPath(c, path));
}

export function filterCharactersOnly(units: readonly UnitCoverage[]): UnitCoverage[] {
  return units.filter((c) => c.combatType === "character");
}
