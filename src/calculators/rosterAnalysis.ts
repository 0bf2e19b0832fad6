import { orderBy, sumBy } from "es-toolkit";
import { OwnedUnit, SalvageReportRow } from "../models/types";
import { UnitRepository } from "../data/UnitRepository";
import { AnalysisConfig, DEFAULT_CONFIG } from "../config/analysisConfig";
import { CharacterRequirementCalculator } from "./characterRequirements";
import { isEmptyNeeds, totalNeeds } from "./salvage";

/**
 * Runs the requirement calculator over every unit a player owns.
 */
export class RosterAnalyzer {
  private readonly calculator: CharacterRequirementCalculator;
  private readonly units: UnitRepository;
  private readonly maxGearTier: number;

  constructor(
    calculator: CharacterRequirementCalculator,
    units: UnitRepository,
    config: AnalysisConfig = DEFAULT_CONFIG
  ) {
    this.calculator = calculator;
    this.units = units;
    this.maxGearTier = config.salvage.maxGearTier;
  }

  /**
   * Salvage needs for one owned unit, or null when it needs nothing
   * (maxed, unknown to the catalog, or no tracked salvage left).
   */
  analyzeUnit(owned: OwnedUnit): SalvageReportRow | null {
    if (owned.gearLevel >= this.maxGearTier) return null;

    const unit = this.units.getById(owned.baseId);
    if (!unit) return null;

    const equipped = owned.gear.filter((slot) => slot.isObtained).map((slot) => slot.baseId);
    const needs = this.calculator.compute(unit.gearLevels, owned.gearLevel, equipped);
    if (isEmptyNeeds(needs)) return null;

    return {
      unitId: unit.baseId,
      name: unit.name,
      currentTier: owned.gearLevel,
      needs,
      total: totalNeeds(needs),
    };
  }

  /**
   * Report rows for every unit that still needs salvage, largest total first
   */
  analyzeRoster(ownedUnits: readonly OwnedUnit[]): SalvageReportRow[] {
    const rows: SalvageReportRow[] = [];
    for (const owned of ownedUnits) {
      const row = this.analyzeUnit(owned);
      if (row) rows.push(row);
    }
    return orderBy(rows, ["total"], ["desc"]);
  }
}

/**
 * Salvage totals across report rows
 */
export function summarizeReport(rows: readonly SalvageReportRow[]): { characters: number; totalSalvage: number } {
  return {
    characters: rows.length,
    totalSalvage: sumBy(rows, (r) => r.total),
  };
}
