import { describe, it, expect } from "vitest";
import { UnitRepository } from "../data/UnitRepository";
import { CoverageMatrixBuilder } from "../calculators/coverageMatrix";
import { BottleneckAnalyzer } from "../calculators/bottlenecks";
import { mergeConfig } from "../config/analysisConfig";
import { getTestRequirements, getTestRosters, getTestUnits, owned, requirement, roster } from "./fixtures";

describe("BottleneckAnalyzer", () => {
  const builder = new CoverageMatrixBuilder(new UnitRepository(getTestUnits()));
  const matrix = builder.build(getTestRosters(), "Test Guild", "guild-1");
  const scarce = new BottleneckAnalyzer(matrix, getTestRequirements()).identifyScarceUnits();

  it("sorts by owner count, then by slot demand", () => {
    expect(scarce.map((u) => `${u.unitId}@${u.minRelic}`)).toEqual([
      "MISSING@5",
      "HERO@6",
      "SHIP1@7",
      "VILLAIN@7",
      "HERO@5",
    ]);
  });

  it("merges a unit needed at the same level in several territories", () => {
    const villain = scarce.find((u) => u.unitId === "VILLAIN");
    expect(villain).toEqual({
      unitId: "VILLAIN",
      unitName: "Villain of Dark",
      minRelic: 7,
      ownerNames: ["Alice", "Bob"],
      ownerCount: 2,
      territoriesNeeded: ["Mustafar", "Geonosis"],
      totalSlotsNeeded: 3,
      isSoleOwner: false,
      isCritical: true,
    });
  });

  it("keeps different minimum levels apart", () => {
    expect(scarce.filter((u) => u.unitId === "HERO").map((u) => u.minRelic)).toEqual([6, 5]);
  });

  it("flags sole owners", () => {
    const hero = scarce.find((u) => u.unitId === "HERO" && u.minRelic === 6);
    expect(hero?.ownerNames).toEqual(["Dan"]);
    expect(hero?.isSoleOwner).toBe(true);
    expect(hero?.isCritical).toBe(true);
  });

  it("reports units nobody owns with zero owners", () => {
    const missing = scarce[0];
    expect(missing.unitName).toBe("MISSING");
    expect(missing.ownerCount).toBe(0);
    expect(missing.isSoleOwner).toBe(false);
  });

  it("leaves out units with more owners than the threshold", () => {
    const tight = new BottleneckAnalyzer(matrix, getTestRequirements(), mergeConfig({ bottlenecks: { scarcityThreshold: 1 } }));
    expect(tight.identifyScarceUnits().map((u) => `${u.unitId}@${u.minRelic}`)).toEqual([
      "MISSING@5",
      "HERO@6",
      "SHIP1@7",
    ]);
  });

  it("is not critical with exactly three owners", () => {
    // VILLAIN at R6: Alice (7), Bob (9), Cara (6)
    const result = new BottleneckAnalyzer(matrix, {
      version: "1.0",
      lastUpdated: "2026-10-01",
      requirements: [requirement({ unitId: "VILLAIN", minRelic: 6 })],
    }).identifyScarceUnits();
    expect(result).toHaveLength(1);
    expect(result[0].ownerCount).toBe(3);
    expect(result[0].isCritical).toBe(false);
  });

  it("counts a player listed twice once", () => {
    const alice = roster("Alice", 111111111, [owned("VILLAIN", { relicTier: 9 })]);
    const dup = builder.build([alice, alice], "Dup", "g1");
    const result = new BottleneckAnalyzer(dup, {
      version: "1.0",
      lastUpdated: "2026-10-01",
      requirements: [requirement({ unitId: "VILLAIN", minRelic: 7 })],
    }).identifyScarceUnits();
    expect(result[0].ownerCount).toBe(1);
    expect(result[0].ownerNames).toEqual(["Alice"]);
    expect(result[0].isSoleOwner).toBe(true);
  });
});
