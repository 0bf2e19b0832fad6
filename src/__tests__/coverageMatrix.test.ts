import { describe, it, expect } from "vitest";
import { UnitRepository } from "../data/UnitRepository";
import { CoverageMatrixBuilder } from "../calculators/coverageMatrix";
import { getTestRosters, getTestUnits, owned, roster } from "./fixtures";

describe("CoverageMatrixBuilder", () => {
  const builder = new CoverageMatrixBuilder(new UnitRepository(getTestUnits()));
  const matrix = builder.build(getTestRosters(), "Test Guild", "guild-1");

  describe("effectiveTier", () => {
    it("subtracts the relic offset for characters", () => {
      expect(builder.effectiveTier("character", 7, 7)).toBe(5);
      expect(builder.effectiveTier("character", 7, 3)).toBe(1);
      expect(builder.effectiveTier("character", 7, 11)).toBe(9);
    });

    it("treats encoded values below 3 and null as ineligible", () => {
      expect(builder.effectiveTier("character", 7, 2)).toBeNull();
      expect(builder.effectiveTier("character", 7, null)).toBeNull();
    });

    it("uses rarity for ships with a 7-star floor", () => {
      expect(builder.effectiveTier("ship", 7, null)).toBe(7);
      expect(builder.effectiveTier("ship", 6, null)).toBeNull();
    });
  });

  it("records guild details and member count", () => {
    expect(matrix.guildName).toBe("Test Guild");
    expect(matrix.guildId).toBe("guild-1");
    expect(matrix.memberCount).toBe(4);
  });

  it("covers only units with an eligible owner", () => {
    expect(matrix.unitCount).toBe(4);
    expect(matrix.getCoverage("SIDEKICK")).toBeUndefined();
    expect(matrix.getCoverage("NOT_IN_CATALOG")).toBeUndefined();
  });

  it("counts a relic-7 encoding at threshold 5 but not 6", () => {
    // Alice's HERO is encoded 7 (R5)
    expect(matrix.playersAtOrAbove("HERO", 5).map((p) => p.playerName)).toEqual(["Alice", "Dan"]);
    expect(matrix.playersAtOrAbove("HERO", 6).map((p) => p.playerName)).toEqual(["Dan"]);
  });

  it("leaves out ships below 7 stars entirely", () => {
    const ship = matrix.getCoverage("SHIP1");
    expect(ship?.tiers()).toEqual([7]);
    expect(ship?.playersAtTier(7).map((p) => p.playerName)).toEqual(["Alice"]);
    expect(matrix.countAtOrAbove("SHIP1", 0)).toBe(1);
  });

  it("stores exact tiers and sums at read time", () => {
    const villain = matrix.getCoverage("VILLAIN");
    expect(villain?.tiers()).toEqual([1, 6, 7, 9]);
    expect(villain?.playersAtTier(7)).toEqual([{ playerName: "Alice", allyCode: 111111111, tier: 7 }]);
    expect(matrix.countAtOrAbove("VILLAIN", 1)).toBe(4);
    expect(matrix.countAtOrAbove("VILLAIN", 7)).toBe(2);
    expect(matrix.countAtOrAbove("VILLAIN", 10)).toBe(0);
  });

  it("returns zero and empty lists for unknown units", () => {
    expect(matrix.countAtOrAbove("MISSING", 0)).toBe(0);
    expect(matrix.playersAtOrAbove("MISSING", 0)).toEqual([]);
  });

  it("carries unit metadata", () => {
    const hero = matrix.getCoverage("HERO");
    expect(hero?.unitName).toBe("Hero of Light");
    expect(hero?.alignment).toBe("light");
    expect(hero?.combatType).toBe("character");
    expect(hero?.categories).toEqual(["Jedi"]);
  });

  describe("getCoverageSummary", () => {
    it("counts owners at each summary threshold", () => {
      // VILLAIN tiers: 7, 9, 6, 1
      expect([...matrix.getCoverageSummary("VILLAIN")]).toEqual([
        [5, 3],
        [6, 3],
        [7, 2],
        [8, 1],
        [9, 1],
      ]);
    });

    it("is all zeros for an unknown unit", () => {
      expect([...matrix.getCoverageSummary("MISSING").values()]).toEqual([0, 0, 0, 0, 0]);
    });
  });

  it("builds an empty matrix from no rosters", () => {
    const empty = builder.build([], "Empty", "g0");
    expect(empty.memberCount).toBe(0);
    expect(empty.unitCount).toBe(0);
    expect(empty.getAllCoverage()).toEqual([]);
  });

  it("keeps one entry per roster even for repeated players", () => {
    const twice = roster("Alice", 111111111, [owned("VILLAIN", { relicTier: 9 })]);
    const m = builder.build([twice, twice], "Dup", "g1");
    expect(m.countAtOrAbove("VILLAIN", 7)).toBe(2);
  });
});
