import { GearPiece, OwnedUnit, PlayerRoster, Unit } from "../models/types";
import { PlatoonRequirements, UnitRequirement } from "../models/platoonTypes";

/**
 * Small, hand-checkable catalogs.
 *
 * Gear (tracked salvage: 172Salvage, 173Salvage, 174Salvage):
 * - 172Prototype   = 50x 172Salvage + credits         -> { 172Salvage: 50 }
 * - 172PrototypeB  = 50x 172Salvage                   -> { 172Salvage: 50 }
 * - 173Prototype   = 50x 173Salvage                   -> { 173Salvage: 50 }
 * - 172Component   = 172Prototype + 173Prototype      -> { 172Salvage: 50, 173Salvage: 50 }
 * - diamondTop     = 172Prototype + 172PrototypeB     -> { 172Salvage: 100 }
 * - sharedTop      = 2x 172Component + 172Prototype   -> { 172Salvage: 150, 173Salvage: 100 }
 * - 174Kit         = 20x 174Salvage + 5x 001          -> { 174Salvage: 20 }
 * - mk1            = 3x 001                           -> {}
 * - loopA <-> loopB form a cycle
 */

// ============================================================================
// Gear
// ============================================================================

function raw(baseId: string, tier: number = 1): GearPiece {
  return { baseId, name: baseId, tier, ingredients: [] };
}

function craft(baseId: string, ingredients: [string, number][], tier: number = 12): GearPiece {
  return {
    baseId,
    name: baseId,
    tier,
    ingredients: ingredients.map(([gearId, amount]) => ({ gearId, amount })),
  };
}

export function getTestGear(): GearPiece[] {
  return [
    raw("172Salvage"),
    raw("173Salvage"),
    raw("174Salvage"),
    raw("001"),
    craft("172Prototype", [
      ["172Salvage", 50],
      ["GRIND", 1000],
    ]),
    craft("172PrototypeB", [["172Salvage", 50]]),
    craft("173Prototype", [["173Salvage", 50]]),
    craft("172Component", [
      ["172Prototype", 1],
      ["173Prototype", 1],
    ]),
    craft("diamondTop", [
      ["172Prototype", 1],
      ["172PrototypeB", 1],
    ]),
    craft("sharedTop", [
      ["172Component", 2],
      ["172Prototype", 1],
    ]),
    craft("174Kit", [
      ["174Salvage", 20],
      ["001", 5],
    ]),
    craft("mk1", [["001", 3]], 1),
    craft("loopA", [["loopB", 1]]),
    craft("loopB", [["loopA", 1]]),
  ];
}

// ============================================================================
// Units
// ============================================================================

/**
 * HERO from G11 with 172Prototype equipped needs:
 *   G11: 174Kit                                   -> 174Salvage 20
 *   G12: 172Component + 173Prototype + 172Prototype -> 172Salvage 100, 173Salvage 100
 *   total 220
 */
export const hero: Unit = {
  baseId: "HERO",
  name: "Hero of Light",
  combatType: "character",
  alignment: "light",
  categories: ["Jedi"],
  gearLevels: [
    { tier: 10, gear: ["174Kit"] },
    { tier: 11, gear: ["mk1", "172Prototype", "174Kit"] },
    { tier: 12, gear: ["172Component", "173Prototype", "172Prototype"] },
    { tier: 13, gear: [] },
  ],
};

/** VILLAIN from G12 with nothing equipped needs 172Salvage 100 */
export const villain: Unit = {
  baseId: "VILLAIN",
  name: "Villain of Dark",
  combatType: "character",
  alignment: "dark",
  categories: ["Sith"],
  gearLevels: [
    { tier: 12, gear: ["172Prototype", "172Prototype", "mk1"] },
    { tier: 13, gear: [] },
  ],
};

/** Needs no tracked salvage at any tier */
export const sidekick: Unit = {
  baseId: "SIDEKICK",
  name: "Sidekick",
  combatType: "character",
  alignment: "neutral",
  categories: [],
  gearLevels: [{ tier: 12, gear: ["mk1", "mk1"] }],
};

export const darkShip: Unit = {
  baseId: "SHIP1",
  name: "Dark Interceptor",
  combatType: "ship",
  alignment: "dark",
  categories: [],
  gearLevels: [],
};

export const lightShip: Unit = {
  baseId: "SHIP2",
  name: "Light Cruiser",
  combatType: "ship",
  alignment: "light",
  categories: [],
  gearLevels: [],
};

export function getTestUnits(): Unit[] {
  return [hero, villain, sidekick, darkShip, lightShip];
}

// ============================================================================
// Rosters
// ============================================================================

export function owned(baseId: string, overrides: Partial<OwnedUnit> = {}): OwnedUnit {
  return {
    baseId,
    name: baseId,
    combatType: "character",
    gearLevel: 13,
    rarity: 7,
    relicTier: null,
    gear: [],
    ...overrides,
  };
}

export function roster(name: string, allyCode: number, units: OwnedUnit[]): PlayerRoster {
  return { name, allyCode, guildId: "guild-1", guildName: "Test Guild", units };
}

/**
 * Effective tiers (relic = encoded - 2, ships need 7 stars):
 *
 * | Player | VILLAIN | HERO        | Ships                      |
 * |--------|---------|-------------|----------------------------|
 * | Alice  | R7      | R5          | SHIP1 7*                   |
 * | Bob    | R9      | - (enc. 2)  | SHIP1 6* (not eligible)    |
 * | Cara   | R6      | - (null)    | SHIP2 7*, plus unknown unit|
 * | Dan    | R1      | R8          |                            |
 */
export function getTestRosters(): PlayerRoster[] {
  return [
    roster("Alice", 111111111, [
      owned("VILLAIN", { relicTier: 9 }),
      owned("HERO", { relicTier: 7 }),
      owned("SHIP1", { combatType: "ship", rarity: 7 }),
    ]),
    roster("Bob", 222222222, [
      owned("VILLAIN", { relicTier: 11 }),
      owned("HERO", { relicTier: 2 }),
      owned("SHIP1", { combatType: "ship", rarity: 6 }),
    ]),
    roster("Cara", 333333333, [
      owned("VILLAIN", { relicTier: 8 }),
      owned("HERO", { relicTier: null }),
      owned("SHIP2", { combatType: "ship", rarity: 7 }),
      owned("NOT_IN_CATALOG", { relicTier: 11 }),
    ]),
    roster("Dan", 444444444, [owned("HERO", { relicTier: 10 }), owned("VILLAIN", { relicTier: 3 })]),
  ];
}

// ============================================================================
// Requirements
// ============================================================================

export function requirement(overrides: Partial<UnitRequirement> & Pick<UnitRequirement, "unitId">): UnitRequirement {
  return {
    unitName: overrides.unitId,
    minRelic: 5,
    path: "dark_side",
    territory: "Mustafar",
    count: 1,
    unitType: "character",
    ...overrides,
  };
}

/**
 * Against getTestRosters():
 *
 * | # | Unit    | Min | Path       | Territory | Need | Available        |
 * |---|---------|-----|------------|-----------|------|------------------|
 * | 0 | VILLAIN | 7   | dark_side  | Mustafar  | 2    | Alice, Bob       |
 * | 1 | HERO    | 6   | light_side | Coruscant | 3    | Dan              |
 * | 2 | SHIP1   | 7   | dark_side  | Mustafar  | 1    | Alice            |
 * | 3 | VILLAIN | 7   | dark_side  | Geonosis  | 1    | Alice, Bob       |
 * | 4 | MISSING | 5   | neutral    | Corellia  | 2    | (none)           |
 * | 5 | HERO    | 5   | light_side | Coruscant | 1    | Alice, Dan       |
 */
export function getTestRequirements(): PlatoonRequirements {
  return {
    version: "1.0",
    lastUpdated: "2026-10-01",
    requirements: [
      requirement({ unitId: "VILLAIN", minRelic: 7, path: "dark_side", territory: "Mustafar", count: 2 }),
      requirement({ unitId: "HERO", minRelic: 6, path: "light_side", territory: "Coruscant", count: 3 }),
      requirement({ unitId: "SHIP1", minRelic: 7, path: "dark_side", territory: "Mustafar", count: 1, unitType: "ship" }),
      requirement({ unitId: "VILLAIN", minRelic: 7, path: "dark_side", territory: "Geonosis", count: 1 }),
      requirement({ unitId: "MISSING", minRelic: 5, path: "neutral", territory: "Corellia", count: 2 }),
      requirement({ unitId: "HERO", minRelic: 5, path: "light_side", territory: "Coruscant", count: 1 }),
    ],
  };
}

// ============================================================================
// API payloads
// ============================================================================

export const unitsPayload = {
  data: [
    {
      base_id: "HERO",
      name: "Hero of Light",
      combat_type: 1,
      alignment: 1,
      categories: ["Jedi"],
      gear_levels: [
        { tier: 12, gear: ["172Prototype"] },
        { tier: 13, gear: [] },
      ],
    },
    {
      base_id: "SHIP1",
      name: "Dark Interceptor",
      combat_type: 2,
      alignment: 2,
      categories: [],
      gear_levels: [],
    },
  ],
  message: null,
  total_count: 2,
};

export const gearPayload = [
  { base_id: "172Salvage", name: "Shock Prod Salvage", tier: 1, ingredients: [] },
  {
    base_id: "172Prototype",
    name: "Shock Prod Prototype",
    tier: 12,
    ingredients: [
      { amount: 50, gear: "172Salvage" },
      { amount: 1000, gear: "GRIND" },
    ],
  },
];

export function playerPayload(allyCode: number, name: string, guildId: string | null = "guild-1") {
  return {
    data: { ally_code: allyCode, name, guild_id: guildId, guild_name: guildId ? "Test Guild" : null },
    units: [
      {
        data: {
          base_id: "HERO",
          name: "Hero of Light",
          gear_level: 12,
          rarity: 7,
          combat_type: 1,
          relic_tier: 1,
          gear: [
            { slot: 0, is_obtained: false, base_id: "172Prototype" },
          ],
        },
      },
      {
        data: {
          base_id: "SHIP1",
          name: "Dark Interceptor",
          gear_level: 1,
          rarity: 7,
          combat_type: 2,
          relic_tier: null,
        },
      },
    ],
  };
}

export const guildPayload = {
  data: {
    guild_id: "guild-1",
    name: "Test Guild",
    members: [
      { ally_code: 111111111, player_name: "Alice" },
      { ally_code: 22222222, player_name: "Bob" },
      { ally_code: null, player_name: "Left Guild" },
    ],
  },
};
