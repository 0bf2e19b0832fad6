import { z } from "zod";
import { DataFormatError } from "../errors";
import {
  Alignment,
  GearPiece,
  GuildProfile,
  PlayerRoster,
  Unit,
  UnitKind,
} from "../models/types";
import { PlatoonRequirements } from "../models/platoonTypes";
import {
  ApiGearResponse,
  ApiGuildResponse,
  ApiPlayerResponse,
  ApiUnitsResponse,
  PlatoonRequirementsFile,
  describeIssues,
} from "./schemas";

/**
 * Validate a payload against a schema, failing hard on mismatch
 */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  source: string
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new DataFormatError(source, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Convert the API combat type code (1 = character, 2 = ship)
 */
export function toUnitKind(combatType: number): UnitKind {
  return combatType === 2 ? "ship" : "character";
}

/**
 * Convert the API alignment code (1 = light, 2 = dark, 3 = neutral)
 */
export function toAlignment(alignment: number): Alignment {
  switch (alignment) {
    case 1:
      return "light";
    case 2:
      return "dark";
    default:
      return "neutral";
  }
}

export function mapUnits(response: ApiUnitsResponse): Unit[] {
  return response.data.map((u) => ({
    baseId: u.base_id,
    name: u.name,
    combatType: toUnitKind(u.combat_type),
    alignment: toAlignment(u.alignment),
    categories: [...u.categories],
    gearLevels: u.gear_levels.map((g) => ({ tier: g.tier, gear: [...g.gear] })),
  }));
}

export function mapGear(response: ApiGearResponse): GearPiece[] {
  return response.map((g) => ({
    baseId: g.base_id,
    name: g.name,
    tier: g.tier,
    ingredients: (g.ingredients ?? []).map((i) => ({ gearId: i.gear, amount: i.amount })),
  }));
}

export function mapPlayer(response: ApiPlayerResponse): PlayerRoster {
  const { data, units } = response;
  return {
    name: data.name,
    allyCode: data.ally_code,
    guildId: data.guild_id ?? "",
    guildName: data.guild_name ?? "",
    units: units.map(({ data: u }) => ({
      baseId: u.base_id,
      name: u.name,
      combatType: toUnitKind(u.combat_type),
      gearLevel: u.gear_level,
      rarity: u.rarity,
      relicTier: u.relic_tier ?? null,
      gear: u.gear.map((s) => ({ slot: s.slot, baseId: s.base_id, isObtained: s.is_obtained })),
    })),
  };
}

export function mapGuild(response: ApiGuildResponse): GuildProfile {
  const memberAllyCodes: string[] = [];
  for (const member of response.data.members) {
    if (member.ally_code !== null && member.ally_code !== undefined) {
      memberAllyCodes.push(String(member.ally_code).padStart(9, "0"));
    }
  }
  return {
    guildId: response.data.guild_id,
    name: response.data.name,
    memberAllyCodes,
  };
}

export function mapRequirements(file: PlatoonRequirementsFile): PlatoonRequirements {
  return {
    version: file.version,
    lastUpdated: file.last_updated,
    notes: file.notes ?? undefined,
    requirements: file.requirements.map((r) => ({
      unitId: r.unit_id,
      unitName: r.unit_name,
      minRelic: r.min_relic,
      path: r.path,
      territory: r.territory,
      count: r.count,
      unitType: r.unit_type,
    })),
  };
}
