/**
 * Schemas for swgoh.gg API payloads.
 *
 * Only the fields the analyzers read are declared; anything else in a
 * payload is stripped during parsing.
 */

import { z } from "zod";

// ─────────────────────────────────────────────────────────────
// Units
// ─────────────────────────────────────────────────────────────

export const apiGearTierSchema = z.object({
  tier: z.number().int(),
  gear: z.array(z.string()),
});

export const apiUnitSchema = z.object({
  base_id: z.string(),
  name: z.string(),
  /** 1 = character, 2 = ship */
  combat_type: z.number().int(),
  /** 1 = light, 2 = dark, 3 = neutral */
  alignment: z.number().int(),
  categories: z.array(z.string()).default([]),
  gear_levels: z.array(apiGearTierSchema).default([]),
});

export const apiUnitsResponseSchema = z.object({
  data: z.array(apiUnitSchema),
  message: z.string().nullish(),
  total_count: z.number().int().nullish(),
});

// ─────────────────────────────────────────────────────────────
// Gear
// ─────────────────────────────────────────────────────────────

export const apiGearIngredientSchema = z.object({
  amount: z.number().int().nonnegative(),
  /** Gear base id, or "GRIND" for credits */
  gear: z.string(),
});

export const apiGearPieceSchema = z.object({
  base_id: z.string(),
  name: z.string(),
  tier: z.number().int(),
  ingredients: z.array(apiGearIngredientSchema).nullish(),
});

export const apiGearResponseSchema = z.array(apiGearPieceSchema);

// ─────────────────────────────────────────────────────────────
// Player
// ─────────────────────────────────────────────────────────────

export const apiGearSlotSchema = z.object({
  slot: z.number().int(),
  is_obtained: z.boolean(),
  base_id: z.string(),
});

export const apiUnitDataSchema = z.object({
  base_id: z.string(),
  name: z.string(),
  gear_level: z.number().int(),
  rarity: z.number().int(),
  combat_type: z.number().int(),
  relic_tier: z.number().int().nullish(),
  gear: z.array(apiGearSlotSchema).default([]),
});

export const apiPlayerResponseSchema = z.object({
  data: z.object({
    ally_code: z.number().int(),
    name: z.string(),
    guild_id: z.string().nullish(),
    guild_name: z.string().nullish(),
  }),
  units: z.array(z.object({ data: apiUnitDataSchema })).default([]),
});

// ─────────────────────────────────────────────────────────────
// Guild
// ─────────────────────────────────────────────────────────────

export const apiGuildMemberSchema = z.object({
  ally_code: z.number().int().nullish(),
  player_name: z.string().nullish(),
});

export const apiGuildResponseSchema = z.object({
  data: z.object({
    guild_id: z.string(),
    name: z.string(),
    members: z.array(apiGuildMemberSchema),
  }),
});

// ─────────────────────────────────────────────────────────────
// Platoon Requirements (local file)
// ─────────────────────────────────────────────────────────────

export const unitRequirementSchema = z.object({
  unit_id: z.string().min(1),
  unit_name: z.string(),
  min_relic: z.number().int().min(0).max(9),
  path: z.enum(["dark_side", "neutral", "light_side"]),
  territory: z.string().min(1),
  count: z.number().int().min(1).default(1),
  unit_type: z.enum(["character", "ship"]).default("character"),
});

export const platoonRequirementsSchema = z.object({
  version: z.string().default("1.0"),
  last_updated: z.string(),
  notes: z.string().nullish(),
  requirements: z.array(unitRequirementSchema).default([]),
});

export type ApiUnitsResponse = z.infer<typeof apiUnitsResponseSchema>;
export type ApiGearResponse = z.infer<typeof apiGearResponseSchema>;
export type ApiPlayerResponse = z.infer<typeof apiPlayerResponseSchema>;
export type ApiGuildResponse = z.infer<typeof apiGuildResponseSchema>;
export type PlatoonRequirementsFile = z.infer<typeof platoonRequirementsSchema>;

/**
 * Format zod issues as "path: message; path: message"
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
