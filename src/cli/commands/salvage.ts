/**
 * Salvage Analysis Command
 *
 * Ranks a player's characters by the raw salvage still needed to reach max gear.
 */

import { CliContext } from "../context";
import { SalvageReportRow } from "../../models/types";
import { GearRepository } from "../../data/GearRepository";
import { SalvageResolver } from "../../calculators/salvage";
import { CharacterRequirementCalculator } from "../../calculators/characterRequirements";
import { RosterAnalyzer } from "../../calculators/rosterAnalysis";
import { formatSalvageReport } from "../../output/display";

/**
 * Options for salvage analysis.
 */
export interface SalvageOptions {
  /** Normalized ally code of the player */
  allyCode: string;
  /** Maximum characters to display */
  limit?: number;
}

/**
 * Result of salvage analysis.
 */
export interface SalvageResult {
  playerName: string;
  rows: SalvageReportRow[];
  report: string;
}

/**
 * Run salvage analysis and return rows plus formatted output.
 */
export async function runSalvageAnalysis(ctx: CliContext, options: SalvageOptions): Promise<SalvageResult> {
  const { allyCode, limit } = options;

  const gear = new GearRepository(await ctx.client.getGear());
  ctx.onProgress(`Loaded ${gear.size} gear recipes.`);

  const player = await ctx.client.getPlayer(allyCode);
  ctx.onProgress(`Analyzing ${player.units.length} units for ${player.name}...`);

  const resolver = new SalvageResolver(gear, ctx.config);
  const calculator = new CharacterRequirementCalculator(resolver, ctx.config);
  const analyzer = new RosterAnalyzer(calculator, ctx.units, ctx.config);
  const rows = analyzer.analyzeRoster(player.units);

  return {
    playerName: player.name,
    rows,
    report: formatSalvageReport(rows, { limit, config: ctx.config }),
  };
}

/**
 * Print salvage analysis to console.
 */
export async function printSalvageAnalysis(ctx: CliContext, options: SalvageOptions): Promise<void> {
  const result = await runSalvageAnalysis(ctx, options);
  console.log("");
  console.log(result.report);
}
