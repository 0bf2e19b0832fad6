/**
 * Platoon Analysis Command
 *
 * Checks a guild's rosters against Territory Battle platoon requirements.
 */

import { CliContext } from "../context";
import { PlatoonAnalysis, PlatoonRequirements } from "../../models/platoonTypes";
import { DEFAULT_REQUIREMENTS_PATH, filterRequirementsByPhase, loadRequirements } from "../../data/requirements";
import { CoverageMatrixBuilder } from "../../calculators/coverageMatrix";
import { CoverageAnalyzer } from "../../calculators/coverage";
import { GapAnalyzer } from "../../calculators/gaps";
import { BottleneckAnalyzer } from "../../calculators/bottlenecks";
import { formatPlatoonReport } from "../../output/display";

/**
 * Options for platoon analysis.
 */
export interface PlatoonOptions {
  /** Normalized ally code of any guild member */
  allyCode: string;
  /** Only consider phases up to this label (e.g. "4", "3b") */
  maxPhase?: string;
  /** Requirements file path */
  requirementsPath?: string;
  /** Pre-loaded requirements (skips the file) */
  requirements?: PlatoonRequirements;
  /** Fetch rosters one at a time with a pause in between */
  sequential?: boolean;
  /** Parallel batch size (defaults to the environment setting) */
  concurrency?: number;
  /** Pause between sequential requests (defaults to the environment setting) */
  delayMs?: number;
}

/**
 * Result of platoon analysis.
 */
export interface PlatoonResult {
  analysis: PlatoonAnalysis;
  report: string;
}

/**
 * Run platoon analysis and return the analysis plus formatted output.
 */
export async function runPlatoonAnalysis(ctx: CliContext, options: PlatoonOptions): Promise<PlatoonResult> {
  const {
    allyCode,
    maxPhase,
    requirementsPath = DEFAULT_REQUIREMENTS_PATH,
    sequential = false,
    concurrency = ctx.environment.fetchConcurrency,
    delayMs = ctx.environment.fetchDelayMs,
  } = options;

  const guild = await ctx.client.getGuildFromAllyCode(allyCode);
  ctx.onProgress(`Guild: ${guild.name} (${guild.memberAllyCodes.length} members)`);

  const rosters = await ctx.client.getGuildRosters(guild.memberAllyCodes, {
    mode: sequential ? "sequential" : "parallel",
    concurrency,
    delayMs,
  });
  ctx.onProgress(`Successfully loaded data for ${rosters.length} guild members.`);

  ctx.onProgress("Building coverage matrix...");
  const matrix = new CoverageMatrixBuilder(ctx.units, ctx.config).build(rosters, guild.name, guild.guildId);
  ctx.onProgress(`Analyzed ${matrix.unitCount} unique units across roster.`);

  let requirements = options.requirements ?? (await loadRequirements(requirementsPath));
  if (maxPhase !== undefined) {
    requirements = filterRequirementsByPhase(requirements, maxPhase, {
      config: ctx.config,
      onWarning: (msg) => ctx.onProgress(`Warning: ${msg}`),
    });
    ctx.onProgress(`Filtered to ${requirements.requirements.length} requirements (up to phase ${maxPhase}).`);
  } else {
    ctx.onProgress(`Loaded ${requirements.requirements.length} platoon requirements.`);
  }

  const coverage = new CoverageAnalyzer(matrix, requirements);
  const gaps = new GapAnalyzer(matrix, requirements, ctx.config);
  const bottlenecks = new BottleneckAnalyzer(matrix, requirements, ctx.config);

  const analysis: PlatoonAnalysis = {
    guildName: matrix.guildName,
    guildId: matrix.guildId,
    memberCount: matrix.memberCount,
    unitsCovered: matrix.unitCount,
    requirementCount: requirements.requirements.length,
    territories: coverage.summaryByTerritory(),
    unfillableByTier: gaps.unfillableByTier(),
    criticalGaps: gaps.getCriticalGaps(),
    scarceUnits: bottlenecks.identifyScarceUnits(),
  };

  return {
    analysis,
    report: formatPlatoonReport(analysis, ctx.config),
  };
}

/**
 * Print platoon analysis to console.
 */
export async function printPlatoonAnalysis(ctx: CliContext, options: PlatoonOptions): Promise<void> {
  const result = await runPlatoonAnalysis(ctx, options);
  console.log("");
  console.log(result.report);
}
