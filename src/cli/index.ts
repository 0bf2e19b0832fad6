#!/usr/bin/env node
/**
 * SWGOH Roster Tools CLI
 *
 * Salvage planning for a single player and Territory Battle platoon
 * coverage for a whole guild, using data from swgoh.gg.
 */

import { Command, InvalidArgumentError } from "commander";
import { initializeContext, CliContextOptions } from "./context";
import { resolveAllyCode } from "./prompts";
import { printSalvageAnalysis } from "./commands/salvage";
import { printPlatoonAnalysis } from "./commands/platoons";
import { ResponseCache } from "../data/ResponseCache";
import { loadEnvFile, loadEnvironment } from "../config/environment";

loadEnvFile();

const program = new Command();

program
  .name("swgoh-tools")
  .description("Kyrotech salvage planner and Territory Battle platoon analyzer for swgoh.gg rosters")
  .version("1.0.0")
  .option("--no-cache", "Always fetch from the API")
  .option("--cache-dir <dir>", "Response cache directory (overrides SWGOH_CACHE_DIR)")
  .option("--quiet", "Suppress progress output")
  .addHelpText(
    "after",
    `
Examples:
  $ swgoh-tools salvage 123-456-789             Rank characters by kyrotech salvage needed
  $ swgoh-tools salvage 123456789 -l 10         Show the top 10 only
  $ swgoh-tools platoons 123-456-789            Platoon coverage for the player's guild
  $ swgoh-tools platoons 123-456-789 --max-phase 3b
                                                Only territories up to phase 3b
  $ swgoh-tools --no-cache platoons 123-456-789 --sequential --delay 2000
                                                Fetch rosters one at a time

Environment (read from the shell, then from ./.env):
  SWGOH_API_KEY is required. See SWGOH_API_BASE_URL, SWGOH_CACHE_DIR,
  SWGOH_CACHE_TTL_HOURS, SWGOH_FETCH_CONCURRENCY and SWGOH_FETCH_DELAY_MS
  for the other settings.
`
  );

/**
 * Options shared by every command
 */
interface GlobalOptions {
  noCache: boolean;
  cacheDir?: string;
  quiet: boolean;
}

function getGlobalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  return {
    noCache: opts.cache === false,
    cacheDir: typeof opts.cacheDir === "string" ? opts.cacheDir : undefined,
    quiet: opts.quiet === true,
  };
}

/**
 * Context options from the global flags
 */
function contextOptions(command: Command): CliContextOptions {
  const { noCache, cacheDir, quiet } = getGlobalOptions(command);
  return {
    noCache,
    cacheDir,
    onProgress: quiet ? undefined : (msg) => console.log(msg),
  };
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parsed;
}

function reportError(error: unknown): never {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
}

// ─────────────────────────────────────────────────────────────
// salvage command
// ─────────────────────────────────────────────────────────────

interface SalvageCommandOptions {
  limit?: number;
}

program
  .command("salvage")
  .description("Rank a player's characters by raw kyrotech salvage needed to reach max gear")
  .argument("[allyCode]", "Player ally code (prompted for when omitted)")
  .option("-l, --limit <number>", "Maximum characters to display", parsePositiveInt)
  .action(async function (this: Command, allyCode: string | undefined, options: SalvageCommandOptions) {
    try {
      const code = await resolveAllyCode(allyCode);
      const ctx = await initializeContext(contextOptions(this));
      await printSalvageAnalysis(ctx, { allyCode: code, limit: options.limit });
    } catch (error) {
      reportError(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// platoons command
// ─────────────────────────────────────────────────────────────

interface PlatoonsCommandOptions {
  maxPhase?: string;
  requirements?: string;
  sequential?: boolean;
  concurrency?: number;
  delay?: number;
}

program
  .command("platoons")
  .description("Check a guild's rosters against Territory Battle platoon requirements")
  .argument("[allyCode]", "Ally code of any guild member (prompted for when omitted)")
  .option("--max-phase <phase>", "Only include territories up to this phase (e.g. 4, 3b)")
  .option("-r, --requirements <path>", "Platoon requirements JSON file")
  .option("--sequential", "Fetch member rosters one at a time")
  .option("-c, --concurrency <number>", "Parallel roster requests per batch", parsePositiveInt)
  .option("--delay <ms>", "Pause between sequential requests", parseNonNegativeInt)
  .action(async function (this: Command, allyCode: string | undefined, options: PlatoonsCommandOptions) {
    try {
      const code = await resolveAllyCode(allyCode);
      const ctx = await initializeContext(contextOptions(this));
      await printPlatoonAnalysis(ctx, {
        allyCode: code,
        maxPhase: options.maxPhase,
        requirementsPath: options.requirements,
        sequential: options.sequential,
        concurrency: options.concurrency,
        delayMs: options.delay,
      });
    } catch (error) {
      reportError(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// clear-cache command
// ─────────────────────────────────────────────────────────────

program
  .command("clear-cache")
  .description("Delete every cached API response")
  .action(async function (this: Command) {
    try {
      const { cacheDir } = getGlobalOptions(this);
      const dir = cacheDir ?? loadEnvironment().cacheDir;
      await new ResponseCache({ cacheDir: dir }).clearAll();
      console.log(`Cleared cache in ${dir}`);
    } catch (error) {
      reportError(error);
    }
  });

// Default to showing help if no command specified
program.action(() => {
  program.help();
});

program.parseAsync().catch(reportError);
