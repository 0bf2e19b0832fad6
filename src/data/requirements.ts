/**
 * Platoon Requirements
 *
 * Loading the hand-maintained requirements file and narrowing it to the
 * phases a guild has reached.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { DataFormatError } from "../errors";
import { PlatoonRequirements } from "../models/platoonTypes";
import { AnalysisConfig, DEFAULT_CONFIG } from "../config/analysisConfig";
import { platoonRequirementsSchema } from "./schemas";
import { mapRequirements, parsePayload } from "./mappers";

export const DEFAULT_REQUIREMENTS_PATH = join("data", "platoon-requirements.json");

/**
 * Parse and validate requirements JSON text
 */
export function parseRequirements(json: string, source: string = "requirements"): PlatoonRequirements {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (err) {
    throw new DataFormatError(source, `not valid JSON (${String(err)})`);
  }
  return mapRequirements(parsePayload(platoonRequirementsSchema, payload, source));
}

/**
 * Load platoon requirements from a JSON file
 */
export async function loadRequirements(path: string = DEFAULT_REQUIREMENTS_PATH): Promise<PlatoonRequirements> {
  const json = await readFile(path, "utf-8");
  return parseRequirements(json, path);
}

export interface PhaseFilterOptions {
  config?: AnalysisConfig;
  /** Called when the phase label is unknown */
  onWarning?: (message: string) => void;
}

/**
 * Keep only requirements for territories in phases up to and including `maxPhase`.
 *
 * An unknown phase label leaves the requirements untouched. Territories with
 * no known phase are dropped whenever filtering applies.
 *
 * @example
 * ```ts
 * filterRequirementsByPhase(reqs, "3b"); // phases 1, 2, 3 and 3b
 * ```
 */
export function filterRequirementsByPhase(
  requirements: PlatoonRequirements,
  maxPhase: string,
  options: PhaseFilterOptions = {}
): PlatoonRequirements {
  const { config = DEFAULT_CONFIG, onWarning = () => {} } = options;
  const { phaseOrder, territoryPhase } = config.territories;

  const maxIndex = phaseOrder.indexOf(maxPhase);
  if (maxIndex === -1) {
    onWarning(`Unknown phase '${maxPhase}', using all phases.`);
    return requirements;
  }

  const included = new Set(phaseOrder.slice(0, maxIndex + 1));

  return {
    ...requirements,
    requirements: requirements.requirements.filter((req) => {
      const phase = territoryPhase[req.territory];
      return phase !== undefined && included.has(phase);
    }),
  };
}
