/**
 * Platoon Display Module
 *
 * Formatting for guild platoon coverage, gaps and scarce units.
 */

import { groupBy, orderBy } from "es-toolkit";
import {
  PlatoonAnalysis,
  PlatoonGap,
  ScarceUnit,
  TERRITORY_PATHS,
  TerritoryCoverage,
  TerritoryPath,
} from "../models/platoonTypes";
import { AnalysisConfig, DEFAULT_CONFIG, territoryPhase } from "../config/analysisConfig";
import { formatPercent, joinWithOverflow, sectionHeader, underlinedHeader } from "./tables";

// ─────────────────────────────────────────────────────────────
// Labels
// ─────────────────────────────────────────────────────────────

/**
 * "dark_side" -> "Dark Side"
 */
export function pathLabel(path: TerritoryPath): string {
  return path
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Planet tier a relic requirement belongs to
 */
export function tierLabel(minRelic: number): string {
  if (minRelic <= 5) return "Tier 1 Planets";
  if (minRelic === 6) return "Tier 2 Planets";
  return "Tier 3 Planets";
}

/**
 * ✅ fully covered, ⚠️ at least 80%, ❌ below
 */
export function coverageStatus(coveredSlots: number, totalSlots: number): string {
  const ratio = totalSlots > 0 ? coveredSlots / totalSlots : 0;
  if (ratio >= 1) return "✅";
  if (ratio >= 0.8) return "⚠️";
  return "❌";
}

function phaseLabel(territory: string, config: AnalysisConfig): string {
  return territoryPhase(territory, config) ?? "?";
}

/**
 * Sort key placing territories in play order, unknown ones last
 */
function phaseRank(territory: string, config: AnalysisConfig): number {
  const phase = territoryPhase(territory, config);
  const index = phase === undefined ? -1 : config.territories.phaseOrder.indexOf(phase);
  return index === -1 ? Number.MAX_SAFE_INTEGER : index;
}

// ─────────────────────────────────────────────────────────────
// Sections
// ─────────────────────────────────────────────────────────────

/**
 * Covered/total slots per territory, grouped by path
 */
export function formatTerritoryCoverage(
  territories: readonly TerritoryCoverage[],
  config: AnalysisConfig = DEFAULT_CONFIG
): string {
  const lines: string[] = [];

  for (const path of TERRITORY_PATHS) {
    lines.push("", underlinedHeader(`${pathLabel(path)}:`));

    const onPath = territories.filter((t) => t.path === path);
    if (onPath.length === 0) {
      lines.push("  No requirements found.");
      continue;
    }

    for (const t of orderBy(onPath, [(t) => phaseRank(t.territory, config)], ["asc"])) {
      const ratio = t.totalSlots > 0 ? t.coveredSlots / t.totalSlots : 0;
      lines.push(
        `  ${coverageStatus(t.coveredSlots, t.totalSlots)} P${phaseLabel(t.territory, config)} ${t.territory}: ` +
          `${t.coveredSlots}/${t.totalSlots} slots (${formatPercent(ratio)})`
      );
    }
  }

  return lines.join("\n");
}

/**
 * Slots no member can fill, by planet tier
 */
export function formatUnfillableSlots(byTier: ReadonlyMap<number, ReadonlyMap<string, number>>): string {
  if (byTier.size === 0) return "";

  const lines: string[] = ["", underlinedHeader("Unfillable platoon slots")];

  for (const relic of [...byTier.keys()].sort((a, b) => a - b)) {
    const units = byTier.get(relic) ?? new Map<string, number>();
    lines.push("", `${tierLabel(relic)} – R${relic}:`);
    for (const unitName of [...units.keys()].sort()) {
      lines.push(`  ${unitName} – R${relic} x${units.get(unitName) ?? 0}`);
    }
  }

  return lines.join("\n");
}

/**
 * Critical gaps grouped by (path, territory)
 */
export function formatCriticalGaps(gaps: readonly PlatoonGap[], config: AnalysisConfig = DEFAULT_CONFIG): string {
  const lines: string[] = ["", underlinedHeader("Critical gaps")];

  if (gaps.length === 0) {
    lines.push("", "✅ No critical gaps detected!");
    return lines.join("\n");
  }

  const groups = groupBy(gaps, (gap) => `${gap.path}\u0000${gap.territory}`);
  const ordered = orderBy(
    Object.values(groups),
    [(group) => TERRITORY_PATHS.indexOf(group[0].path), (group) => phaseRank(group[0].territory, config)],
    ["asc", "asc"]
  );

  for (const group of ordered) {
    const { path, territory } = group[0];
    lines.push("", `${pathLabel(path)} - P${phaseLabel(territory, config)} ${territory}:`);

    for (const gap of orderBy(group, ["playersAvailable", "unitName"], ["asc", "asc"])) {
      const owners = gap.playerNames.length > 0 ? gap.playerNames.join(", ") : "NO ONE";
      lines.push(
        `  - ${gap.unitName} R${gap.minRelic}: ${gap.playersAvailable}/${gap.slotsNeeded} players (${owners})`
      );
    }
  }

  return lines.join("\n");
}

/**
 * Owned-but-scarce units grouped by how many members own them
 */
export function formatLimitedAvailability(units: readonly ScarceUnit[]): string {
  const lines: string[] = ["", "", underlinedHeader("Limited availability units")];

  const available = units.filter((u) => u.ownerCount > 0);
  if (available.length === 0) {
    lines.push("", "✅ No limited availability units!");
    return lines.join("\n");
  }

  const byOwners = groupBy(available, (u) => u.ownerCount);
  const counts = Object.keys(byOwners)
    .map(Number)
    .sort((a, b) => a - b);

  for (const count of counts) {
    const group = byOwners[count];
    const heading = count === 1 ? "Only 1 player has" : `Only ${count} players have`;
    lines.push("", `${heading} (${group.length} units):`);

    for (const unit of group) {
      const owners = unit.ownerNames.slice(0, count).join(", ");
      lines.push(
        `   - ${unit.unitName} R${unit.minRelic} → ${owners} [${joinWithOverflow(unit.territoriesNeeded, 2)}]`
      );
    }
  }

  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────
// Full Report
// ─────────────────────────────────────────────────────────────

export function formatPlatoonReport(analysis: PlatoonAnalysis, config: AnalysisConfig = DEFAULT_CONFIG): string {
  const sections = [
    sectionHeader(`Guild: ${analysis.guildName} | Members: ${analysis.memberCount}\n\nROTE PLATOON COVERAGE SUMMARY`),
    formatTerritoryCoverage(analysis.territories, config),
  ];

  const unfillable = formatUnfillableSlots(analysis.unfillableByTier);
  if (unfillable) sections.push(unfillable);

  sections.push(
    "",
    sectionHeader("ANALYSIS"),
    formatCriticalGaps(analysis.criticalGaps, config),
    formatLimitedAvailability(analysis.scarceUnits),
    ""
  );

  return sections.join("\n");
}
