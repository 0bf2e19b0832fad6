/**
 * Salvage Display Module
 *
 * Formatting for per-character salvage reports.
 */

import { orderBy } from "es-toolkit";
import { NeedMap, SalvageReportRow } from "../models/types";
import { AnalysisConfig, DEFAULT_CONFIG, salvageDisplayName } from "../config/analysisConfig";
import { accumulateNeeds } from "../calculators/salvage";
import { summarizeReport } from "../calculators/rosterAnalysis";
import { buildTable, headerBox, heavyRule } from "./tables";

const REPORT_TITLE = "CHARACTERS WITH HIGHEST KYROTECH REQUIREMENTS (RAW SALVAGE)";

/**
 * Breakdown lines, largest count first
 */
export function formatSalvageBreakdown(needs: NeedMap, config: AnalysisConfig = DEFAULT_CONFIG): string[] {
  const entries = orderBy(Object.entries(needs), [([, count]) => count], ["desc"]);
  return entries.map(([salvageId, count]) => `      - ${salvageDisplayName(salvageId, config)}: ${count}`);
}

/**
 * One ranked character block
 */
export function formatSalvageRow(
  rank: number,
  row: SalvageReportRow,
  config: AnalysisConfig = DEFAULT_CONFIG
): string {
  return [
    `#${rank}. ${row.name} (Currently G${row.currentTier})`,
    `   Total Kyrotech Salvage: ${row.total}`,
    "   Breakdown:",
    ...formatSalvageBreakdown(row.needs, config),
  ].join("\n");
}

/**
 * Salvage totals per type across every row
 */
export function formatSalvageTotals(rows: readonly SalvageReportRow[], config: AnalysisConfig = DEFAULT_CONFIG): string {
  const totals: Record<string, number> = {};
  for (const row of rows) {
    accumulateNeeds(totals, row.needs);
  }

  const sorted = orderBy(Object.entries(totals), [([, count]) => count], ["desc"]);

  return buildTable({
    headers: ["Salvage", "Needed"],
    widths: [50, 10],
    rows: sorted.map(([salvageId, count]) => [salvageDisplayName(salvageId, config), String(count)]),
    aligns: ["left", "right"],
  });
}

export interface SalvageReportOptions {
  /** Maximum character blocks to show; the summary always covers every row */
  limit?: number;
  config?: AnalysisConfig;
}

/**
 * Full salvage report: header, ranked characters and summary.
 */
export function formatSalvageReport(rows: readonly SalvageReportRow[], options: SalvageReportOptions = {}): string {
  const { limit, config = DEFAULT_CONFIG } = options;

  if (rows.length === 0) {
    return "No characters need kyrotech gear!";
  }

  const shown = limit !== undefined ? rows.slice(0, limit) : rows;
  const { characters, totalSalvage } = summarizeReport(rows);

  const blocks = shown.map((row, i) => formatSalvageRow(i + 1, row, config));
  const lines: string[] = [headerBox(REPORT_TITLE), "", blocks.join("\n\n")];

  if (shown.length < rows.length) {
    lines.push("", `(showing ${shown.length} of ${rows.length} characters)`);
  }

  const rule = heavyRule();
  lines.push(
    "",
    rule,
    `Total characters needing kyrotech: ${characters}`,
    `Total kyrotech salvage needed: ${totalSalvage}`,
    rule,
    "",
    formatSalvageTotals(rows, config)
  );

  return lines.join("\n");
}
