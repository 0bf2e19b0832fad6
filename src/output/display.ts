/**
 * Display Module - Central export hub
 *
 * Module Structure:
 * - tables.ts: Box-drawn tables, headers, text formatting
 * - salvage.ts: Per-character salvage reports
 * - platoons.ts: Guild platoon coverage, gaps and scarce units
 */

// ─────────────────────────────────────────────────────────────
// Table Utilities
// ─────────────────────────────────────────────────────────────

export {
  REPORT_WIDTH,
  formatPercent,
  joinWithOverflow,
  buildTable,
  heavyRule,
  headerBox,
  sectionHeader,
  underlinedHeader,
} from "./tables";

export type { Align, TableSpec } from "./tables";

// ─────────────────────────────────────────────────────────────
// Salvage Display
// ─────────────────────────────────────────────────────────────

export {
  formatSalvageBreakdown,
  formatSalvageRow,
  formatSalvageTotals,
  formatSalvageReport,
} from "./salvage";

export type { SalvageReportOptions } from "./salvage";

// ─────────────────────────────────────────────────────────────
// Platoon Display
// ─────────────────────────────────────────────────────────────

export {
  pathLabel,
  tierLabel,
  coverageStatus,
  formatTerritoryCoverage,
  formatUnfillableSlots,
  formatCriticalGaps,
  formatLimitedAvailability,
  formatPlatoonReport,
} from "./platoons";
