/**
 * Box-drawn tables and report headers for CLI output.
 */

export type Align = "left" | "right";

/** Width of report rules and header boxes */
export const REPORT_WIDTH = 68;

// ─────────────────────────────────────────────────────────────
// Border Styles
// ─────────────────────────────────────────────────────────────

/** Left, junction and right glyphs of one border line */
type Edge = readonly [string, string, string];

interface BorderStyle {
  readonly fill: string;
  readonly side: string;
  readonly top: Edge;
  readonly middle: Edge;
  readonly bottom: Edge;
}

const LIGHT: BorderStyle = {
  fill: "─",
  side: "│",
  top: ["┌", "┬", "┐"],
  middle: ["├", "┼", "┤"],
  bottom: ["└", "┴", "┘"],
};

const DOUBLE: BorderStyle = {
  fill: "═",
  side: "║",
  top: ["╔", "╦", "╗"],
  middle: ["╠", "╬", "╣"],
  bottom: ["╚", "╩", "╝"],
};

const HEAVY_FILL = "━";

function border(style: BorderStyle, widths: readonly number[], [left, junction, right]: Edge): string {
  return left + widths.map((w) => style.fill.repeat(w)).join(junction) + right;
}

/**
 * Pad to `width`, cutting long text with an ellipsis.
 */
function fit(text: string, width: number, align: Align): string {
  if (text.length > width) return `${text.slice(0, width - 1)}…`;
  return align === "right" ? text.padStart(width) : text.padEnd(width);
}

function row(style: BorderStyle, cells: readonly string[], widths: readonly number[], aligns: readonly Align[]): string {
  // each column keeps one space of padding on both sides
  const inner = widths.map((w, i) => ` ${fit(cells[i] ?? "", w - 2, aligns[i] ?? "left")} `);
  return style.side + inner.join(style.side) + style.side;
}

// ─────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────

export function formatPercent(ratio: number, decimals: number = 0): string {
  return `${(ratio * 100).toFixed(decimals)}%`;
}

/**
 * Show the first `shown` entries, then "+N" for the rest.
 */
export function joinWithOverflow(values: readonly string[], shown: number): string {
  const head = values.slice(0, shown).join(", ");
  const rest = values.length - shown;
  return rest > 0 ? `${head} +${rest}` : head;
}

// ─────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────

export interface TableSpec {
  headers: string[];
  /** Column widths, padding included */
  widths: number[];
  rows: string[][];
  /** Per-column alignment of body cells; headers are always left-aligned */
  aligns?: Align[];
}

export function buildTable(spec: TableSpec): string {
  const { headers, widths, rows, aligns = [] } = spec;

  return [
    border(LIGHT, widths, LIGHT.top),
    row(LIGHT, headers, widths, []),
    border(LIGHT, widths, LIGHT.middle),
    ...rows.map((cells) => row(LIGHT, cells, widths, aligns)),
    border(LIGHT, widths, LIGHT.bottom),
  ].join("\n");
}

// ─────────────────────────────────────────────────────────────
// Headers
// ─────────────────────────────────────────────────────────────

export function heavyRule(width: number = REPORT_WIDTH): string {
  return HEAVY_FILL.repeat(width);
}

/**
 * Title inside a double-line box, indented two spaces and cut to fit.
 */
export function headerBox(title: string, width: number = REPORT_WIDTH): string {
  const label = `  ${title}`.padEnd(width).slice(0, width);
  return [
    border(DOUBLE, [width], DOUBLE.top),
    DOUBLE.side + label + DOUBLE.side,
    border(DOUBLE, [width], DOUBLE.bottom),
  ].join("\n");
}

/**
 * Title between two heavy rules.
 */
export function sectionHeader(title: string, width: number = REPORT_WIDTH): string {
  return [heavyRule(width), title, heavyRule(width)].join("\n");
}

export function underlinedHeader(title: string): string {
  return `${title}\n${LIGHT.fill.repeat(title.length)}`;
}
