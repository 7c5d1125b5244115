import type { DieSnapshot } from "./die";
import type { Face } from "./common/types";
import type { CountTable, FaceCountTable, WideTable } from "./table";

/* ────────────────────────────── Constants ────────────────────────────── */

const B = {
  tl: "┌",
  tr: "┐",
  bl: "└",
  br: "┘",
  mm: "┼",
  bm: "┴",
  ml: "├",
  mr: "┤",
  h: "─",
  v: "│",
} as const;

const MIN_TAB_WIDTH = 12;

export type Align = "left" | "right";

/* ───────────────────────────── Box & Tables ───────────────────────────── */

/** Generic N-column divider: e.g. ├──┼──┼──┤ */
function divider(widths: number[], left: string = B.ml, mid: string = B.mm, right: string = B.mr): string {
  const seg = (w: number) => B.h.repeat(w + 2); // +2 for cell padding
  return left + widths.map(seg).join(mid) + right;
}

function padCell(text: string, width: number, align: Align) {
  return " " + (align === "right" ? text.padStart(width) : text.padEnd(width)) + " ";
}

function row(cells: readonly string[], widths: number[], aligns: readonly Align[]) {
  const body = widths.map((w, i) => padCell(cells[i] ?? "", w, aligns[i] ?? "left")).join(B.v);
  return `${B.v}${body}${B.v}`;
}

/**
 * Renders rows under a tab carrying the title. Column widths fit the widest
 * cell or header; the header row is dropped when every header is blank.
 */
export function renderTable(
  title: string,
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  aligns: readonly Align[] = []
): string {
  if (headers.length === 0) return `${title}: <no data>`;

  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const lines: string[] = [];

  const tabText = ` ${title} `;
  const tabWidth = Math.max(MIN_TAB_WIDTH, tabText.length);
  lines.push(B.tl + B.h.repeat(tabWidth) + B.tr);
  lines.push(B.v + tabText.padEnd(tabWidth, " ") + B.v);

  // ├[tab]┴[rest of the table]┐
  const totalTableWidth = widths.reduce((sum, w) => sum + w + 2, 0) + widths.length + 1;
  const remainingWidth = totalTableWidth - tabWidth - 3;
  lines.push(B.ml + B.h.repeat(tabWidth) + B.bm + B.h.repeat(Math.max(0, remainingWidth)) + B.tr);

  if (headers.some((h) => h.trim().length > 0)) {
    lines.push(row(headers, widths, aligns));
    lines.push(divider(widths));
  }
  for (const r of rows) lines.push(row(r, widths, aligns));
  lines.push(divider(widths, B.bl, B.bm, B.br));

  return lines.join("\n");
}

/* ───────────────────────────── Game tables ───────────────────────────── */

const right = (n: number): Align[] => new Array<Align>(n).fill("right");

export function renderWide(table: WideTable, title = "Results"): string {
  const headers = table.columns.length === 0 ? [] : ["roll", ...table.columns];
  const rows = table.rows.map((r, i) => [String(table.index[i]), ...r.map(String)]);
  return renderTable(title, headers, rows, right(headers.length));
}

export function renderFaceCounts(table: FaceCountTable, title = "Face counts"): string {
  const headers = table.columns.length === 0 ? [] : ["roll", ...table.columns.map(String)];
  const rows = table.rows.map((r, i) => [String(table.index[i]), ...r.map(String)]);
  return renderTable(title, headers, rows, right(headers.length));
}

export function renderCounts(table: CountTable, title = "Counts"): string {
  if (table.length === 0) return `${title}: <no data>`;
  const rows = table.map((r) => [r.outcomes.map(String).join(", "), String(r.count)]);
  return renderTable(title, ["outcomes", "count"], rows, ["left", "right"]);
}

export function renderDie<F extends Face>(snapshot: DieSnapshot<F>, title = "Die"): string {
  const rows = [...snapshot].map(([face, weight]) => [String(face), String(weight)]);
  return renderTable(title, ["face", "weight"], rows, ["left", "right"]);
}
