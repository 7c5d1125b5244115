import type { Face } from "./common/types";

/** One row per roll, one column per die. `rows[r][c]` is what die `columns[c]` showed on roll `index[r]`. */
export interface WideTable<F extends Face = Face> {
  readonly index: readonly number[];
  readonly columns: readonly string[];
  readonly rows: readonly (readonly F[])[];
}

export interface NarrowRow<F extends Face = Face> {
  readonly roll: number;
  readonly die: string;
  readonly outcome: F;
}

/** Long format: one row per (roll, die) pair, roll-major. */
export type NarrowTable<F extends Face = Face> = readonly NarrowRow<F>[];

/** `rows[r][c]` counts the dice that showed `columns[c]` on roll `index[r]`. */
export interface FaceCountTable<F extends Face = Face> {
  readonly index: readonly number[];
  readonly columns: readonly F[];
  readonly rows: readonly (readonly number[])[];
}

export interface CountRow<F extends Face = Face> {
  readonly outcomes: readonly F[];
  readonly count: number;
}

/** Distinct outcome tuples with how often each occurred, most frequent first. */
export type CountTable<F extends Face = Face> = readonly CountRow<F>[];

export function emptyWide<F extends Face>(): WideTable<F> {
  return { index: [], columns: [], rows: [] };
}

export function emptyFaceCounts<F extends Face>(): FaceCountTable<F> {
  return { index: [], columns: [], rows: [] };
}

export function copyWide<F extends Face>(table: WideTable<F>): WideTable<F> {
  return {
    index: [...table.index],
    columns: [...table.columns],
    rows: table.rows.map((row) => [...row]),
  };
}

/** Stacks a wide table into long format, walking rows then columns. */
export function toNarrow<F extends Face>(table: WideTable<F>): NarrowTable<F> {
  const out: NarrowRow<F>[] = [];
  table.rows.forEach((row, r) => {
    row.forEach((outcome, c) => {
      out.push({ roll: table.index[r], die: table.columns[c], outcome });
    });
  });
  return out;
}

/**
 * Why a table cannot be tabulated, or undefined when it can. A table is
 * degenerate when it has no rows, no columns, an index that does not match
 * its rows, or a row whose width differs from the column count.
 */
export function degenerateReason(table: WideTable): string | undefined {
  if (table.rows.length === 0) return "no rows";
  if (table.columns.length === 0) return "no columns";
  if (table.index.length !== table.rows.length) {
    return `index has ${table.index.length} entries for ${table.rows.length} rows`;
  }
  const width = table.columns.length;
  const bad = table.rows.findIndex((row) => row.length !== width);
  if (bad !== -1) {
    return `row ${table.index[bad]} has ${table.rows[bad].length} cells for ${width} columns`;
  }
  return undefined;
}

/** Ascending order: numbers numerically, strings by code unit, numbers before strings. */
export function compareFaces(a: Face, b: Face): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Distinct faces across every cell of the table, ascending. */
export function distinctFaces<F extends Face>(table: WideTable<F>): F[] {
  const seen = new Set<F>();
  for (const row of table.rows) {
    for (const face of row) seen.add(face);
  }
  return [...seen].sort(compareFaces);
}

// JSON keeps 1 and "1" apart, which a plain join would not
function tupleKey(outcomes: readonly Face[]): string {
  return JSON.stringify(outcomes);
}

/**
 * Counts identical tuples. Sorted by descending count; Array.prototype.sort is
 * stable, so ties stay in first-seen order.
 */
export function valueCounts<F extends Face>(tuples: readonly (readonly F[])[]): CountTable<F> {
  const counts = new Map<string, { outcomes: readonly F[]; count: number }>();
  for (const outcomes of tuples) {
    const key = tupleKey(outcomes);
    const existing = counts.get(key);
    if (existing) {
      existing.count++;
    } else {
      counts.set(key, { outcomes: [...outcomes], count: 1 });
    }
  }
  return [...counts.values()].sort((a, b) => b.count - a.count);
}

export function totalCount(table: CountTable): number {
  return table.reduce((sum, row) => sum + row.count, 0);
}
