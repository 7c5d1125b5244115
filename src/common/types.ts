/** A die face label. Faces on one die are all strings or all numbers. */
export type Face = string | number;

/** Uniform random source returning values in `[0, 1)`. */
export type Rng = () => number;

/** The two layouts a game's results can be shown in. */
export type ShowForm = "wide" | "narrow";

export const SHOW_FORMS = ["wide", "narrow"] as const satisfies readonly ShowForm[];

/** Default weight given to every face of a new die. */
export const DEFAULT_WEIGHT = 1.0;

/** Prefix of the column label for each die in a results table. */
export const DIE_COLUMN_PREFIX = "die_";
