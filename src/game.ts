import type { Die } from "./die";
import { InvalidFormError, InvalidRollCountError } from "./common/errors";
import { defaultLogger, logEvent, type Logger } from "./common/logger";
import { RollCountSchema, ShowFormSchema } from "./common/schemas";
import type { Face, ShowForm } from "./common/types";
import { DIE_COLUMN_PREFIX } from "./common/types";
import { copyWide, emptyWide, toNarrow, type NarrowTable, type WideTable } from "./table";

export interface GameOptions {
  logger?: Logger;
}

/**
 * Rolls an ordered collection of dice together.
 *
 * The dice are shared, not copied: changing a die's weights between plays
 * changes the next play. Dice need not have the same faces.
 */
export class Game<F extends Face = Face> {
  private readonly _dice: readonly Die<F>[];
  private readonly logger: Logger;
  private results: WideTable<F> = emptyWide();

  constructor(dice: readonly Die<F>[], options: GameOptions = {}) {
    this._dice = [...dice];
    this.logger = options.logger ?? defaultLogger;
  }

  get dice(): readonly Die<F>[] {
    return this._dice;
  }

  /** Rolls in the current results; 0 before the first play. */
  get numRolls(): number {
    return this.results.rows.length;
  }

  /**
   * Rolls every die `numRolls` times, one draw at a time, and replaces the
   * previous results. Nothing is replaced if any draw throws.
   */
  play(numRolls: number): void {
    const parsed = RollCountSchema.safeParse(numRolls);
    if (!parsed.success) throw new InvalidRollCountError(numRolls);
    const n = parsed.data;

    const draws = this._dice.map((die) => Array.from({ length: n }, () => die.rollOne()));

    if (this._dice.length === 0) {
      this.results = emptyWide();
    } else {
      this.results = {
        index: Array.from({ length: n }, (_, r) => r),
        columns: this._dice.map((_, i) => `${DIE_COLUMN_PREFIX}${i}`),
        rows: Array.from({ length: n }, (_, r) => draws.map((column) => column[r])),
      };
    }

    logEvent(this.logger, { tag: "game:play", dice: this._dice.length, numRolls: n });
  }

  show(): WideTable<F>;
  show(form: "wide"): WideTable<F>;
  show(form: "narrow"): NarrowTable<F>;
  show(form: ShowForm): WideTable<F> | NarrowTable<F>;
  show(form: ShowForm = "wide"): WideTable<F> | NarrowTable<F> {
    const parsed = ShowFormSchema.safeParse(form);
    if (!parsed.success) throw new InvalidFormError(form);
    return parsed.data === "narrow" ? toNarrow(this.results) : copyWide(this.results);
  }
}
