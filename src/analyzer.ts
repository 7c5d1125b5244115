import { InvalidGameError } from "./common/errors";
import { defaultLogger, logEvent, type Logger } from "./common/logger";
import type { Face } from "./common/types";
import { Game } from "./game";
import {
  compareFaces,
  degenerateReason,
  distinctFaces,
  emptyFaceCounts,
  valueCounts,
  type CountTable,
  type FaceCountTable,
  type WideTable,
} from "./table";

export interface AnalyzerOptions {
  logger?: Logger;
}

/**
 * Statistics over a game's results.
 *
 * Holds no state of its own; every method re-reads the game's current
 * results, so it always reflects the latest `play`.
 *
 * Each method checks the table first. An empty or irregular table yields an
 * empty result (0 for `jackpot`) and an info-level `analyzer:degraded` log
 * entry instead of an exception.
 */
export class Analyzer<F extends Face = Face> {
  private readonly game: Game<F>;
  private readonly logger: Logger;

  constructor(game: Game<F>, options: AnalyzerOptions = {}) {
    if (!(game instanceof Game)) throw new InvalidGameError();
    this.game = game;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Rolls on which every die shows the same face. */
  jackpot(): number {
    const table = this.usableTable("jackpot");
    if (!table) return 0;
    return table.rows.filter((row) => row.every((face) => face === row[0])).length;
  }

  /**
   * Per roll, how many dice showed each face. Columns are every face seen
   * anywhere in the game, ascending; a face missing from a roll counts 0.
   */
  faceCountsPerRoll(): FaceCountTable<F> {
    const table = this.usableTable("faceCountsPerRoll");
    if (!table) return emptyFaceCounts();

    const columns = distinctFaces(table);
    const position = new Map<F, number>(columns.map((face, i) => [face, i]));
    const rows = table.rows.map((row) => {
      const counts = new Array<number>(columns.length).fill(0);
      for (const face of row) {
        const i = position.get(face);
        if (i !== undefined) counts[i]++;
      }
      return counts;
    });
    return { index: [...table.index], columns, rows };
  }

  /** Order-free combinations: each roll's outcomes sorted, then counted. */
  comboCount(): CountTable<F> {
    const table = this.usableTable("comboCount");
    if (!table) return [];
    return valueCounts(table.rows.map((row) => [...row].sort(compareFaces)));
  }

  /** Outcomes in die order, counted. Same faces on different dice are different permutations. */
  permutationCount(): CountTable<F> {
    const table = this.usableTable("permutationCount");
    if (!table) return [];
    return valueCounts(table.rows);
  }

  private usableTable(method: string): WideTable<F> | undefined {
    const table = this.game.show("wide");
    const reason = degenerateReason(table);
    if (reason !== undefined) {
      logEvent(this.logger, { tag: "analyzer:degraded", method, reason });
      return undefined;
    }
    logEvent(this.logger, {
      tag: "analyzer:tabulate",
      method,
      rolls: table.rows.length,
      dice: table.columns.length,
    });
    return table;
  }
}
