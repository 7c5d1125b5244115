export { Die, pickIndex } from "./die";
export type { DieOptions, DieSnapshot } from "./die";
export { Game } from "./game";
export type { GameOptions } from "./game";
export { Analyzer } from "./analyzer";
export type { AnalyzerOptions } from "./analyzer";

export {
  compareFaces,
  degenerateReason,
  distinctFaces,
  toNarrow,
  totalCount,
  valueCounts,
} from "./table";
export type {
  CountRow,
  CountTable,
  FaceCountTable,
  NarrowRow,
  NarrowTable,
  WideTable,
} from "./table";

export { renderCounts, renderDie, renderFaceCounts, renderTable, renderWide } from "./format";
export type { Align } from "./format";

export * from "./common/errors";
export { createLogger, defaultLogger, logEvent } from "./common/logger";
export type { LogPayload, LogTag, Logger, LoggerOptions } from "./common/logger";
export { createRng, defaultRng, sequenceRng } from "./common/rng";
export type { Face, Rng, ShowForm } from "./common/types";
export { DEFAULT_WEIGHT, DIE_COLUMN_PREFIX, SHOW_FORMS } from "./common/types";
