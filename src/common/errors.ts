export type MonteCarloErrorCode =
  | "INVALID_FACES"
  | "DUPLICATE_FACE"
  | "UNKNOWN_FACE"
  | "INVALID_WEIGHT"
  | "INVALID_ROLL_COUNT"
  | "INVALID_FORM"
  | "INVALID_GAME";

/** Value and lookup failures raised by dice, games and analyzers. */
export class MonteCarloError extends Error {
  constructor(
    public readonly code: MonteCarloErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Failures caused by an argument of the wrong type. */
export class MonteCarloTypeError extends TypeError {
  constructor(
    public readonly code: MonteCarloErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidFacesError extends MonteCarloTypeError {
  constructor(detail: string) {
    super("INVALID_FACES", `Faces must be an array of distinct strings or numbers: ${detail}`);
  }
}

export class DuplicateFaceError extends MonteCarloError {
  constructor(public readonly face: string | number) {
    super("DUPLICATE_FACE", `Faces must be distinct, found [${String(face)}] more than once`);
  }
}

export class UnknownFaceError extends MonteCarloError {
  constructor(public readonly face: unknown) {
    super("UNKNOWN_FACE", `Face [${String(face)}] not found on the die`);
  }
}

export class InvalidWeightError extends MonteCarloTypeError {
  constructor(detail: string) {
    super("INVALID_WEIGHT", detail);
  }
}

export class InvalidRollCountError extends MonteCarloTypeError {
  constructor(value: unknown) {
    super("INVALID_ROLL_COUNT", `Roll count must be a non-negative integer, got [${String(value)}]`);
  }
}

export class InvalidFormError extends MonteCarloError {
  constructor(public readonly form: unknown) {
    super("INVALID_FORM", `Form must be 'wide' or 'narrow', got [${String(form)}]`);
  }
}

export class InvalidGameError extends MonteCarloError {
  constructor() {
    super("INVALID_GAME", "Analyzer requires a Game instance");
  }
}

/** The weights in place cannot be sampled from: a negative or infinite weight, or a zero total. */
export class UnrollableWeightsError extends MonteCarloError {
  constructor(detail: string) {
    super("INVALID_WEIGHT", `Cannot roll with the current weights: ${detail}`);
  }
}
