import {
  DuplicateFaceError,
  InvalidFacesError,
  InvalidRollCountError,
  InvalidWeightError,
  UnknownFaceError,
  UnrollableWeightsError,
} from "./common/errors";
import { defaultRng } from "./common/rng";
import { FacesSchema, RollCountSchema, WeightSchema } from "./common/schemas";
import type { Face, Rng } from "./common/types";
import { DEFAULT_WEIGHT } from "./common/types";

export interface DieOptions {
  /** Uniform source in `[0, 1)`. Defaults to `Math.random`. */
  rng?: Rng;
}

/** Face → weight, in face order. A fresh copy on every call. */
export type DieSnapshot<F extends Face = Face> = ReadonlyMap<F, number>;

/**
 * A die with a fixed set of distinct faces, each carrying a mutable weight.
 *
 * Rolling draws faces with replacement, each with probability equal to its
 * weight over the sum of all weights at the moment of the roll:
 *
 * ```ts
 * const coin = new Die(["H", "T"]);
 * coin.setWeight("H", 3);
 * coin.roll(4); // e.g. ["H", "H", "T", "H"]
 * ```
 *
 * Weights are not checked for sign when set. Zero weights are fine as long
 * as one face stays positive; a negative or infinite weight makes the next
 * roll throw.
 */
export class Die<F extends Face = Face> {
  private readonly _faces: readonly F[];
  private readonly weights: Map<F, number>;
  private readonly rng: Rng;

  constructor(faces: readonly F[], options: DieOptions = {}) {
    const input: unknown = faces;
    if (!Array.isArray(input)) {
      throw new InvalidFacesError(`expected an array, got ${typeof input}`);
    }
    const parsed = FacesSchema.safeParse(faces);
    if (!parsed.success) {
      throw new InvalidFacesError(parsed.error.issues[0]?.message ?? "unsupported face values");
    }

    const weights = new Map<F, number>();
    for (const face of faces) {
      if (weights.has(face)) throw new DuplicateFaceError(face);
      weights.set(face, DEFAULT_WEIGHT);
    }

    this._faces = Object.freeze([...faces]);
    this.weights = weights;
    this.rng = options.rng ?? defaultRng;
  }

  get faces(): readonly F[] {
    return this._faces;
  }

  get size(): number {
    return this._faces.length;
  }

  has(face: Face): boolean {
    return this._faces.some((f) => f === face);
  }

  weightOf(face: F): number {
    const weight = this.weights.get(face);
    if (weight === undefined) throw new UnknownFaceError(face);
    return weight;
  }

  /** Overwrites one face's weight. The die is untouched when either check fails. */
  setWeight(face: F, weight: number): void {
    if (!this.weights.has(face)) throw new UnknownFaceError(face);
    const parsed = WeightSchema.safeParse(weight);
    if (!parsed.success) {
      throw new InvalidWeightError(`Weight must be a number, got [${String(weight)}]`);
    }
    this.weights.set(face, parsed.data);
  }

  /** Draws `n` faces with replacement, in draw order. */
  roll(n = 1): F[] {
    const parsed = RollCountSchema.safeParse(n);
    if (!parsed.success) throw new InvalidRollCountError(n);
    if (parsed.data === 0) return [];

    const cumulative = this.cumulativeWeights();
    const total = cumulative[cumulative.length - 1] ?? 0;
    if (!(total > 0)) throw new UnrollableWeightsError(`total weight is ${total}`);

    return Array.from({ length: parsed.data }, () => {
      return this._faces[pickIndex(cumulative, this.rng() * total)];
    });
  }

  /** A single draw. */
  rollOne(): F {
    return this.roll(1)[0];
  }

  show(): DieSnapshot<F> {
    return new Map(this.weights);
  }

  /** Face → weight / total weight. Every face maps to 0 when the total is not positive. */
  probabilities(): DieSnapshot<F> {
    let total = 0;
    for (const w of this.weights.values()) total += w;
    const out = new Map<F, number>();
    for (const [face, w] of this.weights) out.set(face, total > 0 ? w / total : 0);
    return out;
  }

  private cumulativeWeights(): number[] {
    const out: number[] = [];
    let running = 0;
    for (const [face, weight] of this.weights) {
      if (weight < 0 || !Number.isFinite(weight)) {
        throw new UnrollableWeightsError(`face [${String(face)}] has weight ${weight}`);
      }
      running += weight;
      out.push(running);
    }
    return out;
  }
}

/**
 * First index whose cumulative weight exceeds `target`. Faces with zero
 * weight share their predecessor's cumulative value and are never picked.
 */
export function pickIndex(cumulative: readonly number[], target: number): number {
  let lo = 0;
  let hi = cumulative.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (cumulative[mid] > target) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}
