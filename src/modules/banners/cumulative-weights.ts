import { mathRandomInt, type RandomInt } from "../../utils/random";
import { InvariantViolationError } from "./banner-errors";

// ─── Types ───────────────────────────────────────────────────────────────────

/**
 * How a table position maps back to a banner position. Identity tables cover
 * the whole inventory; explicit tables cover a filtered subset.
 */
export type IndexProjection =
  | { kind: "identity" }
  | { kind: "explicit"; positions: number[] };

// ─── Cumulative Weights ──────────────────────────────────────────────────────

/**
 * Prefix sums of positive integer weights. A draw picks each entry with
 * probability proportional to its weight in O(log N).
 */
export class CumulativeWeights {
  private readonly sums: number[] = [];
  private readonly projection: IndexProjection;

  private constructor(projection: IndexProjection) {
    this.projection = projection;
  }

  /** Table whose positions are banner positions (the global table). */
  static identity(): CumulativeWeights {
    return new CumulativeWeights({ kind: "identity" });
  }

  /** Table over a subset; each weight is added with its banner position. */
  static withProjection(): CumulativeWeights {
    return new CumulativeWeights({ kind: "explicit", positions: [] });
  }

  get size(): number {
    return this.sums.length;
  }

  /** Sum of all weights, 0 for an empty table. */
  get totalWeight(): number {
    return this.sums.length === 0 ? 0 : this.sums[this.sums.length - 1];
  }

  addWeight(weight: number): void {
    if (this.projection.kind !== "identity") {
      throw new InvariantViolationError("Explicit table needs a banner position for every weight");
    }
    this.pushSum(weight);
  }

  addWeightFor(weight: number, position: number): void {
    if (this.projection.kind !== "explicit") {
      throw new InvariantViolationError("Identity table takes no banner positions");
    }
    this.pushSum(weight);
    this.projection.positions.push(position);
  }

  /**
   * Draw a banner position. r is uniform over [0, W]; the winner is the
   * first entry whose prefix sum is >= r.
   */
  draw(randomInt: RandomInt = mathRandomInt): number | undefined {
    if (this.sums.length === 0) return undefined;
    if (this.sums.length === 1) return this.project(0);

    const r = randomInt(this.totalWeight);
    return this.project(this.lowerBound(r));
  }

  private pushSum(weight: number): void {
    if (!Number.isInteger(weight) || weight <= 0) {
      throw new InvariantViolationError(`Weight must be a positive integer, got ${weight}`);
    }
    const sum = this.totalWeight + weight;
    if (!Number.isSafeInteger(sum)) {
      throw new InvariantViolationError(`Cumulative weight overflow at entry ${this.sums.length}`);
    }
    this.sums.push(sum);
  }

  private lowerBound(r: number): number {
    let lo = 0;
    let hi = this.sums.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.sums[mid] < r) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private project(index: number): number {
    if (this.projection.kind === "identity") return index;

    const position = this.projection.positions[index];
    if (position === undefined) {
      throw new InvariantViolationError(`No banner position projected for table entry ${index}`);
    }
    return position;
  }
}
