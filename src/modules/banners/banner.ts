import { renderMarkup } from "../../config/rotator-config";
import { InvariantViolationError } from "./banner-errors";

// Int32Array index of the remaining-impressions cell.
const REMAINING = 0;

/**
 * One inventory item. url and total are fixed at creation; remaining lives in
 * a SharedArrayBuffer so every thread holding the same buffer depletes the
 * same budget.
 */
export class Banner {
  readonly url: string;
  readonly total: number;
  /** The buffer backing remaining, for handing to another thread. */
  readonly counter: SharedArrayBuffer;
  private readonly cell: Int32Array;

  private constructor(url: string, total: number, counter: SharedArrayBuffer) {
    if (counter.byteLength < Int32Array.BYTES_PER_ELEMENT) {
      throw new InvariantViolationError(
        `Banner counter buffer too small: ${counter.byteLength} bytes`,
      );
    }
    this.url = url;
    this.total = total;
    this.counter = counter;
    this.cell = new Int32Array(counter, 0, 1);
  }

  /** New banner with its full budget remaining. */
  static create(url: string, total: number): Banner {
    const counter = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    const banner = new Banner(url, total, counter);
    Atomics.store(banner.cell, REMAINING, total);
    return banner;
  }

  /**
   * View over an existing counter, e.g. one received from another thread.
   * The counter is shared, not copied.
   */
  static attach(url: string, total: number, counter: SharedArrayBuffer): Banner {
    const banner = new Banner(url, total, counter);
    const remaining = banner.remaining;
    if (remaining < 0 || remaining > total) {
      throw new InvariantViolationError(
        `Banner ${url} has remaining=${remaining} outside [0, ${total}]`,
      );
    }
    return banner;
  }

  get remaining(): number {
    return Atomics.load(this.cell, REMAINING);
  }

  /**
   * Best-effort eligibility read. Never synchronizes with show(): the answer
   * may be stale before the caller acts on it.
   */
  canShow(): boolean {
    return this.remaining > 0;
  }

  /**
   * Consume one impression if any is left. Lock-free decrement-if-positive:
   * a lost compare-and-swap rereads and retries, a zero fails at once.
   */
  show(): string | undefined {
    let observed = Atomics.load(this.cell, REMAINING);
    while (observed > 0) {
      const witnessed = Atomics.compareExchange(this.cell, REMAINING, observed, observed - 1);
      if (witnessed === observed) {
        return renderMarkup(this.url);
      }
      observed = witnessed;
    }
    return undefined;
  }
}
