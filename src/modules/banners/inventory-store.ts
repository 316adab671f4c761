import { ROTATOR_CONFIG } from "../../config/rotator-config";
import { mathRandomInt, type RandomInt } from "../../utils/random";
import { Banner } from "./banner";
import {
  BannerValidationError,
  InvariantViolationError,
  ValidationErrorKinds,
} from "./banner-errors";
import { CategoryIndex } from "./category-index";
import { CumulativeWeights } from "./cumulative-weights";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface BannerRecord {
  url: string;
  total: number;
  categories: string[];
}

export type InsertResult =
  | { ok: true; position: number }
  | { ok: false; error: BannerValidationError };

/** Empty category input selects from the whole inventory. */
export type FilterResult =
  | { kind: "all" }
  | { kind: "subset"; positions: number[] };

/**
 * Structured-cloneable form of a frozen store. The counters are the banners'
 * SharedArrayBuffers, so a store attached from it in a worker thread depletes
 * the same budgets.
 */
export interface SharedInventory {
  banners: Array<{ url: string; total: number; counter: SharedArrayBuffer }>;
  categories: Array<[string, number[]]>;
}

export interface InventoryStoreOptions {
  randomInt?: RandomInt;
}

// ─── Inventory Store ─────────────────────────────────────────────────────────

/**
 * Built single-threaded by insert(), then served read-mostly by select().
 * After the build phase only the banners' remaining counters change.
 */
export class InventoryStore {
  private readonly banners: Banner[] = [];
  private readonly index = new CategoryIndex();
  private readonly globalWeights = CumulativeWeights.identity();
  private readonly randomInt: RandomInt;
  private frozen = false;

  constructor(options: InventoryStoreOptions = {}) {
    this.randomInt = options.randomInt ?? mathRandomInt;
  }

  /** Rebuild a frozen store over the counters of another store. */
  static attach(shared: SharedInventory, options: InventoryStoreOptions = {}): InventoryStore {
    const store = new InventoryStore(options);
    for (const { url, total, counter } of shared.banners) {
      store.append(Banner.attach(url, total, counter));
    }
    for (const [category, positions] of shared.categories) {
      for (const position of positions) {
        store.bannerAt(position);
        store.index.add(category, position);
      }
    }
    store.freeze();
    return store;
  }

  get size(): number {
    return this.banners.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Add a banner. Invalid input is returned as an error and leaves the store
   * unchanged.
   */
  insert(url: string, total: number, categories: readonly string[]): InsertResult {
    if (this.frozen) {
      throw new InvariantViolationError("Banner inserted after the inventory was frozen");
    }

    const invalid = validateRecord(url, total, categories);
    if (invalid) {
      return { ok: false, error: new BannerValidationError(invalid) };
    }

    const position = this.append(Banner.create(url, total));
    for (const category of new Set(categories)) {
      this.index.add(category, position);
    }
    return { ok: true, position };
  }

  load(record: BannerRecord): InsertResult {
    return this.insert(record.url, record.total, record.categories);
  }

  /** End the build phase. Later inserts are a contract violation. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  /** Freeze and export the store for other threads. */
  share(): SharedInventory {
    this.freeze();
    return {
      banners: this.banners.map(({ url, total, counter }) => ({ url, total, counter })),
      categories: [...this.index.entries()].map(
        ([category, positions]): [string, number[]] => [category, [...positions]],
      ),
    };
  }

  /**
   * Candidates for a request. Exhausted banners are dropped from a snapshot
   * read; a banner may still run out before it is shown.
   */
  filter(categories: Iterable<string>): FilterResult {
    const keys = new Set(categories);
    if (keys.size === 0) {
      return { kind: "all" };
    }

    const positions = this.index
      .candidates(keys)
      .filter((position) => this.bannerAt(position).canShow());
    return { kind: "subset", positions };
  }

  /**
   * Pick a banner by declared weight and consume one impression. Returns
   * undefined when nothing is eligible or the winner ran out in the meantime.
   */
  select(categories: Iterable<string>): string | undefined {
    const filtered = this.filter(categories);
    const weights =
      filtered.kind === "all" ? this.globalWeights : this.weightsFor(filtered.positions);

    const position = weights.draw(this.randomInt);
    if (position === undefined) return undefined;

    return this.bannerAt(position).show();
  }

  serve(categories: readonly string[]): string | undefined {
    return this.select(categories);
  }

  /** Remaining impressions of the banner at a position. */
  remainingAt(position: number): number {
    return this.bannerAt(position).remaining;
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────

  private append(banner: Banner): number {
    const position = this.banners.length;
    this.banners.push(banner);
    this.globalWeights.addWeight(banner.total);
    return position;
  }

  // Weighted by declared total, not remaining. Never cached.
  private weightsFor(positions: readonly number[]): CumulativeWeights {
    const weights = CumulativeWeights.withProjection();
    for (const position of positions) {
      weights.addWeightFor(this.bannerAt(position).total, position);
    }
    return weights;
  }

  private bannerAt(position: number): Banner {
    const banner = this.banners[position];
    if (banner === undefined) {
      throw new InvariantViolationError(
        `Banner position ${position} out of range (inventory size ${this.banners.length})`,
      );
    }
    return banner;
  }
}

function validateRecord(
  url: string,
  total: number,
  categories: readonly string[],
): BannerValidationError["kind"] | undefined {
  if (url.length === 0) {
    return ValidationErrorKinds.ILLEGAL_URL;
  }
  if (!Number.isInteger(total) || total <= 0 || total > ROTATOR_CONFIG.limits.maxImpressions) {
    return ValidationErrorKinds.ILLEGAL_IMPRESSION_AMOUNT;
  }
  if (categories.length === 0) {
    return ValidationErrorKinds.EMPTY_CATEGORIES;
  }
  return undefined;
}
