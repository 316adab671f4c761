import { describe, it, expect, vi } from "vitest";
import { seededRandomInt } from "../../utils/random";
import { InvariantViolationError } from "./banner-errors";
import { InventoryStore } from "./inventory-store";

const markupFor = (url: string) => `<html><body><img src="${url}"/></body></html>`;

describe("InventoryStore", () => {
  describe("insert", () => {
    it("assigns positions in load order", () => {
      const store = new InventoryStore();

      expect(store.insert("http://a/1.jpg", 2, ["x"])).toEqual({ ok: true, position: 0 });
      expect(store.load({ url: "http://b/1.jpg", total: 1, categories: ["y"] })).toEqual({
        ok: true,
        position: 1,
      });
      expect(store.size).toBe(2);
    });

    it.each([
      { label: "an empty url", url: "", total: 1, categories: ["x"], kind: "IllegalUrl" },
      { label: "a zero amount", url: "http://a/1.jpg", total: 0, categories: ["x"], kind: "IllegalImpressionAmount" },
      { label: "a negative amount", url: "http://a/1.jpg", total: -4, categories: ["x"], kind: "IllegalImpressionAmount" },
      { label: "a fractional amount", url: "http://a/1.jpg", total: 1.5, categories: ["x"], kind: "IllegalImpressionAmount" },
      { label: "an amount beyond 32 bits", url: "http://a/1.jpg", total: 2 ** 31, categories: ["x"], kind: "IllegalImpressionAmount" },
      { label: "no categories", url: "http://a/1.jpg", total: 1, categories: [], kind: "EmptyCategories" },
      { label: "everything wrong", url: "", total: 0, categories: [], kind: "IllegalUrl" },
    ])("rejects $label without touching the store", ({ url, total, categories, kind }) => {
      const store = new InventoryStore();
      store.insert("http://keep/1.jpg", 1, ["x"]);

      const result = store.insert(url, total, categories);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(kind);
        expect(result.error.name).toBe("BannerValidationError");
      }
      expect(store.size).toBe(1);
      expect(store.filter(["x"])).toEqual({ kind: "subset", positions: [0] });
    });

    it("indexes a category repeated within one record once", () => {
      const store = new InventoryStore();
      store.insert("http://a/1.jpg", 1, ["x", "x"]);

      expect(store.filter(["x"])).toEqual({ kind: "subset", positions: [0] });
    });

    it("refuses inserts once frozen", () => {
      const store = new InventoryStore().freeze();

      expect(() => store.insert("http://a/1.jpg", 1, ["x"])).toThrow(InvariantViolationError);
      expect(store.size).toBe(0);
    });
  });

  describe("filter", () => {
    const build = () => {
      const store = new InventoryStore({ randomInt: () => 0 });
      store.insert("http://a/1.jpg", 1, ["x"]);
      store.insert("http://b/1.jpg", 5, ["y"]);
      store.insert("http://c/1.jpg", 5, ["x", "y"]);
      return store;
    };

    it("treats no categories as the whole inventory", () => {
      expect(build().filter([])).toEqual({ kind: "all" });
    });

    it("unions categories in ascending position order", () => {
      expect(build().filter(["y", "x"])).toEqual({ kind: "subset", positions: [0, 1, 2] });
    });

    it("yields an empty subset for unknown categories", () => {
      expect(build().filter(["nope"])).toEqual({ kind: "subset", positions: [] });
    });

    it("drops exhausted banners", () => {
      const store = build();
      // sums [1, 6]: a draw of 0 takes a's only impression
      expect(store.serve(["x", "nope"])).toBe(markupFor("http://a/1.jpg"));
      expect(store.filter(["x"])).toEqual({ kind: "subset", positions: [2] });
    });
  });

  describe("serve", () => {
    it("serves a banner exactly total times for its category", () => {
      const store = new InventoryStore();
      store.insert("http://a/1.jpg", 3, ["x"]);

      expect(store.serve(["x"])).toBe(markupFor("http://a/1.jpg"));
      expect(store.serve(["x"])).toBe(markupFor("http://a/1.jpg"));
      expect(store.serve(["x"])).toBe(markupFor("http://a/1.jpg"));
      expect(store.serve(["x"])).toBeUndefined();
      expect(store.remainingAt(0)).toBe(0);
    });

    it("serves two banners from separate categories until each runs out", () => {
      const store = new InventoryStore();
      store.load({ url: "http://a/1.jpg", total: 2, categories: ["x"] });
      store.load({ url: "http://b/1.jpg", total: 1, categories: ["y"] });

      expect(store.serve(["x"])).toBe(markupFor("http://a/1.jpg"));
      expect(store.serve(["x"])).toBe(markupFor("http://a/1.jpg"));
      expect(store.serve(["x"])).toBeUndefined();
      expect(store.serve(["y"])).toBe(markupFor("http://b/1.jpg"));
      expect(store.serve(["y"])).toBeUndefined();
    });

    it("serves every banner sharing a category once, in any order", () => {
      const store = new InventoryStore();
      store.insert("http://a/1.jpg", 1, ["z"]);
      store.insert("http://b/1.jpg", 1, ["z"]);

      const served = [store.serve(["z"]), store.serve(["z"])];

      expect(new Set(served)).toEqual(
        new Set([markupFor("http://a/1.jpg"), markupFor("http://b/1.jpg")]),
      );
      expect(store.serve(["z"])).toBeUndefined();
    });

    it("never serves a banner outside the requested categories", () => {
      const store = new InventoryStore({ randomInt: seededRandomInt(3) });
      store.insert("http://a/1.jpg", 500, ["x"]);
      store.insert("http://b/1.jpg", 500, ["y"]);
      store.insert("http://c/1.jpg", 500, ["x", "y"]);

      const served = new Set<string | undefined>();
      for (let i = 0; i < 300; i++) {
        served.add(store.serve(["x"]));
      }

      expect(served).toEqual(new Set([markupFor("http://a/1.jpg"), markupFor("http://c/1.jpg")]));
      expect(store.remainingAt(1)).toBe(500);
    });

    it("draws from the whole inventory in proportion to total", () => {
      const store = new InventoryStore({ randomInt: seededRandomInt(11) });
      store.insert("http://a/1.jpg", 100000, ["x"]);
      store.insert("http://b/1.jpg", 300000, ["y"]);

      const trials = 20000;
      let first = 0;
      for (let i = 0; i < trials; i++) {
        if (store.serve([]) === markupFor("http://a/1.jpg")) first++;
      }

      expect(first / trials).toBeGreaterThan(0.23);
      expect(first / trials).toBeLessThan(0.27);
    });

    it("does not retry when the global draw lands on an exhausted banner", () => {
      const store = new InventoryStore({ randomInt: () => 0 });
      store.insert("http://a/1.jpg", 1, ["x"]);
      store.insert("http://b/1.jpg", 1000, ["x"]);

      expect(store.serve([])).toBe(markupFor("http://a/1.jpg"));
      expect(store.serve([])).toBeUndefined();
      // The category path filters a out instead
      expect(store.serve(["x"])).toBe(markupFor("http://b/1.jpg"));
    });

    it("weighs candidates by declared total, not remaining", () => {
      const randomInt = vi.fn((_max: number) => 0);
      const store = new InventoryStore({ randomInt });
      store.insert("http://a/1.jpg", 3, ["x"]);
      store.insert("http://b/1.jpg", 1, ["x"]);

      store.serve(["x"]);
      store.serve(["x"]);

      expect(store.remainingAt(0)).toBe(1);
      expect(randomInt).toHaveBeenLastCalledWith(4);
    });

    it("is reproducible for a fixed seed", () => {
      const run = () => {
        const store = new InventoryStore({ randomInt: seededRandomInt(99) });
        store.insert("http://a/1.jpg", 5, ["x"]);
        store.insert("http://b/1.jpg", 7, ["x", "y"]);
        store.insert("http://c/1.jpg", 9, ["y"]);
        return Array.from({ length: 15 }, () => store.serve(["y", "x"]));
      };

      expect(run()).toEqual(run());
    });
  });

  describe("shared across threads", () => {
    const buildShared = () => {
      const store = new InventoryStore();
      store.insert("http://a/1.jpg", 1, ["x"]);
      store.insert("http://b/1.jpg", 1, ["x"]);
      return { store, shared: store.share() };
    };

    it("freezes the store it exports", () => {
      const { store, shared } = buildShared();

      expect(store.isFrozen).toBe(true);
      expect(shared.categories).toEqual([["x", [0, 1]]]);
      expect(() => store.insert("http://c/1.jpg", 1, ["x"])).toThrow(InvariantViolationError);
    });

    it("depletes the same budgets from an attached store", () => {
      const { store, shared } = buildShared();
      const attached = InventoryStore.attach(shared);

      expect(attached.isFrozen).toBe(true);
      expect(attached.serve(["x"])).toBeDefined();
      expect(attached.serve(["x"])).toBeDefined();
      expect(store.serve(["x"])).toBeUndefined();
      expect(store.remainingAt(0)).toBe(0);
      expect(store.remainingAt(1)).toBe(0);
    });

    it("lets a racer lose a banner it saw as eligible", () => {
      const { store, shared } = buildShared();
      const first = InventoryStore.attach(shared, { randomInt: () => 0 });

      let raced: string | undefined;
      const second = InventoryStore.attach(shared, {
        randomInt: () => {
          // first takes banner 0 between second's filter and its depletion
          raced = first.serve(["x"]);
          return 0;
        },
      });

      expect(second.serve(["x"])).toBeUndefined();
      expect(raced).toBe(markupFor("http://a/1.jpg"));
      expect(store.remainingAt(1)).toBe(1);
    });

    it("never serves a banner more than its total across stores", () => {
      const store = new InventoryStore();
      store.insert("http://a/1.jpg", 5, ["x"]);
      const shared = store.share();
      const stores = [store, InventoryStore.attach(shared), InventoryStore.attach(shared)];

      let served = 0;
      for (let i = 0; i < 30; i++) {
        if (stores[i % stores.length].serve(i % 2 === 0 ? ["x"] : []) !== undefined) served++;
      }

      expect(served).toBe(5);
    });

    it("rejects an index pointing past the banners", () => {
      const { shared } = buildShared();

      expect(() =>
        InventoryStore.attach({ ...shared, categories: [["x", [0, 5]]] }),
      ).toThrow(InvariantViolationError);
    });
  });
});
