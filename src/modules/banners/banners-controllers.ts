import type { Context } from "hono";
import { ROTATOR_CONFIG } from "../../config/rotator-config";
import type { InventoryStore } from "./inventory-store";

// ─── Serve Banner ────────────────────────────────────────────────────────────

/**
 * Decode repeated `category` query parameters. Blank values are dropped;
 * no categories at all means any banner may be served.
 */
export const readCategories = (c: Context): string[] =>
  (c.req.queries(ROTATOR_CONFIG.server.categoryParam) ?? [])
    .map((category) => category.trim())
    .filter((category) => category.length > 0);

export const createServeBanner = (store: InventoryStore) => (c: Context) => {
  const startTime = Date.now();
  const categories = readCategories(c);
  const log = [`categories=${categories.length === 0 ? "*" : categories.join(",")}`];

  const markup = store.serve(categories);

  if (markup === undefined) {
    console.log(`[serveBanner] ${log.join(" | ")} | NO_BANNER | ${Date.now() - startTime}ms`);
    return c.json({ message: "No banner available" }, 404);
  }

  console.log(`[serveBanner] ${log.join(" | ")} | SERVED | ${Date.now() - startTime}ms`);
  return c.html(markup);
};

// ─── Health ──────────────────────────────────────────────────────────────────

export const createHealthCheck = (store: InventoryStore) => (c: Context) =>
  c.json({
    status: "ok",
    banners: store.size,
    timestamp: new Date().toISOString(),
  });
