import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ROTATOR_CONFIG } from "../../config/rotator-config";
import type { BannerRecord, InventoryStore } from "../banners/inventory-store";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RejectedRow {
  row: number;
  reason: string;
}

export interface LoadSummary {
  loaded: number;
  rejected: RejectedRow[];
}

// ─── Row schema ──────────────────────────────────────────────────────────────

/**
 * One row: url;total;category1;category2;...
 * The amount must be written in plain decimal digits. Blank category cells
 * (e.g. a trailing delimiter) are dropped; whether the remaining values are
 * acceptable is the store's call.
 */
const bannerRowSchema = z
  .array(z.string())
  .min(2, "expected at least url and impression amount")
  .transform(([url, total, ...categories]) => ({
    url,
    total,
    categories: categories.filter((category) => category.length > 0),
  }))
  .pipe(
    z.object({
      url: z.string(),
      total: z
        .string()
        .regex(/^\d+$/, "impression amount is not a whole number")
        .transform((digits) => Number(digits)),
      categories: z.array(z.string()),
    }),
  );

export const parseBannerRow = (
  row: string[],
): { success: true; record: BannerRecord } | { success: false; reason: string } => {
  const result = bannerRowSchema.safeParse(row);
  if (!result.success) {
    return {
      success: false,
      reason: result.error.issues.map((issue) => issue.message).join("; "),
    };
  }
  return { success: true, record: result.data };
};

// ─── Loading ─────────────────────────────────────────────────────────────────

/**
 * Load every row of a banner config into the store. A bad row is logged and
 * skipped; it never stops the load.
 */
export const loadBannerCsv = (source: string, store: InventoryStore): LoadSummary => {
  // Quoting is off: a quote is an ordinary character of a url or category,
  // so one stray quote cannot swallow the rows after it.
  const rows: string[][] = parse(source, {
    delimiter: ROTATOR_CONFIG.loader.delimiter,
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  const summary: LoadSummary = { loaded: 0, rejected: [] };

  rows.forEach((cells, i) => {
    const row = i + 1;
    const parsed = parseBannerRow(cells);
    if (!parsed.success) {
      summary.rejected.push({ row, reason: parsed.reason });
      console.warn(`[loader] row=${row} malformed: ${parsed.reason}`);
      return;
    }

    const result = store.load(parsed.record);
    if (!result.ok) {
      summary.rejected.push({ row, reason: result.error.kind });
      console.warn(`[loader] row=${row} rejected=${result.error.kind} url="${parsed.record.url}"`);
      return;
    }
    summary.loaded++;
  });

  console.log(`[loader] loaded=${summary.loaded} rejected=${summary.rejected.length}`);
  return summary;
};

export const loadBannerFile = async (
  path: string,
  store: InventoryStore,
): Promise<LoadSummary> => {
  const source = await readFile(path, "utf8");
  return loadBannerCsv(source, store);
};
