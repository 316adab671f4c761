/**
 * Banner Rotator Configuration
 * All serving and loading parameters are centralized here.
 */

export const ROTATOR_CONFIG = {
  /** Markup wrapped around a banner URL on a successful impression */
  markup: {
    prefix: '<html><body><img src="',
    suffix: '"/></body></html>',
  },

  /** HTTP server defaults */
  server: {
    defaultPort: 8080,
    basePath: "/api/v1",
    categoryParam: "category",
  },

  /** Banner config file format */
  loader: {
    delimiter: ";",
  },

  /** Inventory limits */
  limits: {
    // remaining lives in a 32-bit atomic cell
    maxImpressions: 2 ** 31 - 1,
  },
} as const;

// ─── Runtime validation ──────────────────────────────────────────────────────

if (ROTATOR_CONFIG.markup.prefix.length === 0 || ROTATOR_CONFIG.markup.suffix.length === 0) {
  throw new Error("[rotator-config] markup prefix and suffix must be non-empty");
}

if (ROTATOR_CONFIG.loader.delimiter.length !== 1) {
  throw new Error(
    `[rotator-config] loader delimiter must be a single character, got "${ROTATOR_CONFIG.loader.delimiter}"`,
  );
}

/** Wrap a banner URL in the served markup. The URL is not escaped. */
export const renderMarkup = (url: string): string =>
  `${ROTATOR_CONFIG.markup.prefix}${url}${ROTATOR_CONFIG.markup.suffix}`;
