import { Hono } from "hono";
import { ROTATOR_CONFIG } from "./config/rotator-config";
import swaggerRoutes from "./docs/swagger-routes";
import { isInvariantViolation, type InvariantViolationError } from "./modules/banners/banner-errors";
import { createHealthCheck } from "./modules/banners/banners-controllers";
import { createBannersRoutes } from "./modules/banners/banners-routes";
import type { InventoryStore } from "./modules/banners/inventory-store";

export interface AppOptions {
  /** Called when the inventory's structural contract is found broken. */
  onFatal: (error: InvariantViolationError) => void;
}

export const createApp = (store: InventoryStore, { onFatal }: AppOptions) => {
  const app = new Hono().basePath(ROTATOR_CONFIG.server.basePath);

  app.get("/health", createHealthCheck(store));
  app.route("/banners", createBannersRoutes(store));
  app.route("/", swaggerRoutes);

  app.onError((error, c) => {
    if (isInvariantViolation(error)) {
      console.error("[app] Inventory invariant violated:", error.message);
      onFatal(error);
    } else {
      console.error("[app] Unhandled error:", error);
    }
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
};
