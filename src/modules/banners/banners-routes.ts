import { Hono } from "hono";
import { createServeBanner } from "./banners-controllers";
import type { InventoryStore } from "./inventory-store";

export const createBannersRoutes = (store: InventoryStore): Hono => {
  const bannersRoutes = new Hono();

  // GET /banners/serve?category=a&category=b — public
  bannersRoutes.get("/serve", createServeBanner(store));

  return bannersRoutes;
};
