import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { CliArgsError, USAGE, parseCliArgs } from "./config/cli-args";
import { InventoryStore } from "./modules/banners/inventory-store";
import { loadBannerFile } from "./modules/loader/csv-loader";
import { seededRandomInt } from "./utils/random";

async function bootstrap(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  const store = new InventoryStore(
    args.seed === undefined ? {} : { randomInt: seededRandomInt(args.seed) },
  );
  await loadBannerFile(args.file, store);
  store.freeze();

  const app = createApp(store, {
    onFatal: () => {
      console.error("[server] Aborting: inventory can no longer be trusted");
      process.exit(1);
    },
  });

  serve({ fetch: app.fetch, port: args.port }, (info) => {
    console.log(`[server] Serving ${store.size} banners on port ${info.port}`);
  });
}

bootstrap().catch((error) => {
  if (error instanceof CliArgsError) {
    console.error(`${error.message}\n\n${USAGE}`);
    process.exit(2);
  }
  console.error("[server] Failed to start:", error);
  process.exit(1);
});
