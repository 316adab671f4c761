import { parentPort, workerData } from "worker_threads";
import { InventoryStore, type SharedInventory } from "../inventory-store";

export interface ServeJob {
  shared: SharedInventory;
  categories: string[];
  attempts: number;
}

const { shared, categories, attempts }: ServeJob = workerData;
const store = InventoryStore.attach(shared);

let served = 0;
for (let i = 0; i < attempts; i++) {
  if (store.serve(categories) !== undefined) served++;
}

parentPort?.postMessage(served);
