import type { InventoryCostStore } from "../ingest/upsertInventoryCost";
import type { InventoryCostRecord } from "../inventory_cost/types";

export type InventoryCostSyncOptions = {
  store: Pick<InventoryCostStore, "checkConnection" | "upsert"> | null;
  scrape: () => Promise<InventoryCostRecord[]>;
  dryRun?: boolean;
};

export type InventoryCostSyncResult =
  | { status: "ok"; recordsUploaded: number }
  | { status: "empty"; recordsUploaded: 0 }
  | { status: "dry-run"; recordsUploaded: 0; records: InventoryCostRecord[] };

export async function runInventoryCostSync(
  opts: InventoryCostSyncOptions
): Promise<InventoryCostSyncResult> {
  const { store, scrape, dryRun = false } = opts;
  if (!dryRun && !store) {
    throw new Error("A store is required unless running with --dry-run.");
  }

  if (store && !dryRun) {
    console.log("Step 1: Testing database connection...");
    try {
      const version = await store.checkConnection();
      console.log(`Connected to PostgreSQL: ${version}`);
    } catch (err) {
      throw new Error("Database connection failed. Please check DATABASE_URL.", { cause: err });
    }
  } else {
    console.log("Step 1: Skipping database connection check (dry run).");
  }

  console.log("Step 2: Scraping inventory data from Markov...");
  const records = await scrape();
  if (records.length === 0) {
    console.warn("WARNING: No inventory data scraped. Nothing to upload.");
    return { status: "empty", recordsUploaded: 0 };
  }
  console.log(`Successfully scraped ${records.length} inventory items`);

  if (dryRun || !store) {
    return { status: "dry-run", recordsUploaded: 0, records };
  }

  console.log(`Step 3: Uploading ${records.length} records to PostgreSQL...`);
  const recordsUploaded = await store.upsert(records);
  return { status: "ok", recordsUploaded };
}
