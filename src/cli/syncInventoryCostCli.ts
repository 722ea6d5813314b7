import { loadSyncConfig, type SyncConfig } from "../config/env";
import { createPgPool } from "../db/pgPool";
import { createPgInventoryCostStore, type InventoryCostStore } from "../ingest/upsertInventoryCost";
import { formatError } from "../ingest/utils";
import { isIsoDate, resolveReferenceDate } from "../inventory_cost/referenceDate";
import type { InventoryCostRecord } from "../inventory_cost/types";
import { scrapeMarkovInventory } from "../markov/scrapeInventory";
import { MarkovSessionClient } from "../markov/sessionClient";
import { runInventoryCostSync } from "../pipeline/syncInventoryCost";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INTERRUPTED = 130;

const RULE = "=".repeat(60);
const SAMPLE_SIZE = 3;

export type ScrapeRequest = {
  dashboardId: string;
  itemId: string;
  referenceDate: string;
};

export type SyncCliDeps = {
  env?: Record<string, string | undefined>;
  now?: () => Date;
  createStore: (databaseUrl: string) => InventoryCostStore;
  scrape: (config: SyncConfig, request: ScrapeRequest) => Promise<InventoryCostRecord[]>;
};

// Shared with the interrupt handler so it can end the pool before exiting.
export type ActiveSyncRun = {
  store: InventoryCostStore | null;
};

export const defaultSyncCliDeps: SyncCliDeps = {
  createStore: (databaseUrl) => createPgInventoryCostStore(createPgPool(databaseUrl)),
  scrape: (config, request) =>
    scrapeMarkovInventory(
      new MarkovSessionClient({
        baseUrl: config.baseUrl,
        returnUrl: config.returnUrl,
        timeoutMs: config.httpTimeoutMs,
      }),
      {
        credentials: { company: config.company, email: config.email, password: config.password },
        ...request,
      }
    ),
};

export function usage() {
  console.log(
    "Usage: npm run sync -- [--dry-run] [--date YYYY-MM-DD] [--dashboard-id <id>] [--item-id <id>]\n" +
      "Without --date, the day before today in MARKOV_TIME_ZONE (default UTC) is synced."
  );
}

function getArg(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

function timestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

async function sync(argv: string[], deps: SyncCliDeps, active: ActiveSyncRun): Promise<void> {
  console.log(RULE);
  console.log("Markov Inventory Cost Sync");
  console.log(RULE);
  console.log(`Started at: ${timestamp()}\n`);

  const dryRun = argv.includes("--dry-run");
  const dateArg = getArg(argv, "--date");
  if (dateArg !== undefined && !isIsoDate(dateArg)) {
    usage();
    throw new Error(`Invalid --date: ${dateArg}`);
  }

  const config = loadSyncConfig({ requireDatabase: !dryRun }, deps.env ?? process.env);
  const now = deps.now ? deps.now() : new Date();
  const request: ScrapeRequest = {
    dashboardId: getArg(argv, "--dashboard-id") ?? config.dashboardId,
    itemId: getArg(argv, "--item-id") ?? config.itemId,
    referenceDate: dateArg ?? resolveReferenceDate(now, config.timeZone),
  };

  const store = !dryRun && config.databaseUrl ? deps.createStore(config.databaseUrl) : null;
  active.store = store;

  try {
    const result = await runInventoryCostSync({
      store,
      dryRun,
      scrape: () => deps.scrape(config, request),
    });

    console.log(`\n${RULE}`);
    if (result.status === "dry-run") {
      console.log(`DRY RUN: ${result.records.length} records would be uploaded. Sample records:`);
      for (const record of result.records.slice(0, SAMPLE_SIZE)) {
        console.log(JSON.stringify(record, null, 2));
      }
    } else {
      console.log(`SUCCESS: ${result.recordsUploaded} records uploaded to database`);
    }
    console.log(RULE);
    console.log(`Completed at: ${timestamp()}`);
  } finally {
    const open = active.store;
    active.store = null;
    if (open) await open.close();
  }
}

/** Runs one sync and maps the outcome to a process exit code. */
export async function runSyncCli(
  argv: string[],
  deps: SyncCliDeps = defaultSyncCliDeps,
  active: ActiveSyncRun = { store: null }
): Promise<number> {
  if (argv.includes("--help")) {
    usage();
    return EXIT_OK;
  }

  try {
    await sync(argv, deps, active);
    return EXIT_OK;
  } catch (err) {
    console.error(`\n${RULE}`);
    console.error(`ERROR: ${formatError(err)}`);
    console.error(RULE);
    console.error(err);
    return EXIT_ERROR;
  }
}

export function createInterruptHandler(
  active: ActiveSyncRun,
  exit: (code: number) => void
): () => Promise<number> {
  return async () => {
    console.log("\n\nProcess interrupted by user");
    const store = active.store;
    active.store = null;
    if (store) {
      try {
        await store.close();
      } catch (err) {
        console.warn(`Failed to close database pool: ${formatError(err)}`);
      }
    }
    exit(EXIT_INTERRUPTED);
    return EXIT_INTERRUPTED;
  };
}
