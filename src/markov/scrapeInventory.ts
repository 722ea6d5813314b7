import { transformDashboardData } from "../inventory_cost/transformDashboardData";
import type { InventoryCostRecord, OwnerConfig } from "../inventory_cost/types";
import type { MarkovCredentials, MarkovSession } from "./sessionClient";

export type DashboardSessionClient = {
  login(credentials: MarkovCredentials): Promise<MarkovSession>;
  fetchPayload(session: MarkovSession, dashboardId: string, itemId: string): Promise<unknown>;
  logoutQuietly(session: MarkovSession): Promise<void>;
};

export type ScrapeInventoryOptions = {
  credentials: MarkovCredentials;
  dashboardId: string;
  itemId: string;
  referenceDate: string;
  ownerConfig?: OwnerConfig;
};

/**
 * Logs in, fetches the inventory grid item and transforms it. Logout is always
 * attempted once a session exists; a failed logout never masks the result.
 */
export async function scrapeMarkovInventory(
  client: DashboardSessionClient,
  options: ScrapeInventoryOptions
): Promise<InventoryCostRecord[]> {
  console.log("Logging in...");
  const session = await client.login(options.credentials);

  try {
    console.log("Fetching dashboard data...");
    const response = await client.fetchPayload(session, options.dashboardId, options.itemId);

    console.log(`Transforming data for ${options.referenceDate}...`);
    return transformDashboardData(response, options.referenceDate, options.ownerConfig);
  } finally {
    console.log("Logging out...");
    await client.logoutQuietly(session);
  }
}
