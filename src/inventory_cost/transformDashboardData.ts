import { aggregateInventoryRecords } from "./aggregateInventory";
import { decodeDashboardRows, extractDashboardPayload } from "./decodeDashboardPayload";
import { normalizeInventoryRows } from "./normalizeInventoryRows";
import { DEFAULT_OWNER_CONFIG } from "./ownerMap";
import type { InventoryCostRecord, OwnerConfig } from "./types";

export function transformDashboardData(
  response: unknown,
  referenceDate: string,
  ownerConfig: OwnerConfig = DEFAULT_OWNER_CONFIG
): InventoryCostRecord[] {
  const payload = extractDashboardPayload(response);
  const rows = decodeDashboardRows(payload);
  const candidates = normalizeInventoryRows(rows, referenceDate, ownerConfig);
  return aggregateInventoryRecords(candidates);
}
