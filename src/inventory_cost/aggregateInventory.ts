import type { InventoryCostRecord } from "./types";

// Non-numeric fields stay as the first record seen for a key; later duplicates only add to qty/value.
export function aggregateInventoryRecords(records: InventoryCostRecord[]): InventoryCostRecord[] {
  const byKey = new Map<string, InventoryCostRecord>();
  for (const record of records) {
    const existing = byKey.get(record.key);
    if (!existing) {
      byKey.set(record.key, { ...record });
      continue;
    }
    existing.qty += record.qty;
    existing.actualValue += record.actualValue;
    existing.actualUnitCost = existing.qty === 0 ? 0 : existing.actualValue / existing.qty;
  }
  return [...byKey.values()];
}
