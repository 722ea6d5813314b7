import { DEFAULT_OWNER_CONFIG } from "./ownerMap";
import type { FlatRow, InventoryCostRecord, OwnerConfig } from "./types";

export function remapOwner(row: FlatRow, ownerMap: OwnerConfig["ownerMap"]): FlatRow {
  const owner = row.Owner;
  if (owner === undefined) return row;
  if (!Object.prototype.hasOwnProperty.call(ownerMap, owner)) return row;
  return { ...row, Owner: ownerMap[owner] };
}

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function parseAmount(value: string | undefined): number {
  if (value === undefined) return 0;
  const raw = value.trim();
  if (!DECIMAL_RE.test(raw)) return 0;
  const num = Number(raw);
  return Number.isFinite(num) ? num : 0;
}

export function unitCost(actualValue: number, qty: number): number {
  if (qty === 0 || actualValue === 0) return 0;
  return actualValue / qty;
}

export function buildInventoryKey(itemCode: string, sublot: string, area: string, date: string): string {
  return `${itemCode}-${sublot}-${area}-${date.slice(0, 10)}`;
}

function toInventoryRecord(row: FlatRow, area: string, date: string): InventoryCostRecord {
  const item = row.ItemCode ?? "";
  const sublot = row.Sublot ?? "0";
  const qty = parseAmount(row.Qty);
  const actualValue = parseAmount(row.ActualValue);
  return {
    key: buildInventoryKey(item, sublot, area, date),
    date: date.slice(0, 10),
    item,
    area,
    qty,
    actualValue,
    actualUnitCost: unitCost(actualValue, qty),
    glGroup: row.GLGroup ?? null,
    type: row.Type ?? "",
    unit: row.Unit ?? "",
  };
}

/**
 * Keeps rows dated `referenceDate` whose remapped owner is in the allow-set,
 * and reshapes them into inventory cost records. Input order is preserved.
 */
export function normalizeInventoryRows(
  rows: FlatRow[],
  referenceDate: string,
  ownerConfig: OwnerConfig = DEFAULT_OWNER_CONFIG
): InventoryCostRecord[] {
  const records: InventoryCostRecord[] = [];
  for (const raw of rows) {
    const row = remapOwner(raw, ownerConfig.ownerMap);
    const date = row.Date;
    const area = row.Owner;
    if (date === undefined || date.slice(0, 10) !== referenceDate) continue;
    if (area === undefined || !ownerConfig.allowedAreas.has(area)) continue;
    records.push(toInventoryRecord(row, area, date));
  }
  return records;
}
