export type DashboardColumn = {
  name: string;
  dataId: string;
};

export type RawDashboardPayload = {
  // null marks a column entry without a usable Caption/DataId; it still occupies its slot
  columns: (DashboardColumn | null)[];
  encodeMaps: Record<string, (string | null)[]>;
  rowSlices: Record<string, unknown>;
};

export type FlatRow = Record<string, string>;

export type InventoryCostRecord = {
  key: string;
  date: string;
  item: string;
  area: string;
  qty: number;
  actualValue: number;
  actualUnitCost: number;
  glGroup: string | null;
  type: string;
  unit: string;
};

export type OwnerConfig = {
  ownerMap: Readonly<Record<string, string>>;
  allowedAreas: ReadonlySet<string>;
};
