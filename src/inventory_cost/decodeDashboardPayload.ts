import type { DashboardColumn, FlatRow, RawDashboardPayload } from "./types";

type RecordValue = Record<string, unknown>;

const ABSENT_INDEX = -1;

function isRecord(value: unknown): value is RecordValue {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): RecordValue {
  if (!isRecord(value)) {
    throw new Error(`Dashboard payload is missing ${path}`);
  }
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Dashboard payload is missing ${path}`);
  }
  return value;
}

function toColumn(value: unknown): DashboardColumn | null {
  if (!isRecord(value)) return null;
  const { Caption, DataId } = value;
  if (typeof Caption !== "string" || typeof DataId !== "string") return null;
  return { name: Caption, dataId: DataId };
}

function toDictionaryValue(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

/**
 * Pulls the column layout, dictionaries and row slices out of a
 * DashboardItemGetAction response. Throws when a section is missing.
 */
export function extractDashboardPayload(response: unknown): RawDashboardPayload {
  const root = requireRecord(response, "the response object");
  const itemData = requireRecord(root.ItemData, "ItemData");
  const storage = requireRecord(itemData.DataStorageDTO, "ItemData.DataStorageDTO");
  const rawEncodeMaps = requireRecord(storage.EncodeMaps, "ItemData.DataStorageDTO.EncodeMaps");
  const slices = requireArray(storage.Slices, "ItemData.DataStorageDTO.Slices");
  const viewModel = requireRecord(root.ViewModel, "ViewModel");
  const rawColumns = requireArray(viewModel.Columns, "ViewModel.Columns");

  let rowSlices: Record<string, unknown> = {};
  if (slices.length > 0) {
    const firstSlice = requireRecord(slices[0], "ItemData.DataStorageDTO.Slices[0]");
    rowSlices = { ...requireRecord(firstSlice.Data, "ItemData.DataStorageDTO.Slices[0].Data") };
  }

  const encodeMaps: Record<string, (string | null)[]> = {};
  for (const [dataId, values] of Object.entries(rawEncodeMaps)) {
    if (!Array.isArray(values)) continue;
    encodeMaps[dataId] = values.map(toDictionaryValue);
  }

  return {
    columns: rawColumns.map(toColumn),
    encodeMaps,
    rowSlices,
  };
}

function isIntegerArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => Number.isInteger(item));
}

function parseRowKey(key: string): number[] | null {
  if (!key.startsWith("[")) return null;
  try {
    const parsed: unknown = JSON.parse(key);
    return isIntegerArray(parsed) ? parsed : null;
  } catch {
    // slice data also carries non-row metadata keys
    return null;
  }
}

function resolveField(
  payload: RawDashboardPayload,
  position: number,
  index: number
): { name: string; value: string } | null {
  if (index === ABSENT_INDEX || index < 0) return null;
  if (position >= payload.columns.length) return null;
  const column = payload.columns[position];
  if (!column) return null;
  if (!Object.prototype.hasOwnProperty.call(payload.encodeMaps, column.dataId)) return null;
  const dictionary = payload.encodeMaps[column.dataId];
  if (index >= dictionary.length) return null;
  const value = dictionary[index];
  if (value === null) return null;
  return { name: column.name, value };
}

export function decodeDashboardRows(payload: RawDashboardPayload): FlatRow[] {
  const rows: FlatRow[] = [];
  for (const key of Object.keys(payload.rowSlices)) {
    const indices = parseRowKey(key);
    if (!indices) continue;

    const row: FlatRow = {};
    indices.forEach((index, position) => {
      const field = resolveField(payload, position, index);
      if (field) row[field.name] = field.value;
    });
    rows.push(row);
  }
  return rows;
}
