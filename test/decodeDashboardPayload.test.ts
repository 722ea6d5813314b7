import { describe, expect, it } from "vitest";
import {
  decodeDashboardRows,
  extractDashboardPayload,
} from "../src/inventory_cost/decodeDashboardPayload";
import type { RawDashboardPayload } from "../src/inventory_cost/types";
import { makeDashboardResponse } from "./utils/makeDashboardResponse";

function payload(rowKeys: string[], overrides: Partial<RawDashboardPayload> = {}): RawDashboardPayload {
  const rowSlices: Record<string, unknown> = {};
  for (const key of rowKeys) rowSlices[key] = {};
  return {
    columns: [
      { name: "A", dataId: "a" },
      { name: "B", dataId: "missing" },
      { name: "C", dataId: "c" },
    ],
    encodeMaps: {
      a: ["a0", "a1", "a2"],
      c: ["c0", "c1", "c2", "c3", "c4", "c5"],
    },
    rowSlices,
    ...overrides,
  };
}

describe("decodeDashboardRows", () => {
  it("skips absent fields and columns without a dictionary", () => {
    expect(decodeDashboardRows(payload(["[2,-1,5]"]))).toEqual([{ A: "a2", C: "c5" }]);
    expect(decodeDashboardRows(payload(["[2,1,5]"]))).toEqual([{ A: "a2", C: "c5" }]);
  });

  it("decodes a row of only -1 entries to an empty row", () => {
    expect(decodeDashboardRows(payload(["[-1,-1,-1]"]))).toEqual([{}]);
  });

  it("drops out-of-range indices and positions beyond the known columns", () => {
    expect(decodeDashboardRows(payload(["[3,0,6,0]"]))).toEqual([{}]);
    expect(decodeDashboardRows(payload(["[-2,0,1]"]))).toEqual([{ C: "c1" }]);
    expect(decodeDashboardRows(payload(["[0,0,0,0,0]"]))).toEqual([{ A: "a0", C: "c0" }]);
  });

  it("ignores keys that are not array literals", () => {
    const rows = decodeDashboardRows(payload(["KeyIds", "[1,2", "{\"a\":1}", "[0,-1,1]", "[\"x\"]"]));
    expect(rows).toEqual([{ A: "a0", C: "c1" }]);
  });

  it("skips keys whose array holds anything but integers", () => {
    const rows = decodeDashboardRows(payload(["[\"q\"]", "[0,-1,1.5]", "[0,null,1]", "[0]"]));
    expect(rows).toEqual([{ A: "a0" }]);
  });

  it("skips null dictionary slots", () => {
    const rows = decodeDashboardRows(
      payload(["[0,-1,0]"], { encodeMaps: { a: [null], c: ["c0"] } })
    );
    expect(rows).toEqual([{ C: "c0" }]);
  });

  it("skips columns that had no caption or data id", () => {
    const rows = decodeDashboardRows(
      payload(["[0,-1,0]"], { columns: [null, null, { name: "C", dataId: "c" }] })
    );
    expect(rows).toEqual([{ C: "c0" }]);
  });

  it("keeps row slice insertion order and leaves the payload untouched", () => {
    const input = payload(["[1,-1,0]", "[0,-1,1]"]);
    const before = JSON.stringify(input);
    expect(decodeDashboardRows(input)).toEqual([
      { A: "a1", C: "c0" },
      { A: "a0", C: "c1" },
    ]);
    expect(JSON.stringify(input)).toBe(before);
  });
});

describe("extractDashboardPayload", () => {
  it("reads columns, dictionaries and the first slice", () => {
    const extracted = extractDashboardPayload(
      makeDashboardResponse([[0, 1]], {
        columns: [
          ["Owner", "d0"],
          ["Qty", "d4"],
        ],
        encodeMaps: { d0: ["4"], d4: [3, true, null, { x: 1 }], bad: "nope" },
      })
    );
    expect(extracted.columns).toEqual([
      { name: "Owner", dataId: "d0" },
      { name: "Qty", dataId: "d4" },
    ]);
    expect(extracted.encodeMaps).toEqual({ d0: ["4"], d4: ["3", "true", null, null] });
    expect(Object.keys(extracted.rowSlices)).toEqual(["[0,1]"]);
  });

  it("marks malformed column entries as unusable without shifting positions", () => {
    const extracted = extractDashboardPayload({
      ItemData: { DataStorageDTO: { EncodeMaps: {}, Slices: [{ Data: {} }] } },
      ViewModel: { Columns: [{ Caption: "Owner" }, "junk", { Caption: "Date", DataId: "d1" }] },
    });
    expect(extracted.columns).toEqual([null, null, { name: "Date", dataId: "d1" }]);
  });

  it("treats an empty slice list as zero rows", () => {
    const extracted = extractDashboardPayload({
      ItemData: { DataStorageDTO: { EncodeMaps: {}, Slices: [] } },
      ViewModel: { Columns: [] },
    });
    expect(extracted.rowSlices).toEqual({});
  });

  it("throws when a structural section is missing", () => {
    expect(() => extractDashboardPayload(null)).toThrow(
      "Dashboard payload is missing the response object"
    );
    expect(() => extractDashboardPayload({ ViewModel: { Columns: [] } })).toThrow(
      "Dashboard payload is missing ItemData"
    );
    expect(() =>
      extractDashboardPayload({
        ItemData: { DataStorageDTO: { EncodeMaps: {}, Slices: [] } },
        ViewModel: {},
      })
    ).toThrow("Dashboard payload is missing ViewModel.Columns");
    expect(() =>
      extractDashboardPayload({
        ItemData: { DataStorageDTO: { EncodeMaps: {}, Slices: [{}] } },
        ViewModel: { Columns: [] },
      })
    ).toThrow("Dashboard payload is missing ItemData.DataStorageDTO.Slices[0].Data");
  });
});
