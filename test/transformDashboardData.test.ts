import { describe, expect, it } from "vitest";
import { transformDashboardData } from "../src/inventory_cost/transformDashboardData";
import { makeDashboardResponse } from "./utils/makeDashboardResponse";

// Columns: Owner, Date, ItemCode, Sublot, Qty, ActualValue, GLGroup, Type, Unit
describe("transformDashboardData", () => {
  it("decodes, filters and aggregates a dashboard response", () => {
    const response = makeDashboardResponse([
      [0, 0, 0, -1, 0, 0, 0, 0, 0],
      [0, 0, 0, -1, 1, 1, -1, -1, -1],
      [2, 0, 1, 0, 2, 2, -1, 0, 0],
      [1, 0, 0, -1, 0, 0, 0, 0, 0],
      [0, 1, 0, -1, 0, 0, 0, 0, 0],
      [3, 0, 0, -1, 0, 0, 0, 0, 0],
      "KeyIds",
    ]);

    const records = transformDashboardData(response, "2024-01-02");

    expect(records).toEqual([
      {
        key: "X1-0-SHOTTYS-2024-01-02",
        date: "2024-01-02",
        item: "X1",
        area: "SHOTTYS",
        qty: 15,
        actualValue: 70,
        actualUnitCost: 70 / 15,
        glGroup: "Finished Goods",
        type: "Stock",
        unit: "EA",
      },
      {
        key: "Y2-A-IMPACKFUL-2024-01-02",
        date: "2024-01-02",
        item: "Y2",
        area: "IMPACKFUL",
        qty: 3,
        actualValue: 9,
        actualUnitCost: 3,
        glGroup: null,
        type: "Stock",
        unit: "EA",
      },
    ]);
  });

  it("returns no records when nothing matches the reference date", () => {
    const response = makeDashboardResponse([[0, 0, 0, -1, 0, 0, 0, 0, 0]]);
    expect(transformDashboardData(response, "2023-12-31")).toEqual([]);
  });

  it("raises on a structurally broken response", () => {
    expect(() => transformDashboardData({ ItemData: {} }, "2024-01-02")).toThrow(
      "Dashboard payload is missing ItemData.DataStorageDTO"
    );
  });
});
