import fs from "node:fs";
import path from "node:path";
import { isIsoDate } from "../inventory_cost/referenceDate";
import { transformDashboardData } from "../inventory_cost/transformDashboardData";

function main(): void {
  const inputPath = process.argv[2];
  const dateIdx = process.argv.indexOf("--date");
  const referenceDate = dateIdx === -1 ? undefined : process.argv[dateIdx + 1];

  if (!inputPath || inputPath.startsWith("--") || !referenceDate || !isIsoDate(referenceDate)) {
    console.error("usage: npm run transform:file -- <payload.json> --date YYYY-MM-DD");
    process.exitCode = 1;
    return;
  }

  try {
    const resolvedPath = path.resolve(process.cwd(), inputPath);
    const response: unknown = JSON.parse(fs.readFileSync(resolvedPath, "utf-8"));
    const records = transformDashboardData(response, referenceDate);
    console.log(JSON.stringify(records, null, 2));
    console.error(`${records.length} records for ${referenceDate} from ${resolvedPath}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`transform failed: ${message}`);
    process.exitCode = 1;
  }
}

main();
