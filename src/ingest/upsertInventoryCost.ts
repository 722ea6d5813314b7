import type { ClientBase, Pool } from "pg";
import type { InventoryCostRecord } from "../inventory_cost/types";
import { checkConnection } from "../db/pgPool";
import { chunkArray } from "./utils";

export const INVENTORY_COST_TABLE = "inventory_cost";

export const INVENTORY_COST_COLUMNS = [
  "key",
  "gl_group",
  "type",
  "qty",
  "unit",
  "actual_unit_cost",
  "actual_value",
  "date",
  "area",
  "item",
] as const;

const UPSERT_CHUNK_SIZE = 500;

type UpsertStatement = {
  text: string;
  values: (string | number | null)[];
};

export type InventoryCostStore = {
  checkConnection(): Promise<string>;
  upsert(records: InventoryCostRecord[]): Promise<number>;
  close(): Promise<void>;
};

function toRowValues(record: InventoryCostRecord): (string | number | null)[] {
  return [
    record.key,
    record.glGroup,
    record.type,
    record.qty,
    record.unit,
    record.actualUnitCost,
    record.actualValue,
    record.date,
    record.area,
    record.item,
  ];
}

export function buildInventoryCostUpsert(records: InventoryCostRecord[]): UpsertStatement {
  if (records.length === 0) throw new Error("Cannot build an upsert for zero records");
  const width = INVENTORY_COST_COLUMNS.length;
  const values: (string | number | null)[] = [];
  const tuples: string[] = [];
  records.forEach((record, rowIndex) => {
    const placeholders = INVENTORY_COST_COLUMNS.map((_, col) => `$${rowIndex * width + col + 1}`);
    tuples.push(`(${placeholders.join(", ")})`);
    values.push(...toRowValues(record));
  });

  const updates = INVENTORY_COST_COLUMNS.filter((column) => column !== "key").map(
    (column) => `${column} = excluded.${column}`
  );

  const text = [
    `insert into ${INVENTORY_COST_TABLE} (${INVENTORY_COST_COLUMNS.join(", ")})`,
    `values ${tuples.join(", ")}`,
    "on conflict (key) do update set",
    updates.join(", "),
  ].join("\n");

  return { text, values };
}

/**
 * Upserts every record in one transaction. Any failure rolls the whole batch
 * back and rethrows. Returns the number of records written.
 */
export async function upsertInventoryCost(
  client: ClientBase,
  records: InventoryCostRecord[]
): Promise<number> {
  if (records.length === 0) return 0;

  await client.query("begin");
  try {
    for (const chunk of chunkArray(records, UPSERT_CHUNK_SIZE)) {
      const statement = buildInventoryCostUpsert(chunk);
      await client.query(statement.text, statement.values);
    }
    await client.query("commit");
  } catch (err) {
    await client.query("rollback");
    throw err;
  }
  return records.length;
}

export function createPgInventoryCostStore(pool: Pool): InventoryCostStore {
  return {
    async checkConnection() {
      const client = await pool.connect();
      try {
        return await checkConnection(client);
      } finally {
        client.release();
      }
    },
    async upsert(records) {
      const client = await pool.connect();
      try {
        return await upsertInventoryCost(client, records);
      } finally {
        client.release();
      }
    },
    async close() {
      await pool.end();
    },
  };
}
