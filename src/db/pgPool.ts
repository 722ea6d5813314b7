import { Pool, type ClientBase } from "pg";

export function createPgPool(databaseUrl: string): Pool {
  return new Pool({ connectionString: databaseUrl, max: 1 });
}

export async function checkConnection(client: ClientBase): Promise<string> {
  const result = await client.query<{ version: string }>("select version() as version");
  return result.rows[0]?.version ?? "unknown";
}
