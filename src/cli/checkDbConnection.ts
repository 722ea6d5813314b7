import { requireEnv } from "../config/env";
import { checkConnection, createPgPool } from "../db/pgPool";

async function main() {
  const pool = createPgPool(requireEnv("DATABASE_URL"));
  try {
    const client = await pool.connect();
    try {
      console.log(`Connected to PostgreSQL: ${await checkConnection(client)}`);
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  console.error(`Connection failed: ${error instanceof Error ? error.message : error}`);
  process.exit(1);
});
