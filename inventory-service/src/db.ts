import { Pool } from "pg";

export function createPool(
  databaseUrl: string,
  connectionTimeoutMs = 5000
): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    connectionTimeoutMillis: connectionTimeoutMs,
  });

  // Idle clients can lose their connection; pg emits this instead of throwing.
  pool.on("error", (error) => {
    console.error("[db] Idle client error:", error.message);
  });

  return pool;
}
