import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Pool } from "pg";
import { makeLogger } from "../src/infra/logger.js";

async function main(): Promise<void> {
  const logger = makeLogger({ bindings: { script: "db:migrate" } });
  const connectionString = process.env.CSL_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("CSL_POSTGRES_URL is required.");
  }

  const migrationPath = resolve(process.cwd(), "sql", "001_settlement_ledger.sql");
  const sql = await readFile(migrationPath, "utf8");
  const pool = new Pool({ connectionString });

  try {
    await pool.query(sql);
    logger.info({ migration: migrationPath }, "db:migrate OK");
  } finally {
    await pool.end();
  }
}

await main();
