import { readdir, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Pool } from "pg";

async function main(): Promise<void> {
  const connectionString = process.env.PAYMENTS_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("PAYMENTS_POSTGRES_URL is required.");
  }

  const migrationDir = resolve(process.cwd(), "sql");
  const files = (await readdir(migrationDir)).filter((name) => name.endsWith(".sql")).sort();
  const pool = new Pool({ connectionString });

  try {
    for (const file of files) {
      const sql = await readFile(resolve(migrationDir, file), "utf8");
      await pool.query(sql);
      console.log(`db:migrate applied ${file}`);
    }
  } finally {
    await pool.end();
  }
}

await main();
