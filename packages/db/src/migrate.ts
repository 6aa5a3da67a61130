import "dotenv/config";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import { closeDb, createDb } from "./client.js";

const migrationsFolder = fileURLToPath(new URL("../drizzle", import.meta.url));

async function runMigrations() {
  console.log(`Running migrations from ${migrationsFolder}...`);
  const db = createDb();
  try {
    await migrate(db, { migrationsFolder });
  } finally {
    await closeDb(db);
  }
  console.log("Migrations complete.");
}

runMigrations().catch((err) => {
  console.error("Migration failed:", err);
  process.exitCode = 1;
});
