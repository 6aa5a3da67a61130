import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";

// drizzle-kit runs from packages/db; the .env lives at the repository root
if (!process.env.DATABASE_URL) {
  config({ path: "../../.env" });
}

export default defineConfig({
  schema: "./src/schema/index.ts",
  out: "./drizzle",
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "",
  },
});
