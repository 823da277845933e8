import "dotenv/config";
import { defineConfig } from "drizzle-kit";

// Run from the repository root (see the db:* scripts in the root package.json).
export default defineConfig({
  dialect: "postgresql",
  schema: "./packages/db/src/schema/index.ts",
  out: "./packages/db/migrations",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "",
  },
});
