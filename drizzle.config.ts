import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";

config({ path: ".env.local" });

const databaseUrl = process.env.DATABASE_URL || "sqlite:./cronsentinel.db";

export default defineConfig({
  schema: "./src/db/schema",
  out: "./src/db/migrations",
  dialect: "sqlite",
  dbCredentials: {
    url: databaseUrl.replace(/^sqlite:/, ""),
  },
  verbose: true,
  strict: true,
});
