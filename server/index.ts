// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Tooling (drizzle-kit) loads dotenv separately.
// Do NOT move dotenv loading into db.ts or services.
import dotenv from "dotenv";
dotenv.config();

import { createServer } from "http";
import { ObjectEngine } from "../platform/objectdb";
import { log, logError } from "@shared/log";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { seedFromConfig } from "./seed";
import { DrizzleObjectStore } from "./storage";

async function main() {
  const config = loadConfig();
  if (!config.DATABASE_URL) {
    throw new Error("DATABASE_URL must be set. Did you forget to provision a database?");
  }

  const { pool, db } = createDatabase(config.DATABASE_URL);
  const engine = new ObjectEngine(new DrizzleObjectStore(db), {
    registry: {
      environment: config.OBJECTDB_EUID_ENVIRONMENT,
      sandboxPrefix: config.OBJECTDB_SANDBOX_PREFIX,
    },
    prefixes: config.OBJECTDB_EXTRA_PREFIXES,
  });

  await engine.provision();

  if (config.OBJECTDB_SEED_ON_START) {
    try {
      const summary = await seedFromConfig(engine, config.OBJECTDB_CONFIG_DIR, {
        overwrite: config.OBJECTDB_SEED_OVERWRITE,
      });
      log(`inserted=${summary.inserted} updated=${summary.updated} skipped=${summary.skipped}`, "seed");
    } catch (e) {
      logError("Seed error", e, "seed");
    }
  }

  const httpServer = createServer(createApp(engine));

  const shutdown = () => {
    httpServer.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logError("Error closing database pool", err);
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  httpServer.listen({ port: config.PORT, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.PORT}`);
  });
}

main().catch((err: unknown) => {
  logError("Failed to start", err);
  process.exit(1);
});
