import { config } from "./config/env";
import { createApp } from "./app";
import { CATALOG_INDEX } from "./catalog/catalog";
import { systemClock } from "./domain/Clock";
import { getAllergyRepository } from "./repository/RepositoryFactory";

// Process entry point. The catalog index is built once on import of
// ./catalog/catalog and shared read-only by every request.

const app = createApp({
  repo: getAllergyRepository(),
  catalog: CATALOG_INDEX,
  clock: systemClock,
  jwtSecret: config.jwtSecret,
  disableAuth: config.disableAuth,
  corsOrigins: config.corsOrigins,
  verboseErrors: config.nodeEnv !== "production",
});

// ---- Graceful shutdown ----
async function shutdown(signal: string): Promise<void> {
  console.log(`[Allergies] ${signal} received, shutting down`);
  if (config.database.url) {
    const { closeDatabasePool } = await import("./database/connection");
    await closeDatabasePool();
  }
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    console.error("[Allergies] Shutdown failed:", err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

app.listen(config.port, "0.0.0.0", () => {
  console.log(`[Allergies] Server running on port ${config.port}`);
  console.log(`[Allergies] Environment: ${config.nodeEnv}`);
  console.log(`[Allergies] Database: ${config.database.url ? "PostgreSQL" : "In-memory"}`);
  console.log(`[Allergies] Catalog: ${CATALOG_INDEX.labels.size} allergen keys in ${CATALOG_INDEX.groups.length} groups`);
  console.log(`[Allergies] Auth: ${config.disableAuth ? "DISABLED (dev mode)" : "JWT enabled"}`);
});
