/**
 * Server startup hook, called once by Next.js before the first request.
 * Loads .env and the data-dir config file into process.env, opens the
 * database (applying migrations) and releases it on shutdown.
 */

export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { loadEnv } = await import("@/lib/config/data-dir");
  loadEnv();

  const { getDb, closeDb } = await import("@/lib/db");
  getDb();
  console.info(`Topic & Skill Service using ${process.env.DB_DRIVER ?? "sqlite"} storage`);

  const shutdown = () => {
    closeDb().catch((err: unknown) => {
      console.error("Failed to close database:", err);
    });
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}
