/**
 * Local data directory: holds the SQLite file and an optional `config` file
 * in .env format. Defaults to ~/.topic-skill-service; TOPICS_DATA_DIR
 * moves it.
 */

import { config } from "dotenv";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getDataDir(): string {
  return process.env.TOPICS_DATA_DIR || join(homedir(), ".topic-skill-service");
}

export function getConfigPath(): string {
  return join(getDataDir(), "config");
}

/** SQLITE_PATH when set, else topics.db in the data directory (created on demand). */
export function getSqlitePath(): string {
  if (process.env.SQLITE_PATH) return process.env.SQLITE_PATH;
  const dir = getDataDir();
  mkdirSync(dir, { recursive: true });
  return join(dir, "topics.db");
}

/**
 * Load `.env` from the working directory, then the data-dir config file.
 * Variables already set are never overwritten, so the environment beats
 * `.env`, which beats the config file. Missing files are skipped.
 */
export function loadEnv(): void {
  config({ path: [".env", getConfigPath()] });
}
