import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { getConfigPath, getDataDir, getSqlitePath, loadEnv } from "@/lib/config/data-dir";

const ENV_KEYS = ["TOPICS_DATA_DIR", "SQLITE_PATH", "TEST_CONFIG_A", "TEST_CONFIG_B"] as const;

describe("data dir config", () => {
  const saved = Object.fromEntries(ENV_KEYS.map((k) => [k, process.env[k]]));
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "topics-config-"));
    process.env.TOPICS_DATA_DIR = dir;
    delete process.env.SQLITE_PATH;
    delete process.env.TEST_CONFIG_A;
    delete process.env.TEST_CONFIG_B;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it("resolves paths under TOPICS_DATA_DIR", () => {
    expect(getDataDir()).toBe(dir);
    expect(getConfigPath()).toBe(path.join(dir, "config"));
    expect(getSqlitePath()).toBe(path.join(dir, "topics.db"));
  });

  it("prefers SQLITE_PATH when set", () => {
    process.env.SQLITE_PATH = "/tmp/elsewhere.db";
    expect(getSqlitePath()).toBe("/tmp/elsewhere.db");
  });

  it("creates the data directory on demand", () => {
    const nested = path.join(dir, "nested");
    process.env.TOPICS_DATA_DIR = nested;

    expect(getSqlitePath()).toBe(path.join(nested, "topics.db"));
    expect(fs.existsSync(nested)).toBe(true);
  });

  it("skips a missing config file", () => {
    expect(() => loadEnv()).not.toThrow();
    expect(process.env.TEST_CONFIG_A).toBeUndefined();
  });

  it("loads the config file, honouring quotes and comments", () => {
    fs.writeFileSync(
      path.join(dir, "config"),
      ["# storage", "TEST_CONFIG_A=plain", "TEST_CONFIG_B='Topic Service'", ""].join("\n")
    );

    loadEnv();

    expect(process.env.TEST_CONFIG_A).toBe("plain");
    expect(process.env.TEST_CONFIG_B).toBe("Topic Service");
  });

  it("never overwrites variables that are already set", () => {
    fs.writeFileSync(path.join(dir, "config"), "TEST_CONFIG_A=from-file\nTEST_CONFIG_B=from-file\n");
    process.env.TEST_CONFIG_A = "from-env";

    loadEnv();

    expect(process.env.TEST_CONFIG_A).toBe("from-env");
    expect(process.env.TEST_CONFIG_B).toBe("from-file");
  });
});
