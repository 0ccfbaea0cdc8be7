import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { deepMerge, defaultConfig, loadConfig } from "../src/config.js";

let cwd = "";

beforeEach(() => {
  cwd = mkdtempSync(join(tmpdir(), "sqlwarden-config-"));
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(cwd, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({ cwd, env: {} })).toEqual(defaultConfig({}));
  });

  it("uses the documented limits", () => {
    expect(loadConfig({ cwd, env: {} }).limits).toEqual({
      max_statements: 20,
      timeout_ms: 10000,
      connection_timeout_ms: 2000,
      max_rows: 1000,
      max_connections: 5,
    });
  });

  it("merges the config file over the defaults", () => {
    writeFileSync(
      join(cwd, "sqlwarden.json"),
      JSON.stringify({ connection: { database: "shop" }, limits: { max_rows: 50 }, schema: { exclude_tables: [] } })
    );
    const config = loadConfig({ cwd, env: {} });

    expect(config.connection).toEqual({ host: "localhost", port: 5432, database: "shop" });
    expect(config.limits.max_rows).toBe(50);
    expect(config.limits.max_statements).toBe(20);
    expect(config.schema.exclude_tables).toEqual([]);
  });

  it("reads the dotfile when there is no plain config file", () => {
    writeFileSync(join(cwd, ".sqlwarden.json"), JSON.stringify({ limits: { timeout_ms: 2500 } }));
    expect(loadConfig({ cwd, env: {} }).limits.timeout_ms).toBe(2500);
  });

  it("skips a config file that does not parse", () => {
    writeFileSync(join(cwd, "sqlwarden.json"), "{ not json");
    expect(loadConfig({ cwd, env: {} })).toEqual(defaultConfig({}));
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Warning: Failed to parse"));
  });

  it("lets the environment override the file", () => {
    writeFileSync(join(cwd, "sqlwarden.json"), JSON.stringify({ connection: { host: "file-host" } }));
    const config = loadConfig({
      cwd,
      env: {
        DB_HOST: "db-host",
        PGHOST: "pg-host",
        PGPORT: "6543",
        DB_NAME: "analytics",
        PGUSER: "reader",
        PGPASSWORD: "test-secret",
        SQLWARDEN_MAX_STATEMENTS: "5",
        SQLWARDEN_TIMEOUT: "3000",
        SQLWARDEN_CONNECT_TIMEOUT: "750",
        SQLWARDEN_MAX_ROWS: "10",
      },
    });

    expect(config.connection).toEqual({
      host: "db-host",
      port: 6543,
      database: "analytics",
      user: "reader",
      password: "test-secret",
    });
    expect(config.limits).toEqual({
      max_statements: 5,
      timeout_ms: 3000,
      connection_timeout_ms: 750,
      max_rows: 10,
      max_connections: 5,
    });
  });

  it("switches to SQLite when a database file is given", () => {
    const config = loadConfig({ cwd, env: { SQLWARDEN_SQLITE_PATH: "/tmp/app.db" } });
    expect(config.driver).toBe("sqlite");
    expect(config.connection.filename).toBe("/tmp/app.db");
  });

  it("requires a filename for the sqlite driver", () => {
    expect(() => loadConfig({ cwd, env: { SQLWARDEN_DRIVER: "sqlite" } })).toThrowError(
      "Invalid configuration: connection.filename: connection.filename is required for the sqlite driver"
    );
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadConfig({ cwd, env: { SQLWARDEN_TIMEOUT: "soon" } })).toThrowError(/limits\.timeout_ms/);
  });

  it("rejects timeouts longer than a timer can hold", () => {
    expect(() => loadConfig({ cwd, env: { SQLWARDEN_TIMEOUT: "3000000000" } })).toThrowError(
      "Invalid configuration: limits.timeout_ms: Number must be less than or equal to 2147483647"
    );
    writeFileSync(join(cwd, "sqlwarden.json"), JSON.stringify({ limits: { connection_timeout_ms: 2147483648 } }));
    expect(() => loadConfig({ cwd, env: {} })).toThrowError(/limits\.connection_timeout_ms/);
    expect(loadConfig({ cwd, env: { SQLWARDEN_TIMEOUT: "2147483647", SQLWARDEN_CONNECT_TIMEOUT: "2000" } }).limits.timeout_ms).toBe(
      2147483647
    );
  });

  it("enables sql_ask when an API key is present", () => {
    expect(loadConfig({ cwd, env: {} }).ask.enabled).toBe(false);
    expect(loadConfig({ cwd, env: { ANTHROPIC_API_KEY: "test-key" } }).ask.enabled).toBe(true);
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    const target: Record<string, unknown> = { a: { b: 1, c: [1, 2] }, d: 1 };
    deepMerge(target, { a: { c: [3] }, e: "x" });
    expect(target).toEqual({ a: { b: 1, c: [3] }, d: 1, e: "x" });
  });
});
