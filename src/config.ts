/**
 * sqlwarden configuration
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { DEFAULT_ALLOWED_KEYWORDS, DEFAULT_FORBIDDEN_KEYWORDS } from "./classifier.js";
import { errorMessage } from "./errors.js";
import { log } from "./utils.js";

const positiveInt = z.number().int().positive();

/** Largest delay setTimeout honours, and PostgreSQL's statement_timeout ceiling. */
export const MAX_TIMEOUT_MS = 2_147_483_647;
const timeoutMs = positiveInt.max(MAX_TIMEOUT_MS);

export const ConfigSchema = z
  .object({
    driver: z.enum(["postgres", "sqlite"]),
    connection: z.object({
      host: z.string().min(1),
      port: z.number().int().min(1).max(65535),
      database: z.string().min(1),
      user: z.string().optional(),
      password: z.string().optional(),
      ssl: z.union([z.boolean(), z.object({ rejectUnauthorized: z.boolean() })]).optional(),
      connectionString: z.string().optional(),
      filename: z.string().optional(),
    }),
    limits: z.object({
      max_statements: positiveInt,
      timeout_ms: timeoutMs,
      connection_timeout_ms: timeoutMs,
      max_rows: positiveInt,
      max_connections: positiveInt,
    }),
    validator: z.object({
      allowed_keywords: z.array(z.string().min(1)).min(1),
      forbidden_keywords: z.array(z.string().min(1)),
    }),
    schema: z.object({
      exclude_tables: z.array(z.string()),
    }),
    ask: z.object({
      enabled: z.boolean(),
      model: z.string().min(1),
      max_tokens: positiveInt,
    }),
  })
  .refine((config) => config.driver !== "sqlite" || config.connection.filename !== undefined, {
    message: "connection.filename is required for the sqlite driver",
    path: ["connection", "filename"],
  });

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_FILES = ["sqlwarden.json", ".sqlwarden.json"];

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: Env;
}

export function defaultConfig(env: Env = {}): Config {
  return {
    driver: "postgres",
    connection: {
      host: "localhost",
      port: 5432,
      database: "postgres",
    },
    limits: {
      max_statements: 20,
      timeout_ms: 10000,
      connection_timeout_ms: 2000,
      max_rows: 1000,
      max_connections: 5,
    },
    validator: {
      allowed_keywords: [...DEFAULT_ALLOWED_KEYWORDS],
      forbidden_keywords: [...DEFAULT_FORBIDDEN_KEYWORDS],
    },
    schema: {
      exclude_tables: ["django_*"],
    },
    ask: {
      enabled: Boolean(env.ANTHROPIC_API_KEY),
      model: "claude-3-5-haiku-latest",
      max_tokens: 1024,
    },
  };
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const config: Record<string, unknown> = { ...defaultConfig(env) };

  // Try loading from file
  for (const name of CONFIG_FILES) {
    const configPath = join(cwd, name);
    if (!existsSync(configPath)) continue;
    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
      if (!isPlainObject(fileConfig)) throw new Error("top level must be an object");
      deepMerge(config, fileConfig);
      log(`Loaded config from ${configPath}`);
      break;
    } catch (error) {
      log(`Warning: Failed to parse ${configPath}: ${errorMessage(error)}`);
    }
  }

  deepMerge(config, envOverrides(env));

  const parsed = ConfigSchema.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

function envOverrides(env: Env): Record<string, unknown> {
  const connection: Record<string, unknown> = {};
  const limits: Record<string, unknown> = {};
  const overrides: Record<string, unknown> = { connection, limits };

  const host = env.DB_HOST ?? env.PGHOST;
  const port = env.DB_PORT ?? env.PGPORT;
  const database = env.DB_NAME ?? env.PGDATABASE;
  const user = env.DB_USER ?? env.PGUSER;
  const password = env.DB_PASSWORD ?? env.PGPASSWORD;

  if (host) connection.host = host;
  if (port) connection.port = parseInt(port, 10);
  if (database) connection.database = database;
  if (user) connection.user = user;
  if (password) connection.password = password;
  if (env.DATABASE_URL) connection.connectionString = env.DATABASE_URL;

  if (env.SQLWARDEN_SQLITE_PATH) {
    connection.filename = env.SQLWARDEN_SQLITE_PATH;
    overrides.driver = "sqlite";
  }
  if (env.SQLWARDEN_DRIVER) overrides.driver = env.SQLWARDEN_DRIVER;

  if (env.SQLWARDEN_MAX_STATEMENTS) limits.max_statements = parseInt(env.SQLWARDEN_MAX_STATEMENTS, 10);
  if (env.SQLWARDEN_TIMEOUT) limits.timeout_ms = parseInt(env.SQLWARDEN_TIMEOUT, 10);
  if (env.SQLWARDEN_CONNECT_TIMEOUT) limits.connection_timeout_ms = parseInt(env.SQLWARDEN_CONNECT_TIMEOUT, 10);
  if (env.SQLWARDEN_MAX_ROWS) limits.max_rows = parseInt(env.SQLWARDEN_MAX_ROWS, 10);

  return overrides;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Merge `source` into `target` in place. Arrays and scalars replace. */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const value = source[key];
    if (isPlainObject(value)) {
      const existing = target[key];
      const next: Record<string, unknown> = isPlainObject(existing) ? { ...existing } : {};
      deepMerge(next, value);
      target[key] = next;
    } else {
      target[key] = value;
    }
  }
}
