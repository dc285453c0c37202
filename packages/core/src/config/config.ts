// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for ReliefLedger.
 * Reads reliefledger.yaml from the project directory or ~/.reliefledger/config.yaml.
 * Validates with Zod and provides typed defaults. RELIEFLEDGER_DB and
 * RELIEFLEDGER_LOG_LEVEL override whatever the file says.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";
import { DEFAULT_DB_PATH } from "../store/database.js";
import { envVar } from "../utils/security.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const LogLevelSchema = z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]);

const LedgerSchema = z.object({
  dbPath: z.string().min(1).default(DEFAULT_DB_PATH),
  /** Persist every audit record to the append-only journal table */
  journal: z.boolean().default(true),
});

const LoggingSchema = z.object({
  level: LogLevelSchema.default("INFO"),
});

const ApiSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(4747),
  swagger: z.boolean().default(true),
  /** Operator key required on x-api-key; unset means the API is open */
  apiKey: z.string().min(1).optional(),
});

const ConfigSchema = z.object({
  ledger: LedgerSchema.default({}),
  logging: LoggingSchema.default({}),
  api: ApiSchema.default({}),
});

export type ReliefLedgerConfig = z.infer<typeof ConfigSchema>;

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

function applyEnv(config: ReliefLedgerConfig): ReliefLedgerConfig {
  const dbPath = envVar("RELIEFLEDGER_DB");
  const level = envVar("RELIEFLEDGER_LOG_LEVEL");

  let logging = config.logging;
  if (level) {
    const parsed = LogLevelSchema.safeParse(level.toUpperCase());
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid RELIEFLEDGER_LOG_LEVEL '${level}': expected one of ${LogLevelSchema.options.join(", ")}`,
      );
    }
    logging = { ...logging, level: parsed.data };
  }

  return {
    ...config,
    ledger: dbPath ? { ...config.ledger, dbPath } : config.ledger,
    logging,
  };
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "reliefledger.yaml",
  "config/reliefledger.yaml",
  join(homedir(), ".reliefledger", "config.yaml"),
];

export function loadConfig(configPath?: string): ReliefLedgerConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found: '${configPath}'`);
    }
    // No config file: defaults plus environment
    return applyEnv(ConfigSchema.parse({}));
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${found}':\n${issues}`);
  }

  return applyEnv(result.data);
}

export const defaultConfig: ReliefLedgerConfig = ConfigSchema.parse({});
