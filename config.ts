/**
 * Sweep configuration
 *
 * Precedence, lowest first: defaults, JSON config file, environment, CLI.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError, describeError } from "./errors.js";
import { DEDUPE_SCOPES, type DedupeScope } from "./pipeline/types.js";

// =============================================================================
// Types
// =============================================================================

export type SweepConfig = {
  // connection
  esUrl: string;
  index: string;
  user?: string;
  password?: string;
  apiKey?: string;
  bearer?: string;
  caCert?: string;
  verifyTls: boolean;
  timeoutMs: number;
  maxRetries: number;
  // retrieval
  batchSize: number;
  scroll: string;
  contentFields: string[];
  pathField: string;
  queryJson?: string;
  // detection
  detectorsYaml?: string;
  builtinDetectors: boolean;
  dedupe: DedupeScope;
  // output
  out: string;
  auditDb?: string;
  // write-back
  fieldMap: string;
  applyUpdates: boolean;
  bulkSize: number;
  verbose: boolean;
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONFIG: SweepConfig = {
  esUrl: "",
  index: "",
  verifyTls: true,
  timeoutMs: 60000,
  maxRetries: 3,
  batchSize: 500,
  scroll: "2m",
  contentFields: ["content", "attachment.content"],
  pathField: "path.virtual",
  builtinDetectors: true,
  dedupe: "none",
  out: "pii_extract.csv",
  fieldMap: "",
  applyUpdates: false,
  bulkSize: 1000,
  verbose: false,
};

export function resolveConfig(...layers: Array<Partial<SweepConfig> | undefined>): SweepConfig {
  const config: SweepConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(config, { [key]: value });
    }
  }
  return config;
}

// =============================================================================
// File and Environment
// =============================================================================

const ConfigFileSchema = z
  .object({
    esUrl: z.string(),
    index: z.string(),
    user: z.string(),
    password: z.string(),
    apiKey: z.string(),
    bearer: z.string(),
    caCert: z.string(),
    verifyTls: z.boolean(),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    batchSize: z.number().int().positive(),
    scroll: z.string(),
    contentFields: z.array(z.string()),
    pathField: z.string(),
    queryJson: z.string(),
    detectorsYaml: z.string(),
    builtinDetectors: z.boolean(),
    dedupe: z.enum(["none", "document", "global"]),
    out: z.string(),
    auditDb: z.string(),
    fieldMap: z.union([z.string(), z.record(z.string())]).transform((value) =>
      typeof value === "string"
        ? value
        : Object.entries(value)
            .map(([detector, field]) => `${detector}=${field}`)
            .join(","),
    ),
    applyUpdates: z.boolean(),
    bulkSize: z.number().int().positive(),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

/**
 * Read a JSON config file. `fieldMap` may be written as an object
 * (`{ "EMAIL": "emails" }`) or as the CLI string.
 */
export function loadConfigFile(configPath: string): Partial<SweepConfig> {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to load config from ${configPath}: ${describeError(error)}`, {
      cause: error,
    });
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid config ${configPath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Connection settings from ES_* variables (the ones the Makefile targets use).
 */
export function loadFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SweepConfig> {
  return {
    esUrl: env.ES_URL || undefined,
    index: env.ES_INDEX || undefined,
    user: env.ES_USER || undefined,
    password: env.ES_PASSWORD || undefined,
    apiKey: env.ES_API_KEY || undefined,
    bearer: env.ES_BEARER || undefined,
    caCert: env.ES_CA_CERT || undefined,
  };
}

// =============================================================================
// Validation
// =============================================================================

function requirePositive(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
}

export function validateConfig(config: SweepConfig): void {
  if (!config.esUrl) {
    throw new ConfigurationError("Missing Elasticsearch URL (--es-url or ES_URL)");
  }
  try {
    const url = new URL(config.esUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new Error(`unsupported protocol ${url.protocol}`);
    }
  } catch (error) {
    throw new ConfigurationError(`Invalid Elasticsearch URL "${config.esUrl}": ${describeError(error)}`);
  }
  if (!config.index) {
    throw new ConfigurationError("Missing index name (--index or ES_INDEX)");
  }
  if (config.user && config.password === undefined) {
    throw new ConfigurationError(`User "${config.user}" given without a password`);
  }
  if (!DEDUPE_SCOPES.includes(config.dedupe)) {
    throw new ConfigurationError(`Unknown dedupe scope "${config.dedupe}" (use ${DEDUPE_SCOPES.join(", ")})`);
  }
  requirePositive("batchSize", config.batchSize);
  requirePositive("bulkSize", config.bulkSize);
  requirePositive("timeoutMs", config.timeoutMs);
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new ConfigurationError(`maxRetries must be zero or more (got ${config.maxRetries})`);
  }
  if (!/^\d+[smhd]$/.test(config.scroll)) {
    throw new ConfigurationError(`Invalid scroll keep-alive "${config.scroll}" (e.g. 2m)`);
  }
  if (!config.out) {
    throw new ConfigurationError("Missing audit output path (--out)");
  }
}
