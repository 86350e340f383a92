#!/usr/bin/env node
/**
 * pii-sweep command line
 *
 * Exit codes: 0 success, 1 failed updates or a fatal retrieval error,
 * 2 configuration error, 130 cancelled.
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { loadConfigFile, loadFromEnv, resolveConfig, type SweepConfig } from "./config.js";
import { ConfigurationError, RetrievalError, describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { exitCodeFor } from "./pipeline/runner.js";
import { DEDUPE_SCOPES, type DedupeScope } from "./pipeline/types.js";
import { executeSweep, type SweepDeps } from "./sweep.js";

// =============================================================================
// Options
// =============================================================================

type CliOptions = {
  esUrl?: string;
  index?: string;
  user?: string;
  password?: string;
  apiKey?: string;
  bearer?: string;
  caCert?: string;
  verifyTls: boolean;
  batchSize?: number;
  scroll?: string;
  contentField: string[];
  pathField?: string;
  queryJson?: string;
  out?: string;
  auditDb?: string;
  dedupe?: DedupeScope | true;
  detectorsYaml?: string;
  builtinDetectors: boolean;
  fieldMap?: string;
  applyUpdates?: boolean;
  bulkSize?: number;
  timeout?: number;
  maxRetries?: number;
  config?: string;
  verbose?: boolean;
};

// CLI options that land on the config key of the same name
const PASSTHROUGH_KEYS = [
  "esUrl",
  "index",
  "user",
  "password",
  "apiKey",
  "bearer",
  "caCert",
  "verifyTls",
  "batchSize",
  "scroll",
  "pathField",
  "queryJson",
  "out",
  "auditDb",
  "detectorsYaml",
  "builtinDetectors",
  "fieldMap",
  "applyUpdates",
  "bulkSize",
  "maxRetries",
  "verbose",
] as const satisfies ReadonlyArray<keyof CliOptions & keyof SweepConfig>;

function integer(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parsed;
}

function dedupeScope(value: string): DedupeScope {
  const scope = DEDUPE_SCOPES.find((candidate) => candidate === value);
  if (!scope) {
    throw new InvalidArgumentError(`Allowed scopes: ${DEDUPE_SCOPES.join(", ")}.`);
  }
  return scope;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function buildProgram(): Command {
  return new Command()
    .name("pii-sweep")
    .description("Scan an Elasticsearch index for PII, write a CSV audit and optionally write normalized values back")
    .option("--es-url <url>", "Elasticsearch base URL (env ES_URL)")
    .option("--index <name>", "index to scan (env ES_INDEX)")
    .option("--user <user>", "basic auth user (env ES_USER)")
    .option("--password <password>", "basic auth password (env ES_PASSWORD)")
    .option("--api-key <key>", "API key, takes precedence over other credentials (env ES_API_KEY)")
    .option("--bearer <token>", "bearer token (env ES_BEARER)")
    .option("--ca-cert <path>", "PEM bundle to trust (env ES_CA_CERT)")
    .option("--no-verify-tls", "skip TLS certificate verification")
    .option("--batch-size <n>", "documents per scroll page", integer)
    .option("--scroll <ttl>", "scroll keep-alive, e.g. 2m")
    .option("--content-field <path>", "field to scan, repeatable (default: content, attachment.content)", collect, [])
    .option("--path-field <path>", "field copied into the source_path column")
    .option("--query-json <file>", "JSON file holding the search query")
    .option("--out <file>", "CSV audit file")
    .option("--audit-db <file>", "also record the run in a SQLite database")
    .option("--dedupe [scope]", "none, document or global (bare flag: global)", dedupeScope)
    .option("--detectors-yaml <file>", "YAML detector definitions")
    .option("--no-builtin-detectors", "do not load the built-in NAS detector")
    .option("--field-map <map>", "write-back mapping, e.g. NAS=pii.nas,EMAIL=pii.emails")
    .option("--apply-updates", "write normalized values back to the documents")
    .option("--bulk-size <n>", "update actions per bulk request", integer)
    .option("--timeout <ms>", "per-request timeout in milliseconds", integer)
    .option("--max-retries <n>", "retries for a failed page or bulk request", integer)
    .option("--config <file>", "JSON config file")
    .option("--verbose", "debug logging");
}

/**
 * Settings given explicitly on the command line. Defaults declared on the
 * program are left out so they never override the file or the environment.
 */
export function cliOverrides(program: Command): Partial<SweepConfig> {
  const opts = program.opts<CliOptions>();
  const fromCli = (key: keyof CliOptions) => program.getOptionValueSource(key) === "cli";

  const overrides: Partial<SweepConfig> = {};
  for (const key of PASSTHROUGH_KEYS) {
    if (fromCli(key)) Object.assign(overrides, { [key]: opts[key] });
  }
  if (fromCli("contentField")) overrides.contentFields = opts.contentField;
  if (fromCli("timeout")) overrides.timeoutMs = opts.timeout;
  if (fromCli("dedupe")) overrides.dedupe = opts.dedupe === true ? "global" : opts.dedupe;
  return overrides;
}

// =============================================================================
// Entry
// =============================================================================

export type MainDeps = {
  env?: NodeJS.ProcessEnv;
  baseLogger?: Logger;
  signal?: AbortSignal;
  createStore?: SweepDeps["createStore"];
};

/**
 * Run one sweep from command-line arguments (without the node and script
 * entries) and return the process exit code.
 */
export async function main(args: readonly string[], deps: MainDeps = {}): Promise<number> {
  const program = buildProgram().exitOverride();
  try {
    program.parse([...args], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  const overrides = cliOverrides(program);
  let log = createLogger(deps.baseLogger, overrides.verbose ?? false);

  try {
    const configPath = program.opts<CliOptions>().config;
    const config = resolveConfig(
      configPath ? loadConfigFile(configPath) : undefined,
      loadFromEnv(deps.env ?? process.env),
      overrides,
    );
    log = createLogger(deps.baseLogger, config.verbose);

    const summary = await executeSweep(config, {
      log,
      signal: deps.signal,
      createStore: deps.createStore,
    });
    return exitCodeFor(summary);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(`Configuration error: ${error.message}`);
      return 2;
    }
    if (error instanceof RetrievalError) {
      log.error(error.message);
      return 1;
    }
    log.error(`Sweep failed: ${describeError(error)}`);
    return 1;
  }
}

async function run(): Promise<void> {
  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);
  try {
    process.exitCode = await main(process.argv.slice(2), { signal: controller.signal });
  } finally {
    process.off("SIGINT", cancel);
    process.off("SIGTERM", cancel);
  }
}

function isDirectRun(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(invoked)).href;
  } catch {
    return false; // not a file path, e.g. node -e
  }
}

if (isDirectRun()) {
  run().catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
}
