/**
 * One sweep from a resolved configuration
 *
 * Everything that can be wrong with the configuration (detectors, rules,
 * field map, query file) fails here before the store client is created.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { CsvAuditSink } from "./audit/csv-sink.js";
import { SqliteAuditSink } from "./audit/sqlite-sink.js";
import { MultiAuditSink, type AuditSink } from "./audit/types.js";
import type { SweepConfig } from "./config.js";
import { validateConfig } from "./config.js";
import { BUILTIN_DEFINITIONS, loadDefinitionsFile, mergeDefinitions } from "./detectors/definitions.js";
import { DetectorRegistry } from "./detectors/registry.js";
import { ConfigurationError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { checkFieldMap, parseFieldMap } from "./pipeline/field-map.js";
import { runExtraction } from "./pipeline/runner.js";
import type { RunSummary } from "./pipeline/types.js";
import { ElasticsearchStore } from "./scanner/elasticsearch.js";
import { DEFAULT_RETRY_POLICY } from "./scanner/retry.js";
import type { DocumentStore } from "./scanner/store.js";

export type SweepDeps = {
  log: Logger;
  signal?: AbortSignal;
  /** Replaces the Elasticsearch client, e.g. with an in-process store */
  createStore?: (config: SweepConfig) => DocumentStore;
};

export function buildRegistry(config: Pick<SweepConfig, "builtinDetectors" | "detectorsYaml">): DetectorRegistry {
  const definitions = mergeDefinitions(
    config.builtinDetectors ? BUILTIN_DEFINITIONS : [],
    config.detectorsYaml ? loadDefinitionsFile(config.detectorsYaml) : [],
  );
  if (definitions.length === 0) {
    throw new ConfigurationError("No detectors configured");
  }
  return DetectorRegistry.load(definitions);
}

function openSinks(config: SweepConfig, log: Logger): AuditSink {
  const csv = new CsvAuditSink(config.out);
  if (!config.auditDb) return csv;
  try {
    return new MultiAuditSink([csv, new SqliteAuditSink(config.auditDb, config.index, log)]);
  } catch (error) {
    csv.close();
    throw error;
  }
}

const QuerySchema = z.record(z.unknown());

function readQuery(queryJson: string | undefined): Record<string, unknown> | undefined {
  if (!queryJson) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(queryJson, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to read query from ${queryJson}: ${describeError(error)}`, {
      cause: error,
    });
  }
  const query = QuerySchema.safeParse(parsed);
  if (!query.success) {
    throw new ConfigurationError(`Query file ${queryJson} must hold a JSON object`);
  }
  return query.data;
}

export async function executeSweep(config: SweepConfig, deps: SweepDeps): Promise<RunSummary> {
  const { log } = deps;

  validateConfig(config);
  const registry = buildRegistry(config);
  const fieldMap = parseFieldMap(config.fieldMap);
  checkFieldMap(fieldMap, registry);
  const query = readQuery(config.queryJson);

  if (config.applyUpdates && fieldMap.size === 0) {
    log.warn("--apply-updates without --field-map: no detector is mapped, nothing will be written");
  }

  if (!config.verifyTls) {
    log.warn("TLS certificate verification is disabled");
  }

  const sink = openSinks(config, log);
  let elasticsearch: ElasticsearchStore | null = null;
  try {
    let store: DocumentStore;
    if (deps.createStore) {
      store = deps.createStore(config);
    } else {
      elasticsearch = new ElasticsearchStore({
        baseUrl: config.esUrl,
        user: config.user,
        password: config.password,
        apiKey: config.apiKey,
        bearer: config.bearer,
        caCertPath: config.caCert,
        verifyTls: config.verifyTls,
        timeoutMs: config.timeoutMs,
      });
      store = elasticsearch;
    }

    const summary = await runExtraction(
      {
        index: config.index,
        query,
        batchSize: config.batchSize,
        keepAlive: config.scroll,
        contentFields: config.contentFields,
        pathField: config.pathField,
        dedupe: config.dedupe,
        fieldMap,
        applyUpdates: config.applyUpdates,
        bulkSize: config.bulkSize,
        retry: { ...DEFAULT_RETRY_POLICY, retries: config.maxRetries },
      },
      { store, registry, sink, log, signal: deps.signal },
    );

    log.info(`Audit written to ${config.out}`);
    if (summary.failedDocuments.length > 0) {
      log.error(`Failed documents: ${summary.failedDocuments.join(", ")}`);
    }
    return summary;
  } catch (error) {
    // runExtraction closes the sink itself; this covers failures before it ran
    sink.close();
    throw error;
  } finally {
    await elasticsearch?.close();
  }
}
