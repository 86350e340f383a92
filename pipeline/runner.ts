/**
 * Sweep runner
 *
 * Scanner -> collector -> {audit sink, reconciliation}. Strictly sequential:
 * one page at a time, one document at a time. On abort the current document
 * finishes, pending update chunks are submitted and the sinks are closed.
 */

import type { AuditSink } from "../audit/types.js";
import type { DetectorRegistry } from "../detectors/registry.js";
import type { Logger } from "../logger.js";
import { extractFields, getPath } from "../scanner/extract.js";
import type { RetryHooks, RetryPolicy } from "../scanner/retry.js";
import { buildScanQuery, scanDocuments } from "../scanner/scanner.js";
import type { DocumentStore } from "../scanner/store.js";
import { MatchCollector } from "./collector.js";
import { checkFieldMap, targetFields } from "./field-map.js";
import { BulkUpdater, reconcile } from "./reconcile.js";
import type { DedupeScope, FieldMap, RunOutcome, RunSummary } from "./types.js";

export type RunOptions = {
  index: string;
  query?: Record<string, unknown>;
  batchSize: number;
  keepAlive: string;
  contentFields: readonly string[]; // empty = whole source
  pathField: string;
  dedupe: DedupeScope;
  fieldMap: FieldMap;
  applyUpdates: boolean;
  bulkSize: number;
  retry: RetryPolicy;
};

export type RunDeps = {
  store: DocumentStore;
  registry: DetectorRegistry;
  sink: AuditSink;
  log: Logger;
  signal?: AbortSignal;
  sleep?: RetryHooks["sleep"];
};

function sourcePathOf(source: Record<string, unknown>, pathField: string): string {
  if (!pathField) return "";
  const value = getPath(source, pathField);
  return typeof value === "string" || typeof value === "number" ? String(value) : "";
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.cancelled) return 130;
  return summary.updatesFailed > 0 ? 1 : 0;
}

export function formatSummary(summary: RunSummary): string {
  const n = (value: number) => value.toLocaleString("en-US");
  return (
    `Documents scanned: ${n(summary.documentsScanned)} | Matches found: ${n(summary.matchesFound)} | ` +
    `Rows written: ${n(summary.rowsWritten)} | Updates applied: ${n(summary.updatesApplied)} | ` +
    `Updates failed: ${n(summary.updatesFailed)}`
  );
}

export async function runExtraction(options: RunOptions, deps: RunDeps): Promise<RunSummary> {
  const { store, registry, sink, log, signal } = deps;

  checkFieldMap(options.fieldMap, registry);
  const targets = targetFields(options.fieldMap);

  // Scanning the whole source needs the whole source back
  const query = buildScanQuery(
    options.query,
    options.contentFields.length > 0
      ? [...options.contentFields, options.pathField, ...(options.applyUpdates ? targets : [])]
      : [],
  );

  const collector = new MatchCollector(registry, options.dedupe);
  const updater = options.applyUpdates
    ? new BulkUpdater(store, {
        bulkSize: options.bulkSize,
        retry: options.retry,
        log,
        sleep: deps.sleep,
      })
    : null;

  const summary: RunSummary = {
    documentsScanned: 0,
    matchesFound: 0,
    rowsWritten: 0,
    updatesApplied: 0,
    updatesFailed: 0,
    failedDocuments: [],
    cancelled: false,
  };
  let outcome: RunOutcome = "failed";

  log.info(
    `Scanning "${options.index}" with ${registry.size} detector(s), dedupe=${options.dedupe}` +
      (updater ? `, write-back to ${targets.join(", ") || "(no mapped fields)"}` : ""),
  );

  try {
    const documents = scanDocuments(store, {
      index: options.index,
      query,
      batchSize: options.batchSize,
      keepAlive: options.keepAlive,
      retry: options.retry,
      log,
      sleep: deps.sleep,
    });

    for await (const document of documents) {
      summary.documentsScanned++;

      // Written-back fields are never scanned again
      const fields = extractFields(document.source, {
        roots: options.contentFields,
        exclude: targets,
      });
      const { matches, retained, total } = collector.collect(document, fields);
      summary.matchesFound += total;

      const sourcePath = sourcePathOf(document.source, options.pathField);
      for (const { match, duplicate } of retained) {
        sink.emit({ ...match, duplicate, sourcePath });
        summary.rowsWritten++;
      }

      if (updater) {
        const batch = reconcile(document, matches, options.fieldMap);
        if (batch) await updater.add(batch);
      }

      if (signal?.aborted) {
        summary.cancelled = true;
        log.warn(`Run cancelled after ${summary.documentsScanned} document(s)`);
        break;
      }
    }

    outcome = summary.cancelled ? "cancelled" : "completed";
  } finally {
    try {
      if (updater) {
        await updater.flush();
        summary.updatesApplied = updater.applied;
        summary.updatesFailed = updater.failed.length;
        summary.failedDocuments = updater.failed.map((failure) => failure.documentId);
      }
      // Printed on failure too, before the error reaches the caller
      log.info(formatSummary(summary));
      sink.finish?.(summary, outcome);
    } finally {
      sink.close();
    }
  }

  if (collector.seenCount > 0) {
    log.debug?.(`Global dedupe held ${collector.seenCount} key(s)`);
  }
  return summary;
}
