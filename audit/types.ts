/**
 * Audit record types
 */

import type { RawMatch } from "../detectors/types.js";
import type { RunOutcome, RunSummary } from "../pipeline/types.js";

// Column order is part of the output contract; append new columns at the end
export const AUDIT_COLUMNS = [
  "document_id",
  "field_path",
  "detector",
  "raw_match",
  "normalized_value",
  "duplicate",
  "source_path",
] as const;

export type AuditRecord = RawMatch & {
  duplicate: boolean; // same key already seen in this document (dedupe scope "none")
  sourcePath: string;
};

export type AuditSink = {
  /** Append one complete record */
  emit(record: AuditRecord): void;
  /** Record the run outcome, where the sink keeps run history */
  finish?(summary: RunSummary, outcome: RunOutcome): void;
  /** Flush and release; calling it twice is harmless */
  close(): void;
};

export function toAuditRow(record: AuditRecord): string[] {
  return [
    record.documentId,
    record.fieldPath,
    record.detector,
    record.rawText,
    record.normalizedText,
    record.duplicate ? "true" : "false",
    record.sourcePath,
  ];
}

/**
 * Fan records out to several sinks. Every sink is closed even when one of
 * them fails to close; the first failure is rethrown afterwards.
 */
export class MultiAuditSink implements AuditSink {
  constructor(private readonly sinks: readonly AuditSink[]) {}

  emit(record: AuditRecord): void {
    for (const sink of this.sinks) sink.emit(record);
  }

  finish(summary: RunSummary, outcome: RunOutcome): void {
    for (const sink of this.sinks) sink.finish?.(summary, outcome);
  }

  close(): void {
    let failure: unknown;
    for (const sink of this.sinks) {
      try {
        sink.close();
      } catch (error) {
        failure ??= error;
      }
    }
    if (failure !== undefined) throw failure;
  }
}
