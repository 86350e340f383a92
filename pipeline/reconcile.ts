/**
 * Reconciliation: additive write-back of normalized matches
 *
 * The client only decides which values are new to a document. The update
 * itself is a server-side script that appends each value if absent, so a
 * concurrent or repeated run can never drop a value another run added.
 */

import type { RawMatch } from "../detectors/types.js";
import { ReconciliationError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { getNestedPath } from "../scanner/extract.js";
import { withRetry, type RetryHooks, type RetryPolicy } from "../scanner/retry.js";
import type { BulkItemResult, DocumentStore, StoredDocument, UpdateAction } from "../scanner/store.js";
import type { FieldMap, UpdateBatch } from "./types.js";

// =============================================================================
// Batch Computation
// =============================================================================

function addStrings(into: Set<string>, value: unknown): void {
  if (typeof value === "string") {
    into.add(value);
  } else if (Array.isArray(value)) {
    for (const v of value) if (typeof v === "string") into.add(v);
  }
}

/**
 * Current values of a set-valued field: a string counts as a one-element
 * set, non-string array entries are ignored. A dotted field is read both as
 * a literal key (where the update script appends) and as a nested path.
 */
export function existingValues(source: Record<string, unknown>, field: string): Set<string> {
  const values = new Set<string>();
  if (Object.prototype.hasOwnProperty.call(source, field)) addStrings(values, source[field]);
  addStrings(values, getNestedPath(source, field));
  return values;
}

/**
 * Values to union into each mapped field of `document`, or null when every
 * value is already present. Detectors missing from the field map are skipped.
 */
export function reconcile(
  document: StoredDocument,
  matches: readonly RawMatch[],
  fieldMap: FieldMap,
): UpdateBatch | null {
  const existing = new Map<string, Set<string>>();
  const additions = new Map<string, Set<string>>();

  for (const match of matches) {
    const field = fieldMap.get(match.detector);
    if (!field) continue;

    let present = existing.get(field);
    if (!present) {
      present = existingValues(document.source, field);
      existing.set(field, present);
    }
    if (present.has(match.normalizedText)) continue;

    let added = additions.get(field);
    if (!added) {
      added = new Set();
      additions.set(field, added);
    }
    added.add(match.normalizedText);
  }

  if (additions.size === 0) return null;

  const fields: Record<string, string[]> = {};
  for (const [field, values] of additions) {
    fields[field] = [...values];
  }
  return { documentId: document.id, index: document.index, fields };
}

// =============================================================================
// Update Script
// =============================================================================

// Append-if-absent for every field in params.upd. A scalar already in the
// field is kept as the first list element. Nothing new -> noop, no reindex.
export const APPEND_IF_ABSENT_SCRIPT = `
  boolean changed = false;
  for (entry in params.upd.entrySet()) {
    def f = entry.getKey();
    def current = ctx._source[f];
    if (current == null) {
      ctx._source[f] = new ArrayList();
    } else if (!(current instanceof List)) {
      def list = new ArrayList();
      list.add(current);
      ctx._source[f] = list;
    }
    for (v in entry.getValue()) {
      if (!ctx._source[f].contains(v)) {
        ctx._source[f].add(v);
        changed = true;
      }
    }
  }
  if (!changed) { ctx.op = 'noop'; }
`;

export const RETRY_ON_CONFLICT = 3;

export function buildUpdateAction(batch: UpdateBatch): UpdateAction {
  return {
    index: batch.index,
    id: batch.documentId,
    script: {
      lang: "painless",
      source: APPEND_IF_ABSENT_SCRIPT,
      params: { upd: batch.fields },
    },
    retryOnConflict: RETRY_ON_CONFLICT,
  };
}

// =============================================================================
// Bulk Submission
// =============================================================================

export type BulkUpdaterOptions = {
  bulkSize: number;
  retry: RetryPolicy;
  log: Logger;
  sleep?: RetryHooks["sleep"];
};

/**
 * Buffers update actions and submits them in chunks.
 *
 * A chunk that cannot be submitted at all fails every document in it; an
 * item error fails only its document. Neither stops the run.
 */
export class BulkUpdater {
  private readonly store: DocumentStore;
  private readonly options: BulkUpdaterOptions;
  private pending: UpdateAction[] = [];
  private appliedCount = 0;
  private readonly failures: ReconciliationError[] = [];

  constructor(store: DocumentStore, options: BulkUpdaterOptions) {
    this.store = store;
    this.options = options;
  }

  get applied(): number {
    return this.appliedCount;
  }

  get failed(): readonly ReconciliationError[] {
    return this.failures;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  async add(batch: UpdateBatch): Promise<void> {
    this.pending.push(buildUpdateAction(batch));
    if (this.pending.length >= this.options.bulkSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const chunk = this.pending;
    this.pending = [];
    const { log } = this.options;

    let results: BulkItemResult[];
    try {
      results = await withRetry(() => this.store.bulkUpdate(chunk), this.options.retry, {
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) =>
          log.warn(`Bulk update of ${chunk.length} document(s) failed (attempt ${attempt}): ${describeError(error)}; retrying in ${delayMs}ms`),
      });
    } catch (error) {
      for (const action of chunk) {
        this.recordFailure(new ReconciliationError(action.id, describeError(error), { cause: error }));
      }
      return;
    }

    for (const result of results) {
      if (result.ok) {
        this.appliedCount++;
      } else {
        this.recordFailure(new ReconciliationError(result.id, result.error));
      }
    }
    log.debug?.(`Bulk chunk of ${chunk.length} submitted`);
  }

  private recordFailure(error: ReconciliationError): void {
    this.failures.push(error);
    this.options.log.error(error.message);
  }
}
