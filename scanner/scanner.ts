/**
 * Document scanner
 *
 * Streams every document of an index through the store's scroll cursor.
 * The sequence is single-pass: a failed run starts over from the first page.
 */

import { RetrievalError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { withRetry, type RetryHooks, type RetryPolicy } from "./retry.js";
import type { DocumentStore, ScrollPage, StoredDocument } from "./store.js";

export type ScanOptions = {
  index: string;
  query: Record<string, unknown>;
  batchSize: number;
  keepAlive: string;
  retry: RetryPolicy;
  log: Logger;
  sleep?: RetryHooks["sleep"];
};

// =============================================================================
// Query
// =============================================================================

/**
 * Make sure `_source` carries every field the run reads. With no fields
 * the query is returned as given (whole source).
 * A `_source` list is extended; a missing one is set; any other `_source`
 * setting (true, includes/excludes object) is left as the caller wrote it.
 */
export function buildScanQuery(
  base: Record<string, unknown> | undefined,
  sourceFields: readonly string[],
): Record<string, unknown> {
  const query: Record<string, unknown> = base ? { ...base } : { query: { match_all: {} } };
  const wanted = sourceFields.filter(Boolean);
  if (wanted.length === 0) return query;
  const current = query._source;

  if (current === undefined) {
    query._source = [...new Set(wanted)];
  } else if (Array.isArray(current)) {
    const merged = new Set<string>(current.filter((f): f is string => typeof f === "string"));
    for (const field of wanted) merged.add(field);
    query._source = [...merged];
  }
  return query;
}

// =============================================================================
// Scan
// =============================================================================

export async function* scanDocuments(
  store: DocumentStore,
  options: ScanOptions,
): AsyncGenerator<StoredDocument> {
  const { index, log } = options;
  let page = 1;
  let cursor: string | null = null;

  const fetchPage = (fetch: () => Promise<ScrollPage>): Promise<ScrollPage> =>
    withRetry(() => fetch(), options.retry, {
      sleep: options.sleep,
      onRetry: (error, attempt, delayMs) =>
        log.warn(
          `Page ${page} of "${index}" failed (attempt ${attempt}/${options.retry.retries + 1}): ` +
            `${describeError(error)}; retrying in ${delayMs}ms`,
        ),
    }).catch((error: unknown) => {
      throw new RetrievalError(index, page, error);
    });

  try {
    let result = await fetchPage(() =>
      store.openScroll({
        index,
        query: options.query,
        size: options.batchSize,
        keepAlive: options.keepAlive,
      }),
    );

    while (true) {
      cursor = result.cursor ?? cursor;
      if (result.documents.length === 0) return;
      log.debug?.(`Page ${page}: ${result.documents.length} document(s)`);

      for (const document of result.documents) {
        yield document;
      }

      const next = result.cursor;
      if (!next) return;
      page++;
      result = await fetchPage(() => store.nextPage(next, options.keepAlive));
    }
  } finally {
    if (cursor) {
      try {
        await store.closeScroll(cursor);
      } catch (error) {
        log.warn(`Could not release scroll cursor: ${describeError(error)}`);
      }
    }
  }
}
