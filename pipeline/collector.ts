/**
 * Match collector
 *
 * Turns detector hits on a document's fields into RawMatches and applies the
 * dedupe scope for the audit. The seen-key set belongs to one collector, and
 * a run creates its own collector, so runs never share dedupe state.
 *
 * Memory: with the "global" scope the seen set holds one key per distinct
 * (detector, value) pair of the whole run. Over a very large corpus it grows
 * without bound; that is what keeps the audit free of repeated rows.
 */

import type { DetectorRegistry } from "../detectors/registry.js";
import type { RawMatch } from "../detectors/types.js";
import type { FieldValue } from "../scanner/extract.js";
import type { StoredDocument } from "../scanner/store.js";
import type { DedupeScope } from "./types.js";

export type RetainedMatch = {
  match: RawMatch;
  duplicate: boolean;
};

export type CollectedMatches = {
  /** Matches distinct by detector and normalized value, for write-back */
  matches: RawMatch[];
  /** Matches that go to the audit under the dedupe scope */
  retained: RetainedMatch[];
  /** Every accepted hit, before any dedupe */
  total: number;
};

/**
 * Stable key for a match. Per-document keys include the document id; global
 * keys do not.
 */
export function dedupeKey(scope: "document" | "global", match: RawMatch): string {
  return scope === "document"
    ? JSON.stringify([match.documentId, match.detector, match.normalizedText])
    : JSON.stringify([match.detector, match.normalizedText]);
}

export class MatchCollector {
  private readonly registry: DetectorRegistry;
  private readonly scope: DedupeScope;
  private readonly seen = new Set<string>();

  constructor(registry: DetectorRegistry, scope: DedupeScope) {
    this.registry = registry;
    this.scope = scope;
  }

  /** Keys held by the global scope so far */
  get seenCount(): number {
    return this.seen.size;
  }

  collect(document: StoredDocument, fields: Iterable<FieldValue>): CollectedMatches {
    const documentKeys = new Set<string>();
    const matches: RawMatch[] = [];
    const retained: RetainedMatch[] = [];
    let total = 0;

    for (const field of fields) {
      for (const fragment of this.registry.apply(field.value)) {
        total++;
        const match: RawMatch = Object.freeze({
          documentId: document.id,
          fieldPath: field.path,
          detector: fragment.detector,
          rawText: fragment.rawText,
          normalizedText: fragment.normalizedText,
        });

        const key = dedupeKey("document", match);
        const firstInDocument = !documentKeys.has(key);
        documentKeys.add(key);
        if (firstInDocument) matches.push(match);

        switch (this.scope) {
          case "none":
            retained.push({ match, duplicate: !firstInDocument });
            break;
          case "document":
            if (firstInDocument) retained.push({ match, duplicate: false });
            break;
          case "global": {
            const globalKey = dedupeKey("global", match);
            if (!this.seen.has(globalKey)) {
              this.seen.add(globalKey);
              retained.push({ match, duplicate: false });
            }
            break;
          }
        }
      }
    }

    return { matches, retained, total };
  }
}
