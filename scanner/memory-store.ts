/**
 * In-process document store
 *
 * Pages through documents held in memory and applies scripted updates with
 * the same append-if-absent semantics as the Elasticsearch update script.
 * Used for dry runs against fixture documents and in tests.
 */

import { StoreRequestError } from "../errors.js";
import type {
  BulkItemResult,
  DocumentStore,
  ScrollPage,
  ScrollRequest,
  StoredDocument,
  UpdateAction,
} from "./store.js";

type OpenScroll = {
  documents: StoredDocument[];
  position: number;
  size: number;
  fields: string[] | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// Keep top-level keys that a requested field lives under (or is under)
function project(source: Record<string, unknown>, fields: string[] | null): Record<string, unknown> {
  if (!fields) return structuredClone(source);
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (fields.some((f) => f === key || f.startsWith(`${key}.`) || key.startsWith(`${f}.`))) {
      out[key] = structuredClone(value);
    }
  }
  return out;
}

export class MemoryStore implements DocumentStore {
  private readonly indices = new Map<string, StoredDocument[]>();
  private readonly scrolls = new Map<string, OpenScroll>();
  private scrollCounter = 0;

  /** Cursors released through closeScroll, in order */
  readonly closedCursors: string[] = [];
  /** Every bulk request received */
  readonly bulkRequests: UpdateAction[][] = [];
  /** Document ids whose updates are refused */
  readonly rejectedIds = new Set<string>();

  constructor(index?: string, sources: Record<string, Record<string, unknown>> = {}) {
    if (index) this.addDocuments(index, sources);
  }

  addDocuments(index: string, sources: Record<string, Record<string, unknown>>): void {
    const documents = this.indices.get(index) ?? [];
    for (const [id, source] of Object.entries(sources)) {
      documents.push({ id, index, source: structuredClone(source) });
    }
    this.indices.set(index, documents);
  }

  /** Current source of a stored document */
  getSource(index: string, id: string): Record<string, unknown> | undefined {
    return this.indices.get(index)?.find((d) => d.id === id)?.source;
  }

  async openScroll(request: ScrollRequest): Promise<ScrollPage> {
    const documents = this.indices.get(request.index);
    if (!documents) {
      throw new StoreRequestError(`HTTP 404 index_not_found_exception: no such index [${request.index}]`, 404, false);
    }
    const requested = request.query._source;
    const fields = Array.isArray(requested)
      ? requested.filter((f): f is string => typeof f === "string")
      : null;

    const cursor = `scroll-${++this.scrollCounter}`;
    this.scrolls.set(cursor, { documents: [...documents], position: 0, size: request.size, fields });
    return this.page(cursor);
  }

  async nextPage(cursor: string, _keepAlive: string): Promise<ScrollPage> {
    if (!this.scrolls.has(cursor)) {
      throw new StoreRequestError(`HTTP 404 search_context_missing_exception: No search context found for ${cursor}`, 404, true);
    }
    return this.page(cursor);
  }

  async closeScroll(cursor: string): Promise<void> {
    this.scrolls.delete(cursor);
    this.closedCursors.push(cursor);
  }

  async bulkUpdate(actions: readonly UpdateAction[]): Promise<BulkItemResult[]> {
    this.bulkRequests.push([...actions]);
    return actions.map((action) => this.applyUpdate(action));
  }

  private page(cursor: string): ScrollPage {
    const scroll = this.scrolls.get(cursor);
    if (!scroll) return { documents: [], cursor: null };
    const slice = scroll.documents.slice(scroll.position, scroll.position + scroll.size);
    scroll.position += slice.length;
    return {
      documents: slice.map((d) => ({ id: d.id, index: d.index, source: project(d.source, scroll.fields) })),
      cursor,
    };
  }

  private applyUpdate(action: UpdateAction): BulkItemResult {
    const document = this.indices.get(action.index)?.find((d) => d.id === action.id);
    if (!document) {
      return { id: action.id, ok: false, error: `HTTP 404 document_missing_exception: [${action.id}]: document missing` };
    }
    if (this.rejectedIds.has(action.id)) {
      return { id: action.id, ok: false, error: "HTTP 409 version_conflict_engine_exception: version conflict" };
    }
    const upd = action.script.params.upd;
    if (!isRecord(upd)) {
      return { id: action.id, ok: false, error: "HTTP 400 script_exception: params.upd missing" };
    }

    for (const [field, values] of Object.entries(upd)) {
      if (!Array.isArray(values)) continue;
      const current = document.source[field];
      const list: unknown[] =
        current === undefined || current === null ? [] : Array.isArray(current) ? [...current] : [current];
      for (const value of values) {
        if (!list.includes(value)) list.push(value);
      }
      document.source[field] = list;
    }
    return { id: action.id, ok: true };
  }
}
