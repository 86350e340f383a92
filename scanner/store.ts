/**
 * Document store contract consumed by the scanner and the bulk updater
 */

export type StoredDocument = {
  id: string;
  index: string;
  source: Record<string, unknown>;
};

export type ScrollPage = {
  documents: StoredDocument[];
  cursor: string | null; // null when the store issued no continuation
};

export type ScrollRequest = {
  index: string;
  query: Record<string, unknown>;
  size: number;
  keepAlive: string; // e.g. "2m"
};

// Server-side scripted partial update of one document
export type UpdateAction = {
  index: string;
  id: string;
  script: {
    lang: string;
    source: string;
    params: Record<string, unknown>;
  };
  retryOnConflict: number;
};

export type BulkItemResult =
  | { id: string; ok: true }
  | { id: string; ok: false; error: string };

export type DocumentStore = {
  openScroll(request: ScrollRequest): Promise<ScrollPage>;
  nextPage(cursor: string, keepAlive: string): Promise<ScrollPage>;
  closeScroll(cursor: string): Promise<void>;
  /** One result per action, in the order given */
  bulkUpdate(actions: readonly UpdateAction[]): Promise<BulkItemResult[]>;
};
