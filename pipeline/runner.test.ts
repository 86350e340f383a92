/**
 * Runner tests: end-to-end sweeps over an in-memory store
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { CsvAuditSink } from "../audit/csv-sink.js";
import type { AuditRecord, AuditSink } from "../audit/types.js";
import { BUILTIN_DEFINITIONS } from "../detectors/definitions.js";
import { DetectorRegistry } from "../detectors/registry.js";
import { ConfigurationError, RetrievalError, StoreRequestError } from "../errors.js";
import type { Logger } from "../logger.js";
import { MemoryStore } from "../scanner/memory-store.js";
import type { ScrollPage } from "../scanner/store.js";
import { parseFieldMap } from "./field-map.js";
import { exitCodeFor, formatSummary, runExtraction, type RunOptions } from "./runner.js";
import type { RunOutcome, RunSummary } from "./types.js";

const registry = DetectorRegistry.load([
  ...BUILTIN_DEFINITIONS,
  {
    name: "EMAIL",
    regex: String.raw`[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}`,
    normalize: "lowercase",
  },
]);

const OPTIONS: RunOptions = {
  index: "docs",
  batchSize: 2,
  keepAlive: "1m",
  contentFields: ["content"],
  pathField: "path.virtual",
  dedupe: "none",
  fieldMap: new Map(),
  applyUpdates: false,
  bulkSize: 10,
  retry: { retries: 0, baseDelayMs: 1, maxDelayMs: 1 },
};

class MemorySink implements AuditSink {
  readonly records: AuditRecord[] = [];
  outcome: RunOutcome | undefined;
  finishedWith: RunSummary | undefined;
  closed = 0;

  constructor(private readonly onEmit?: (record: AuditRecord) => void) {}

  emit(record: AuditRecord): void {
    this.records.push(record);
    this.onEmit?.(record);
  }

  finish(summary: RunSummary, outcome: RunOutcome): void {
    this.finishedWith = { ...summary };
    this.outcome = outcome;
  }

  close(): void {
    this.closed++;
  }
}

function spyLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function sampleStore(): MemoryStore {
  return new MemoryStore("docs", {
    d1: { content: "Mail a@example.com, SIN 123 456 782", path: { virtual: "/share/d1.txt" }, blob: "x" },
    d2: { content: "nothing here" },
    d3: { content: "A@example.com again", path: { virtual: "/share/d3.txt" } },
  });
}

let tempDir: string | undefined;

afterEach(() => {
  if (tempDir) rmSync(tempDir, { recursive: true, force: true });
  tempDir = undefined;
});

// =============================================================================
// Audit
// =============================================================================

describe("runExtraction audit", () => {
  it("writes one record per match with the source path", async () => {
    const sink = new MemorySink();
    const summary = await runExtraction(OPTIONS, { store: sampleStore(), registry, sink, log: spyLogger() });

    expect(sink.records).toEqual([
      {
        documentId: "d1",
        fieldPath: "content",
        detector: "NAS",
        rawText: "123 456 782",
        normalizedText: "123-456-782",
        duplicate: false,
        sourcePath: "/share/d1.txt",
      },
      {
        documentId: "d1",
        fieldPath: "content",
        detector: "EMAIL",
        rawText: "a@example.com",
        normalizedText: "a@example.com",
        duplicate: false,
        sourcePath: "/share/d1.txt",
      },
      {
        documentId: "d3",
        fieldPath: "content",
        detector: "EMAIL",
        rawText: "A@example.com",
        normalizedText: "a@example.com",
        duplicate: false,
        sourcePath: "/share/d3.txt",
      },
    ]);
    expect(summary).toEqual({
      documentsScanned: 3,
      matchesFound: 3,
      rowsWritten: 3,
      updatesApplied: 0,
      updatesFailed: 0,
      failedDocuments: [],
      cancelled: false,
    });
    expect(sink.outcome).toBe("completed");
    expect(sink.closed).toBe(1);
    expect(exitCodeFor(summary)).toBe(0);
  });

  it("drops repeated values across documents under global dedupe", async () => {
    const sink = new MemorySink();
    const summary = await runExtraction(
      { ...OPTIONS, dedupe: "global" },
      { store: sampleStore(), registry, sink, log: spyLogger() },
    );
    expect(sink.records.map((r) => [r.documentId, r.detector])).toEqual([
      ["d1", "NAS"],
      ["d1", "EMAIL"],
    ]);
    expect(summary.matchesFound).toBe(3);
    expect(summary.rowsWritten).toBe(2);
  });

  it("scans the whole source when no content field is given", async () => {
    const store = new MemoryStore("docs", { d1: { meta: { owner: "Owner@Example.com" }, tags: ["t", "x@example.com"] } });
    const sink = new MemorySink();
    await runExtraction({ ...OPTIONS, contentFields: [] }, { store, registry, sink, log: spyLogger() });
    expect(sink.records.map((r) => [r.fieldPath, r.normalizedText])).toEqual([
      ["meta.owner", "owner@example.com"],
      ["tags[1]", "x@example.com"],
    ]);
  });
});

// =============================================================================
// Write-back
// =============================================================================

describe("runExtraction write-back", () => {
  const writeBack: RunOptions = {
    ...OPTIONS,
    fieldMap: parseFieldMap("EMAIL=pii.emails,NAS=pii.nas"),
    applyUpdates: true,
  };

  it("unions normalized values into the mapped fields", async () => {
    const store = sampleStore();
    const summary = await runExtraction(writeBack, { store, registry, sink: new MemorySink(), log: spyLogger() });

    expect(summary.updatesApplied).toBe(2);
    expect(store.getSource("docs", "d1")).toEqual({
      content: "Mail a@example.com, SIN 123 456 782",
      path: { virtual: "/share/d1.txt" },
      blob: "x",
      "pii.emails": ["a@example.com"],
      "pii.nas": ["123-456-782"],
    });
    expect(store.getSource("docs", "d3")?.["pii.emails"]).toEqual(["a@example.com"]);
  });

  it("sends nothing on a second run over the same documents", async () => {
    const store = sampleStore();
    await runExtraction(writeBack, { store, registry, sink: new MemorySink(), log: spyLogger() });
    const sink = new MemorySink();
    const second = await runExtraction(writeBack, { store, registry, sink, log: spyLogger() });

    expect(second.updatesApplied).toBe(0);
    expect(second.rowsWritten).toBe(3);
    expect(store.bulkRequests).toHaveLength(1);
  });

  it("treats values under a nested target field as present", async () => {
    const store = new MemoryStore("docs", {
      d1: { content: "a@example.com and b@example.com", pii: { emails: ["a@example.com"] } },
    });
    const first = await runExtraction(writeBack, { store, registry, sink: new MemorySink(), log: spyLogger() });
    const second = await runExtraction(writeBack, { store, registry, sink: new MemorySink(), log: spyLogger() });

    expect(first.updatesApplied).toBe(1);
    expect(second.updatesApplied).toBe(0);
    expect(store.bulkRequests).toHaveLength(1);
    expect(store.getSource("docs", "d1")).toEqual({
      content: "a@example.com and b@example.com",
      pii: { emails: ["a@example.com"] },
      "pii.emails": ["b@example.com"],
    });
  });

  it("does not scan the fields it writes", async () => {
    const store = sampleStore();
    const whole = { ...writeBack, contentFields: [] };
    await runExtraction(whole, { store, registry, sink: new MemorySink(), log: spyLogger() });
    const sink = new MemorySink();
    const second = await runExtraction(whole, { store, registry, sink, log: spyLogger() });

    expect(second.matchesFound).toBe(3);
    expect(sink.records.every((r) => r.fieldPath === "content")).toBe(true);
  });

  it("counts failed updates and exits with 1", async () => {
    const store = sampleStore();
    store.rejectedIds.add("d1");
    const summary = await runExtraction(writeBack, { store, registry, sink: new MemorySink(), log: spyLogger() });

    expect(summary.updatesApplied).toBe(1);
    expect(summary.updatesFailed).toBe(1);
    expect(summary.failedDocuments).toEqual(["d1"]);
    expect(exitCodeFor(summary)).toBe(1);
  });

  it("rejects a field map naming an unknown detector before scanning", async () => {
    const store = sampleStore();
    const run = runExtraction(
      { ...writeBack, fieldMap: parseFieldMap("PHONE=pii.phones") },
      { store, registry, sink: new MemorySink(), log: spyLogger() },
    );
    await expect(run).rejects.toThrow(ConfigurationError);
    expect(store.closedCursors).toEqual([]);
  });
});

// =============================================================================
// Failure and Cancellation
// =============================================================================

// Fails every request for one page number
class BrokenPageStore extends MemoryStore {
  private pageNumber = 1;

  constructor(
    count: number,
    private readonly brokenPage: number,
  ) {
    super();
    const sources: Record<string, Record<string, unknown>> = {};
    for (let i = 1; i <= count; i++) sources[`doc-${i}`] = { content: `user${i}@example.com` };
    this.addDocuments("docs", sources);
  }

  override async nextPage(cursor: string, keepAlive: string): Promise<ScrollPage> {
    this.pageNumber++;
    if (this.pageNumber === this.brokenPage) {
      this.pageNumber--;
      throw new StoreRequestError("POST /_search/scroll: HTTP 500 shard failure", 500, true);
    }
    return super.nextPage(cursor, keepAlive);
  }
}

describe("runExtraction failures", () => {
  it("keeps the audit rows of pages fetched before a retrieval failure", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "pii-sweep-run-"));
    const csvPath = join(tempDir, "audit.csv");
    const sink = new CsvAuditSink(csvPath);
    const store = new BrokenPageStore(10, 3);

    const run = runExtraction(
      { ...OPTIONS, batchSize: 1, retry: { retries: 2, baseDelayMs: 1, maxDelayMs: 1 } },
      { store, registry, sink, log: spyLogger(), sleep: async () => {} },
    );

    await expect(run).rejects.toThrow(RetrievalError);
    await expect(run).rejects.toThrow(
      'Failed to retrieve page 3 of index "docs": POST /_search/scroll: HTTP 500 shard failure',
    );
    expect(readFileSync(csvPath, "utf-8")).toBe(
      [
        "document_id,field_path,detector,raw_match,normalized_value,duplicate,source_path",
        "doc-1,content,EMAIL,user1@example.com,user1@example.com,false,",
        "doc-2,content,EMAIL,user2@example.com,user2@example.com,false,",
        "",
      ].join("\n"),
    );
    expect(store.closedCursors).toEqual(["scroll-1"]);
  });

  it("records the failed outcome, logs the summary and closes the sink", async () => {
    const sink = new MemorySink();
    const log = spyLogger();
    const run = runExtraction(
      { ...OPTIONS, batchSize: 1 },
      { store: new BrokenPageStore(4, 2), registry, sink, log },
    );
    await expect(run).rejects.toThrow(RetrievalError);
    expect(log.info).toHaveBeenCalledWith(
      "Documents scanned: 1 | Matches found: 1 | Rows written: 1 | Updates applied: 0 | Updates failed: 0",
    );
    expect(sink.outcome).toBe("failed");
    expect(sink.finishedWith?.documentsScanned).toBe(1);
    expect(sink.closed).toBe(1);
  });

  it("stops after the current document when cancelled and flushes pending updates", async () => {
    const controller = new AbortController();
    const store = new BrokenPageStore(6, 0);
    const sink = new MemorySink((record) => {
      if (record.documentId === "doc-2") controller.abort();
    });
    const log = spyLogger();

    const summary = await runExtraction(
      { ...OPTIONS, fieldMap: parseFieldMap("EMAIL=pii.emails"), applyUpdates: true },
      { store, registry, sink, log, signal: controller.signal },
    );

    expect(summary.cancelled).toBe(true);
    expect(summary.documentsScanned).toBe(2);
    expect(summary.updatesApplied).toBe(2);
    expect(sink.outcome).toBe("cancelled");
    expect(store.closedCursors).toEqual(["scroll-1"]);
    expect(store.getSource("docs", "doc-3")).toEqual({ content: "user3@example.com" });
    expect(exitCodeFor(summary)).toBe(130);
    expect(log.warn).toHaveBeenCalledWith("Run cancelled after 2 document(s)");
  });
});

describe("formatSummary", () => {
  it("prints the counters with thousands separators", () => {
    expect(
      formatSummary({
        documentsScanned: 12345,
        matchesFound: 3,
        rowsWritten: 3,
        updatesApplied: 0,
        updatesFailed: 0,
        failedDocuments: [],
        cancelled: false,
      }),
    ).toBe("Documents scanned: 12,345 | Matches found: 3 | Rows written: 3 | Updates applied: 0 | Updates failed: 0");
  });
});
