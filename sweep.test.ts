/**
 * Sweep tests: configuration through audit and write-back
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { SqliteAuditSink } from "./audit/sqlite-sink.js";
import { resolveConfig, type SweepConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { MemoryStore } from "./scanner/memory-store.js";
import type { ScrollPage, ScrollRequest } from "./scanner/store.js";
import { buildRegistry, executeSweep } from "./sweep.js";

const BUNDLED_YAML = fileURLToPath(new URL("./detectors.yaml", import.meta.url));

class RecordingStore extends MemoryStore {
  readonly requests: ScrollRequest[] = [];

  override async openScroll(request: ScrollRequest): Promise<ScrollPage> {
    this.requests.push(request);
    return super.openScroll(request);
  }
}

function sampleStore(): RecordingStore {
  const store = new RecordingStore();
  store.addDocuments("docs", {
    d1: { content: "Reach a@example.com or 514-555-0000", path: { virtual: "/share/d1.docx" } },
    d2: { attachment: { content: "SIN 123 456 782" } },
  });
  return store;
}

function spyLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "pii-sweep-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function config(overrides: Partial<SweepConfig> = {}): SweepConfig {
  return resolveConfig({
    esUrl: "http://es.test:9200",
    index: "docs",
    out: join(dir, "audit.csv"),
    detectorsYaml: BUNDLED_YAML,
    ...overrides,
  });
}

describe("buildRegistry", () => {
  it("puts the built-in detector ahead of file definitions", () => {
    const registry = buildRegistry({ builtinDetectors: true, detectorsYaml: BUNDLED_YAML });
    expect(registry.names().slice(0, 2)).toEqual(["NAS", "QC_RAMQ"]);
    expect(registry.size).toBe(10);
  });

  it("requires at least one detector", () => {
    expect(() => buildRegistry({ builtinDetectors: false })).toThrow("No detectors configured");
  });
});

describe("executeSweep", () => {
  it("writes the audit and applies the mapped updates", async () => {
    const store = sampleStore();
    const log = spyLogger();

    const summary = await executeSweep(
      config({ fieldMap: "EMAIL=pii.emails,NAS=pii.nas", applyUpdates: true }),
      { log, createStore: () => store },
    );

    expect(summary).toEqual({
      documentsScanned: 2,
      matchesFound: 3,
      rowsWritten: 3,
      updatesApplied: 2,
      updatesFailed: 0,
      failedDocuments: [],
      cancelled: false,
    });
    expect(readFileSync(join(dir, "audit.csv"), "utf-8")).toBe(
      [
        "document_id,field_path,detector,raw_match,normalized_value,duplicate,source_path",
        "d1,content,EMAIL,a@example.com,a@example.com,false,/share/d1.docx",
        "d1,content,PHONE_CA,514-555-0000,5145550000,false,/share/d1.docx",
        "d2,attachment.content,NAS,123 456 782,123-456-782,false,",
        "",
      ].join("\n"),
    );
    expect(store.getSource("docs", "d1")?.["pii.emails"]).toEqual(["a@example.com"]);
    expect(store.getSource("docs", "d2")?.["pii.nas"]).toEqual(["123-456-782"]);
    expect(store.requests[0].query).toEqual({
      query: { match_all: {} },
      _source: ["content", "attachment.content", "path.virtual", "pii.emails", "pii.nas"],
    });
    expect(log.info).toHaveBeenCalledWith(
      "Documents scanned: 2 | Matches found: 3 | Rows written: 3 | Updates applied: 2 | Updates failed: 0",
    );
    expect(log.info).toHaveBeenCalledWith(`Audit written to ${join(dir, "audit.csv")}`);
  });

  it("leaves documents untouched without --apply-updates", async () => {
    const store = sampleStore();
    const summary = await executeSweep(config({ fieldMap: "EMAIL=pii.emails" }), {
      log: silentLogger,
      createStore: () => store,
    });
    expect(summary.updatesApplied).toBe(0);
    expect(store.bulkRequests).toEqual([]);
  });

  it("sends the query file to the store", async () => {
    const queryFile = join(dir, "query.json");
    writeFileSync(queryFile, JSON.stringify({ query: { term: { lang: "fr" } } }));
    const store = sampleStore();

    await executeSweep(config({ queryJson: queryFile, contentFields: ["content"] }), {
      log: silentLogger,
      createStore: () => store,
    });
    expect(store.requests[0].query).toEqual({
      query: { term: { lang: "fr" } },
      _source: ["content", "path.virtual"],
    });
  });

  it("fails on configuration before creating the store or the audit file", async () => {
    const createStore = vi.fn(() => sampleStore());
    const run = executeSweep(config({ fieldMap: "PHONE=pii.phones" }), { log: silentLogger, createStore });

    await expect(run).rejects.toThrow(ConfigurationError);
    await expect(run).rejects.toThrow('Detector "PHONE": field map names an unknown detector');
    expect(createStore).not.toHaveBeenCalled();
    expect(existsSync(join(dir, "audit.csv"))).toBe(false);
  });

  it("rejects a query file that is not an object", async () => {
    const queryFile = join(dir, "query.json");
    writeFileSync(queryFile, "[1, 2]");
    await expect(
      executeSweep(config({ queryJson: queryFile }), { log: silentLogger, createStore: () => sampleStore() }),
    ).rejects.toThrow(`Query file ${queryFile} must hold a JSON object`);
  });

  it("records the run in the audit database", async () => {
    const dbPath = join(dir, "audit.db");
    await executeSweep(config({ auditDb: dbPath }), { log: silentLogger, createStore: () => sampleStore() });

    const reopened = new SqliteAuditSink(dbPath, "docs", silentLogger);
    try {
      expect(reopened.getRun(1)).toMatchObject({ outcome: "completed", documentsScanned: 2, rowsWritten: 3 });
      expect(reopened.getMatches(1).map((m) => m.detector)).toEqual(["EMAIL", "PHONE_CA", "NAS"]);
    } finally {
      reopened.close();
    }
  });

  it("warns when TLS verification is off", async () => {
    const log = spyLogger();
    await executeSweep(config({ verifyTls: false }), { log, createStore: () => sampleStore() });
    expect(log.warn).toHaveBeenCalledWith("TLS certificate verification is disabled");
  });
});
