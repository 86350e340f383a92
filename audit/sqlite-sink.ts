/**
 * SQLite audit store
 *
 * Same rows as the CSV file, plus one row per run with its outcome, so
 * repeated sweeps can be compared from one database.
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../logger.js";
import type { RunOutcome, RunSummary } from "../pipeline/types.js";
import type { AuditRecord, AuditSink } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS scan_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  started_at TEXT DEFAULT (datetime('now')),
  finished_at TEXT,
  index_name TEXT NOT NULL,
  outcome TEXT NOT NULL DEFAULT 'running',
  documents_scanned INTEGER NOT NULL DEFAULT 0,
  matches_found INTEGER NOT NULL DEFAULT 0,
  rows_written INTEGER NOT NULL DEFAULT 0,
  updates_applied INTEGER NOT NULL DEFAULT 0,
  updates_failed INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS pii_matches (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL,
  document_id TEXT NOT NULL,
  field_path TEXT NOT NULL,
  detector TEXT NOT NULL,
  raw_match TEXT NOT NULL,
  normalized_value TEXT NOT NULL,
  duplicate INTEGER NOT NULL DEFAULT 0,
  source_path TEXT,
  FOREIGN KEY (run_id) REFERENCES scan_runs(id)
);

CREATE INDEX IF NOT EXISTS idx_pii_matches_run ON pii_matches(run_id);
CREATE INDEX IF NOT EXISTS idx_pii_matches_value ON pii_matches(detector, normalized_value);
`;

// =============================================================================
// Row Types
// =============================================================================

type DbMatch = {
  id: number;
  run_id: number;
  document_id: string;
  field_path: string;
  detector: string;
  raw_match: string;
  normalized_value: string;
  duplicate: number;
  source_path: string | null;
};

type DbRun = {
  id: number;
  index_name: string;
  outcome: string;
  documents_scanned: number;
  matches_found: number;
  rows_written: number;
  updates_applied: number;
  updates_failed: number;
};

export type StoredRun = {
  id: number;
  indexName: string;
  outcome: string;
  documentsScanned: number;
  matchesFound: number;
  rowsWritten: number;
  updatesApplied: number;
  updatesFailed: number;
};

// =============================================================================
// Sink
// =============================================================================

export class SqliteAuditSink implements AuditSink {
  private db: Database.Database;
  private insert: Database.Statement;
  private closed = false;
  readonly runId: number;

  constructor(dbPath: string, indexName: string, log: Logger) {
    if (dbPath !== ":memory:") {
      const dir = path.dirname(path.resolve(dbPath));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);

    const run = this.db.prepare("INSERT INTO scan_runs (index_name) VALUES (?)").run(indexName);
    this.runId = Number(run.lastInsertRowid);

    this.insert = this.db.prepare(`
      INSERT INTO pii_matches
        (run_id, document_id, field_path, detector, raw_match, normalized_value, duplicate, source_path)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    log.info(`Audit database ${dbPath} (run ${this.runId})`);
  }

  emit(record: AuditRecord): void {
    this.insert.run(
      this.runId,
      record.documentId,
      record.fieldPath,
      record.detector,
      record.rawText,
      record.normalizedText,
      record.duplicate ? 1 : 0,
      record.sourcePath || null,
    );
  }

  finish(summary: RunSummary, outcome: RunOutcome): void {
    this.db
      .prepare(`
        UPDATE scan_runs
        SET finished_at = datetime('now'), outcome = ?, documents_scanned = ?, matches_found = ?,
            rows_written = ?, updates_applied = ?, updates_failed = ?
        WHERE id = ?
      `)
      .run(
        outcome,
        summary.documentsScanned,
        summary.matchesFound,
        summary.rowsWritten,
        summary.updatesApplied,
        summary.updatesFailed,
        this.runId,
      );
  }

  /**
   * Matches recorded by a run (this one by default), in insertion order
   */
  getMatches(runId: number = this.runId): AuditRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM pii_matches WHERE run_id = ? ORDER BY id")
      .all(runId) as DbMatch[];

    return rows.map((row) => ({
      documentId: row.document_id,
      fieldPath: row.field_path,
      detector: row.detector,
      rawText: row.raw_match,
      normalizedText: row.normalized_value,
      duplicate: row.duplicate === 1,
      sourcePath: row.source_path ?? "",
    }));
  }

  getRun(runId: number = this.runId): StoredRun | undefined {
    const row = this.db.prepare("SELECT * FROM scan_runs WHERE id = ?").get(runId) as DbRun | undefined;
    if (!row) return undefined;
    return {
      id: row.id,
      indexName: row.index_name,
      outcome: row.outcome,
      documentsScanned: row.documents_scanned,
      matchesFound: row.matches_found,
      rowsWritten: row.rows_written,
      updatesApplied: row.updates_applied,
      updatesFailed: row.updates_failed,
    };
  }

  /**
   * Distinct values per detector across every run in the database
   */
  getDetectorCounts(): Record<string, number> {
    const rows = this.db
      .prepare(`
        SELECT detector, COUNT(DISTINCT normalized_value) AS count
        FROM pii_matches GROUP BY detector ORDER BY detector
      `)
      .all() as Array<{ detector: string; count: number }>;

    const counts: Record<string, number> = {};
    for (const row of rows) counts[row.detector] = row.count;
    return counts;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}
