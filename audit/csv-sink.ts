/**
 * CSV audit file
 *
 * Each record is written with one synchronous append, so an aborted run
 * leaves a file that ends on a complete line.
 */

import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import { AUDIT_COLUMNS, toAuditRow, type AuditRecord, type AuditSink } from "./types.js";

export class CsvAuditSink implements AuditSink {
  readonly path: string;
  private fd: number | null;
  private rows = 0;

  constructor(filePath: string) {
    this.path = filePath;
    mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    this.fd = openSync(filePath, "w");
    this.writeLine([...AUDIT_COLUMNS]);
  }

  get rowsWritten(): number {
    return this.rows;
  }

  emit(record: AuditRecord): void {
    this.writeLine(toAuditRow(record));
    this.rows++;
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }

  private writeLine(fields: string[]): void {
    if (this.fd === null) {
      throw new Error(`Audit file ${this.path} is already closed`);
    }
    writeSync(this.fd, `${Papa.unparse([fields], { newline: "\n" })}\n`);
  }
}
