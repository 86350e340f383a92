/**
 * Pipeline types
 */

export type DedupeScope = "none" | "document" | "global";

export const DEDUPE_SCOPES: readonly DedupeScope[] = ["none", "document", "global"];

export type FieldMap = ReadonlyMap<string, string>; // detector name -> target field

export type UpdateBatch = {
  documentId: string;
  index: string;
  fields: Record<string, string[]>; // only values the document does not hold yet
};

export type RunSummary = {
  documentsScanned: number;
  matchesFound: number;
  rowsWritten: number;
  updatesApplied: number;
  updatesFailed: number;
  failedDocuments: string[];
  cancelled: boolean;
};

export type RunOutcome = "completed" | "cancelled" | "failed";
