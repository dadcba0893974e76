import type { AuditEntry, NewAuditEntry } from "@shared/schema";

/**
 * AuditSink is an append-only audit interface.
 * Entries are written inside the caller's unit of work, so they commit and
 * roll back with the change they describe.
 */
export interface AuditSink {
  insertAuditEntry(entry: NewAuditEntry): Promise<AuditEntry>;

  listAuditEntries(filter: Readonly<{ relTableUuid?: string; relTableEuid?: string }>): Promise<AuditEntry[]>;
}
