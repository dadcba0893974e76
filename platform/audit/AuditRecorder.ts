import { getTableColumns } from "drizzle-orm";
import {
  AUDITED_TABLES,
  type AuditEntry,
  type AuditedTableName,
  type Instance,
  type Lineage,
  type Template,
} from "@shared/schema";
import type { AuditSink } from "./AuditSink";

export type AuditedRow = Template | Instance | Lineage;

// Touched on every write; never audited.
const UNAUDITED_COLUMNS = new Set(["modifiedDt"]);

function columnNames(table: AuditedTableName): Map<string, string> {
  const names = new Map<string, string>();
  for (const [key, column] of Object.entries(getTableColumns(AUDITED_TABLES[table]))) {
    names.set(key, column.name);
  }
  return names;
}

const COLUMN_NAMES: Record<AuditedTableName, Map<string, string>> = {
  generic_template: columnNames("generic_template"),
  generic_instance: columnNames("generic_instance"),
  generic_instance_lineage: columnNames("generic_instance_lineage"),
};

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys in sorted order, so equal values always serialize equally. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export function toAuditText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return canonicalJson(value);
}

function snapshot(table: AuditedTableName, row: AuditedRow): Record<string, unknown> {
  const names = COLUMN_NAMES[table];
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    out[names.get(key) ?? key] = value instanceof Date ? value.toISOString() : value;
  }
  return out;
}

/**
 * Writes audit_log entries for inserts, column-level updates and soft deletes.
 * Every method writes through the sink of the current unit of work.
 */
export class AuditRecorder {
  async recordInsert(sink: AuditSink, actorId: string, table: AuditedTableName, row: AuditedRow): Promise<AuditEntry> {
    return sink.insertAuditEntry({
      relTableName: table,
      relTableUuid: row.uuid,
      relTableEuid: row.euid,
      columnName: null,
      oldValue: null,
      newValue: null,
      changedBy: actorId,
      operationType: "INSERT",
      deletedRecord: null,
    });
  }

  /** One UPDATE entry per column whose serialized value changed. */
  async recordUpdate(
    sink: AuditSink,
    actorId: string,
    table: AuditedTableName,
    before: AuditedRow,
    after: AuditedRow,
  ): Promise<AuditEntry[]> {
    const names = COLUMN_NAMES[table];
    const previous = new Map<string, unknown>(Object.entries(before));
    const entries: AuditEntry[] = [];

    for (const [key, value] of Object.entries(after)) {
      if (UNAUDITED_COLUMNS.has(key)) continue;
      const oldValue = toAuditText(previous.get(key));
      const newValue = toAuditText(value);
      if (oldValue === newValue) continue;

      entries.push(
        await sink.insertAuditEntry({
          relTableName: table,
          relTableUuid: after.uuid,
          relTableEuid: after.euid,
          columnName: names.get(key) ?? key,
          oldValue,
          newValue,
          changedBy: actorId,
          operationType: "UPDATE",
          deletedRecord: null,
        }),
      );
    }
    return entries;
  }

  /** The DELETE entry carries the row as it was before the soft delete. */
  async recordDelete(sink: AuditSink, actorId: string, table: AuditedTableName, before: AuditedRow): Promise<AuditEntry> {
    return sink.insertAuditEntry({
      relTableName: table,
      relTableUuid: before.uuid,
      relTableEuid: before.euid,
      columnName: null,
      oldValue: null,
      newValue: null,
      changedBy: actorId,
      operationType: "DELETE",
      deletedRecord: snapshot(table, before),
    });
  }

  async history(sink: AuditSink, euid: string): Promise<AuditEntry[]> {
    const entries = await sink.listAuditEntries({ relTableEuid: euid });
    return [...entries].sort((a, b) => a.changedAt.getTime() - b.changedAt.getTime());
  }
}
