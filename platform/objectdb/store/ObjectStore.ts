import type {
  AuditEntry,
  Instance,
  InstancePatch,
  Lineage,
  LineagePatch,
  NewAuditEntry,
  NewInstance,
  NewLineage,
  NewTemplate,
  Template,
  TemplatePatch,
} from "@shared/schema";
import type {
  AuditFilter,
  InstanceFilter,
  LineageFilter,
  Page,
  StoreReadOptions,
  TemplateFilter,
} from "./types";

/**
 * ObjectStore is a storage-only abstraction.
 *
 * Every read and write happens inside a transaction. Stores enforce the
 * unique keys named in CONSTRAINTS and report violations as
 * StoreConstraintViolation. Counters are atomic and are never rolled back.
 * Reads exclude soft-deleted rows unless includeDeleted is set; lookups by
 * uuid or euid always return the row.
 */
export interface ObjectStore {
  transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
}

export interface StoreSession {
  /** Runs work in a nested atomic section; a throw undoes only its writes. */
  savepoint<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;

  // ---- Counters ----

  ensureCounter(prefix: string): Promise<void>;

  nextCounterValue(prefix: string): Promise<number>;

  // ---- Templates ----

  insertTemplate(row: NewTemplate): Promise<Template>;

  updateTemplate(uuid: string, patch: TemplatePatch): Promise<Template>;

  getTemplate(uuid: string): Promise<Template | undefined>;

  findTemplateByEuid(euid: string): Promise<Template | undefined>;

  listTemplates(filter?: TemplateFilter, opts?: StoreReadOptions): Promise<Page<Template>>;

  // ---- Instances ----

  insertInstance(row: NewInstance): Promise<Instance>;

  updateInstance(uuid: string, patch: InstancePatch): Promise<Instance>;

  getInstance(uuid: string): Promise<Instance | undefined>;

  findInstanceByEuid(euid: string): Promise<Instance | undefined>;

  listInstances(filter?: InstanceFilter, opts?: StoreReadOptions): Promise<Page<Instance>>;

  // ---- Lineage ----

  insertLineage(row: NewLineage): Promise<Lineage>;

  updateLineage(uuid: string, patch: LineagePatch): Promise<Lineage>;

  getLineage(uuid: string): Promise<Lineage | undefined>;

  findLineageByEuid(euid: string): Promise<Lineage | undefined>;

  listLineages(filter?: LineageFilter, opts?: StoreReadOptions): Promise<Page<Lineage>>;

  // ---- Audit ----

  insertAuditEntry(entry: NewAuditEntry): Promise<AuditEntry>;

  listAuditEntries(filter: AuditFilter): Promise<AuditEntry[]>;
}
