import { randomUUID } from "crypto";
import {
  CONSTRAINTS,
  type AuditEntry,
  type Instance,
  type InstancePatch,
  type Lineage,
  type LineagePatch,
  type NewAuditEntry,
  type NewInstance,
  type NewLineage,
  type NewTemplate,
  type Template,
  type TemplatePatch,
} from "@shared/schema";
import type { ObjectStore, StoreSession } from "./ObjectStore";
import { StoreConstraintViolation, StoreCounterMissing } from "./errors";
import {
  clampLimit,
  clampOffset,
  type AuditFilter,
  type InstanceFilter,
  type LineageFilter,
  type Page,
  type StoreReadOptions,
  type TemplateFilter,
} from "./types";

type MemoryState = {
  templates: Map<string, Template>;
  instances: Map<string, Instance>;
  lineages: Map<string, Lineage>;
  audit: AuditEntry[];
};

type SoftDeletable = { uuid: string; euid: string; isDeleted: boolean };

function emptyState(): MemoryState {
  return { templates: new Map(), instances: new Map(), lineages: new Map(), audit: [] };
}

function cloneState(state: MemoryState): MemoryState {
  return structuredClone(state);
}

function matches<R>(row: R, filter: Readonly<Partial<R>>): boolean {
  for (const key of Object.keys(filter)) {
    if (!isKeyOf(row, key)) continue;
    const expected = filter[key];
    if (expected !== undefined && row[key] !== expected) return false;
  }
  return true;
}

function isKeyOf<R>(row: R, key: string): key is Extract<keyof R, string> {
  return typeof row === "object" && row !== null && key in row;
}

function paginate<R extends SoftDeletable>(
  rows: Iterable<R>,
  filter: Readonly<Partial<R>>,
  opts?: StoreReadOptions,
): Page<R> {
  const all = Array.from(rows).filter((r) => (opts?.includeDeleted || !r.isDeleted) && matches(r, filter));
  const offset = clampOffset(opts?.offset);
  const limit = clampLimit(opts?.limit);
  return { items: all.slice(offset, offset + limit), total: all.length };
}

function findByEuid<R extends SoftDeletable>(rows: Map<string, R>, euid: string): R | undefined {
  for (const row of rows.values()) {
    if (row.euid === euid) return row;
  }
  return undefined;
}

function requireRow<R>(rows: Map<string, R>, uuid: string, table: string): R {
  const row = rows.get(uuid);
  if (!row) throw new Error(`STORE_ROW_MISSING: ${table} ${uuid}`);
  return row;
}

function sameTypeKey(
  a: { category: string; type: string; subtype: string; version: string },
  b: { category: string; type: string; subtype: string; version: string },
): boolean {
  return a.category === b.category && a.type === b.type && a.subtype === b.subtype && a.version === b.version;
}

class InMemorySession implements StoreSession {
  constructor(
    private state: MemoryState,
    private readonly counters: Map<string, number>,
  ) {}

  currentState(): MemoryState {
    return this.state;
  }

  async savepoint<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const snapshot = cloneState(this.state);
    try {
      return await work(this);
    } catch (err) {
      this.state = snapshot;
      throw err;
    }
  }

  // ---- Counters ----

  async ensureCounter(prefix: string): Promise<void> {
    if (!this.counters.has(prefix)) this.counters.set(prefix, 0);
  }

  async nextCounterValue(prefix: string): Promise<number> {
    const current = this.counters.get(prefix);
    if (current === undefined) throw new StoreCounterMissing(prefix);
    const next = current + 1;
    this.counters.set(prefix, next);
    return next;
  }

  // ---- Templates ----

  async insertTemplate(row: NewTemplate): Promise<Template> {
    const now = new Date();
    const template: Template = { ...row, uuid: randomUUID(), isDeleted: false, createdDt: now, modifiedDt: now };
    this.checkTemplate(template);
    this.state.templates.set(template.uuid, template);
    return template;
  }

  async updateTemplate(uuid: string, patch: TemplatePatch): Promise<Template> {
    const existing = requireRow(this.state.templates, uuid, "generic_template");
    const updated: Template = { ...existing, ...patch, modifiedDt: new Date() };
    this.checkTemplate(updated);
    this.state.templates.set(uuid, updated);
    return updated;
  }

  async getTemplate(uuid: string): Promise<Template | undefined> {
    return this.state.templates.get(uuid);
  }

  async findTemplateByEuid(euid: string): Promise<Template | undefined> {
    return findByEuid(this.state.templates, euid);
  }

  async listTemplates(filter: TemplateFilter = {}, opts?: StoreReadOptions): Promise<Page<Template>> {
    return paginate(this.state.templates.values(), filter, opts);
  }

  private checkTemplate(row: Template): void {
    for (const other of this.state.templates.values()) {
      if (other.uuid === row.uuid) continue;
      if (other.euid === row.euid) throw new StoreConstraintViolation(CONSTRAINTS.templateEuid, row.euid);
      if (sameTypeKey(other, row)) throw new StoreConstraintViolation(CONSTRAINTS.templateKey, row.euid);
    }
  }

  // ---- Instances ----

  async insertInstance(row: NewInstance): Promise<Instance> {
    const now = new Date();
    const instance: Instance = { ...row, uuid: randomUUID(), isDeleted: false, createdDt: now, modifiedDt: now };
    if (!this.state.templates.has(instance.templateUuid)) {
      throw new StoreConstraintViolation(CONSTRAINTS.instanceTemplate, instance.templateUuid);
    }
    this.checkInstance(instance);
    this.state.instances.set(instance.uuid, instance);
    return instance;
  }

  async updateInstance(uuid: string, patch: InstancePatch): Promise<Instance> {
    const existing = requireRow(this.state.instances, uuid, "generic_instance");
    const updated: Instance = { ...existing, ...patch, modifiedDt: new Date() };
    this.checkInstance(updated);
    this.state.instances.set(uuid, updated);
    return updated;
  }

  async getInstance(uuid: string): Promise<Instance | undefined> {
    return this.state.instances.get(uuid);
  }

  async findInstanceByEuid(euid: string): Promise<Instance | undefined> {
    return findByEuid(this.state.instances, euid);
  }

  async listInstances(filter: InstanceFilter = {}, opts?: StoreReadOptions): Promise<Page<Instance>> {
    return paginate(this.state.instances.values(), filter, opts);
  }

  private checkInstance(row: Instance): void {
    for (const other of this.state.instances.values()) {
      if (other.uuid === row.uuid) continue;
      if (other.euid === row.euid) throw new StoreConstraintViolation(CONSTRAINTS.instanceEuid, row.euid);
      const bothLiveSingletons = row.isSingleton && !row.isDeleted && other.isSingleton && !other.isDeleted;
      if (bothLiveSingletons && sameTypeKey(other, row)) {
        throw new StoreConstraintViolation(CONSTRAINTS.instanceSingleton, row.euid);
      }
    }
  }

  // ---- Lineage ----

  async insertLineage(row: NewLineage): Promise<Lineage> {
    const now = new Date();
    const lineage: Lineage = { ...row, uuid: randomUUID(), isDeleted: false, createdDt: now, modifiedDt: now };
    const ends = [
      [CONSTRAINTS.lineageParent, lineage.parentInstanceUuid],
      [CONSTRAINTS.lineageChild, lineage.childInstanceUuid],
    ] as const;
    for (const [constraint, end] of ends) {
      if (!this.state.instances.has(end)) throw new StoreConstraintViolation(constraint, end);
    }
    this.checkLineage(lineage);
    this.state.lineages.set(lineage.uuid, lineage);
    return lineage;
  }

  async updateLineage(uuid: string, patch: LineagePatch): Promise<Lineage> {
    const existing = requireRow(this.state.lineages, uuid, "generic_instance_lineage");
    const updated: Lineage = { ...existing, ...patch, modifiedDt: new Date() };
    this.checkLineage(updated);
    this.state.lineages.set(uuid, updated);
    return updated;
  }

  async getLineage(uuid: string): Promise<Lineage | undefined> {
    return this.state.lineages.get(uuid);
  }

  async findLineageByEuid(euid: string): Promise<Lineage | undefined> {
    return findByEuid(this.state.lineages, euid);
  }

  async listLineages(filter: LineageFilter = {}, opts?: StoreReadOptions): Promise<Page<Lineage>> {
    return paginate(this.state.lineages.values(), filter, opts);
  }

  private checkLineage(row: Lineage): void {
    for (const other of this.state.lineages.values()) {
      if (other.uuid === row.uuid) continue;
      if (other.euid === row.euid) throw new StoreConstraintViolation(CONSTRAINTS.lineageEuid, row.euid);
      const sameEdge =
        other.parentInstanceUuid === row.parentInstanceUuid &&
        other.childInstanceUuid === row.childInstanceUuid &&
        other.relationshipType === row.relationshipType;
      if (sameEdge && !other.isDeleted && !row.isDeleted) {
        throw new StoreConstraintViolation(CONSTRAINTS.lineageEdge, row.euid);
      }
    }
  }

  // ---- Audit ----

  async insertAuditEntry(entry: NewAuditEntry): Promise<AuditEntry> {
    const row: AuditEntry = { ...entry, uuid: randomUUID(), changedAt: new Date() };
    this.state.audit.push(row);
    return row;
  }

  async listAuditEntries(filter: AuditFilter): Promise<AuditEntry[]> {
    return this.state.audit.filter((e) => matches(e, filter));
  }
}

/**
 * Process-local ObjectStore for tests and development.
 *
 * Transactions run one at a time against a copy of the committed state and
 * replace it on success. Counters live outside the transactional state, so a
 * rolled-back transaction never gives its identifiers back.
 */
export class InMemoryObjectStore implements ObjectStore {
  private state: MemoryState = emptyState();
  private readonly counters = new Map<string, number>();
  private tail: Promise<void> = Promise.resolve();

  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const session = new InMemorySession(cloneState(this.state), this.counters);
      const result = await work(session);
      this.state = session.currentState();
      return result;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  counterValue(prefix: string): number | undefined {
    return this.counters.get(prefix);
  }
}
