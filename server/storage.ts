import { and, asc, count, eq, sql, type SQL } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import pg from "pg";
import {
  auditLog,
  genericInstance,
  genericInstanceLineage,
  genericTemplate,
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
import type * as schema from "@shared/schema";
import {
  StoreConstraintViolation,
  StoreCounterMissing,
  clampLimit,
  clampOffset,
  normalizePrefix,
  type AuditFilter,
  type InstanceFilter,
  type LineageFilter,
  type ObjectStore,
  type Page,
  type StoreReadOptions,
  type StoreSession,
  type TemplateFilter,
  type TypeKeyFilter,
} from "../platform/objectdb";

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const PG_UNIQUE_VIOLATION = "23505";
const PG_FOREIGN_KEY_VIOLATION = "23503";
const PG_UNDEFINED_TABLE = "42P01";

function sequenceName(prefix: string): string {
  return `euid_seq_${normalizePrefix(prefix).toLowerCase()}`;
}

function translatePgError(err: unknown): never {
  if (err instanceof pg.DatabaseError && err.constraint) {
    if (err.code === PG_UNIQUE_VIOLATION || err.code === PG_FOREIGN_KEY_VIOLATION) {
      throw new StoreConstraintViolation(err.constraint, err.detail);
    }
  }
  throw err;
}

async function guarded<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    translatePgError(err);
  }
}

type KeyedTable = typeof genericTemplate | typeof genericInstance;

function typeKeyConditions(table: KeyedTable, filter: TypeKeyFilter): Array<SQL | undefined> {
  return [
    filter.category !== undefined ? eq(table.category, filter.category) : undefined,
    filter.type !== undefined ? eq(table.type, filter.type) : undefined,
    filter.subtype !== undefined ? eq(table.subtype, filter.subtype) : undefined,
    filter.version !== undefined ? eq(table.version, filter.version) : undefined,
    filter.polymorphicDiscriminator !== undefined
      ? eq(table.polymorphicDiscriminator, filter.polymorphicDiscriminator)
      : undefined,
    filter.status !== undefined ? eq(table.status, filter.status) : undefined,
  ];
}

function liveOnly(column: typeof genericTemplate.isDeleted | typeof genericInstance.isDeleted | typeof genericInstanceLineage.isDeleted, opts?: StoreReadOptions) {
  return opts?.includeDeleted ? undefined : eq(column, false);
}

class DrizzleSession implements StoreSession {
  constructor(private readonly db: Executor) {}

  async savepoint<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleSession(tx)));
  }

  // ---- Counters ----

  async ensureCounter(prefix: string): Promise<void> {
    await this.db.execute(sql.raw(`CREATE SEQUENCE IF NOT EXISTS ${sequenceName(prefix)}`));
  }

  async nextCounterValue(prefix: string): Promise<number> {
    try {
      const result = await this.db.execute<{ value: string }>(sql`SELECT nextval(${sequenceName(prefix)}) AS value`);
      return Number(result.rows[0].value);
    } catch (err) {
      if (err instanceof pg.DatabaseError && err.code === PG_UNDEFINED_TABLE) {
        throw new StoreCounterMissing(prefix);
      }
      throw err;
    }
  }

  // ---- Templates ----

  async insertTemplate(row: NewTemplate): Promise<Template> {
    const [template] = await guarded(() => this.db.insert(genericTemplate).values(row).returning());
    return template;
  }

  async updateTemplate(uuid: string, patch: TemplatePatch): Promise<Template> {
    const [template] = await guarded(() =>
      this.db
        .update(genericTemplate)
        .set({ ...patch, modifiedDt: new Date() })
        .where(eq(genericTemplate.uuid, uuid))
        .returning(),
    );
    return template;
  }

  async getTemplate(uuid: string): Promise<Template | undefined> {
    const [template] = await this.db.select().from(genericTemplate).where(eq(genericTemplate.uuid, uuid));
    return template;
  }

  async findTemplateByEuid(euid: string): Promise<Template | undefined> {
    const [template] = await this.db.select().from(genericTemplate).where(eq(genericTemplate.euid, euid));
    return template;
  }

  async listTemplates(filter: TemplateFilter = {}, opts?: StoreReadOptions): Promise<Page<Template>> {
    const where = and(
      ...typeKeyConditions(genericTemplate, filter),
      filter.instancePrefix !== undefined ? eq(genericTemplate.instancePrefix, filter.instancePrefix) : undefined,
      liveOnly(genericTemplate.isDeleted, opts),
    );
    const items = await this.db
      .select()
      .from(genericTemplate)
      .where(where)
      .orderBy(asc(genericTemplate.createdDt), asc(genericTemplate.euid))
      .limit(clampLimit(opts?.limit))
      .offset(clampOffset(opts?.offset));
    const [{ total }] = await this.db.select({ total: count() }).from(genericTemplate).where(where);
    return { items, total };
  }

  // ---- Instances ----

  async insertInstance(row: NewInstance): Promise<Instance> {
    const [instance] = await guarded(() => this.db.insert(genericInstance).values(row).returning());
    return instance;
  }

  async updateInstance(uuid: string, patch: InstancePatch): Promise<Instance> {
    const [instance] = await guarded(() =>
      this.db
        .update(genericInstance)
        .set({ ...patch, modifiedDt: new Date() })
        .where(eq(genericInstance.uuid, uuid))
        .returning(),
    );
    return instance;
  }

  async getInstance(uuid: string): Promise<Instance | undefined> {
    const [instance] = await this.db.select().from(genericInstance).where(eq(genericInstance.uuid, uuid));
    return instance;
  }

  async findInstanceByEuid(euid: string): Promise<Instance | undefined> {
    const [instance] = await this.db.select().from(genericInstance).where(eq(genericInstance.euid, euid));
    return instance;
  }

  async listInstances(filter: InstanceFilter = {}, opts?: StoreReadOptions): Promise<Page<Instance>> {
    const where = and(
      ...typeKeyConditions(genericInstance, filter),
      filter.templateUuid !== undefined ? eq(genericInstance.templateUuid, filter.templateUuid) : undefined,
      filter.isSingleton !== undefined ? eq(genericInstance.isSingleton, filter.isSingleton) : undefined,
      filter.name !== undefined ? eq(genericInstance.name, filter.name) : undefined,
      liveOnly(genericInstance.isDeleted, opts),
    );
    const items = await this.db
      .select()
      .from(genericInstance)
      .where(where)
      .orderBy(asc(genericInstance.createdDt), asc(genericInstance.euid))
      .limit(clampLimit(opts?.limit))
      .offset(clampOffset(opts?.offset));
    const [{ total }] = await this.db.select({ total: count() }).from(genericInstance).where(where);
    return { items, total };
  }

  // ---- Lineage ----

  async insertLineage(row: NewLineage): Promise<Lineage> {
    const [lineage] = await guarded(() => this.db.insert(genericInstanceLineage).values(row).returning());
    return lineage;
  }

  async updateLineage(uuid: string, patch: LineagePatch): Promise<Lineage> {
    const [lineage] = await guarded(() =>
      this.db
        .update(genericInstanceLineage)
        .set({ ...patch, modifiedDt: new Date() })
        .where(eq(genericInstanceLineage.uuid, uuid))
        .returning(),
    );
    return lineage;
  }

  async getLineage(uuid: string): Promise<Lineage | undefined> {
    const [lineage] = await this.db.select().from(genericInstanceLineage).where(eq(genericInstanceLineage.uuid, uuid));
    return lineage;
  }

  async findLineageByEuid(euid: string): Promise<Lineage | undefined> {
    const [lineage] = await this.db.select().from(genericInstanceLineage).where(eq(genericInstanceLineage.euid, euid));
    return lineage;
  }

  async listLineages(filter: LineageFilter = {}, opts?: StoreReadOptions): Promise<Page<Lineage>> {
    const t = genericInstanceLineage;
    const where = and(
      filter.parentInstanceUuid !== undefined ? eq(t.parentInstanceUuid, filter.parentInstanceUuid) : undefined,
      filter.childInstanceUuid !== undefined ? eq(t.childInstanceUuid, filter.childInstanceUuid) : undefined,
      filter.relationshipType !== undefined ? eq(t.relationshipType, filter.relationshipType) : undefined,
      filter.status !== undefined ? eq(t.status, filter.status) : undefined,
      liveOnly(t.isDeleted, opts),
    );
    const items = await this.db
      .select()
      .from(t)
      .where(where)
      .orderBy(asc(t.createdDt), asc(t.euid))
      .limit(clampLimit(opts?.limit))
      .offset(clampOffset(opts?.offset));
    const [{ total }] = await this.db.select({ total: count() }).from(t).where(where);
    return { items, total };
  }

  // ---- Audit ----

  async insertAuditEntry(entry: NewAuditEntry): Promise<AuditEntry> {
    const [created] = await this.db.insert(auditLog).values(entry).returning();
    return created;
  }

  async listAuditEntries(filter: AuditFilter): Promise<AuditEntry[]> {
    return this.db
      .select()
      .from(auditLog)
      .where(
        and(
          filter.relTableUuid !== undefined ? eq(auditLog.relTableUuid, filter.relTableUuid) : undefined,
          filter.relTableEuid !== undefined ? eq(auditLog.relTableEuid, filter.relTableEuid) : undefined,
        ),
      )
      .orderBy(asc(auditLog.changedAt));
  }
}

/**
 * ObjectStore over PostgreSQL. Each unit of work is one database
 * transaction; savepoints are nested drizzle transactions. Counters are
 * sequences, which PostgreSQL never rolls back.
 */
export class DrizzleObjectStore implements ObjectStore {
  constructor(private readonly db: Executor) {}

  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleSession(tx)));
  }
}
