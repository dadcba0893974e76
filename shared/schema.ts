import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, pgEnum, boolean, jsonb, unique, uniqueIndex, index, foreignKey } from "drizzle-orm/pg-core";

export const auditOperationEnum = pgEnum("audit_operation", [
  "INSERT",
  "UPDATE",
  "DELETE",
]);

// ---- Payload shapes ----

// Raw template payload, stored as read from configuration documents.
export type TemplatePayload = {
  properties?: Record<string, unknown>;
  action_imports?: Record<string, string>;
  instantiation_layouts?: unknown;
  default_status?: string;
  action_definition?: Record<string, unknown>;
  expected_inputs?: string[];
  expected_outputs?: string[];
  [key: string]: unknown;
};

export type MaterializedAction = {
  actionTemplateUuid: string;
  actionTemplateEuid: string;
  actionTemplateCode: string;
  actionExecuted: number;
  executedAt: string[];
  actionEnabled: boolean;
  [key: string]: unknown;
};

export type ActionGroups = Record<string, Record<string, MaterializedAction>>;

// Constraint names are shared with the in-memory store so both report violations the same way.
export const CONSTRAINTS = {
  templateKey: "uq_generic_template_key",
  templateEuid: "uq_generic_template_euid",
  instanceEuid: "uq_generic_instance_euid",
  instanceSingleton: "uq_generic_instance_singleton",
  instanceTemplate: "fk_generic_instance_template",
  lineageEuid: "uq_generic_instance_lineage_euid",
  lineageEdge: "uq_generic_instance_lineage_edge",
  lineageParent: "fk_generic_instance_lineage_parent",
  lineageChild: "fk_generic_instance_lineage_child",
} as const;

// ---- Tables ----

export const genericTemplate = pgTable("generic_template", {
  uuid: varchar("uuid").primaryKey().default(sql`gen_random_uuid()`),
  euid: text("euid").notNull(),
  name: text("name").notNull(),
  polymorphicDiscriminator: text("polymorphic_discriminator").notNull(),
  category: text("category").notNull(),
  type: text("type").notNull(),
  subtype: text("subtype").notNull(),
  version: text("version").notNull(),
  instancePrefix: text("instance_prefix").notNull(),
  instancePolymorphicIdentity: text("instance_polymorphic_identity"),
  payload: jsonb("payload").$type<TemplatePayload>().notNull().default({}),
  payloadSchema: jsonb("payload_schema").$type<Record<string, unknown>>(),
  status: text("status").notNull().default("active"),
  isSingleton: boolean("is_singleton").notNull().default(false),
  isDeleted: boolean("is_deleted").notNull().default(false),
  createdDt: timestamp("created_dt", { withTimezone: true }).defaultNow().notNull(),
  modifiedDt: timestamp("modified_dt", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  unique(CONSTRAINTS.templateEuid).on(table.euid),
  unique(CONSTRAINTS.templateKey).on(table.category, table.type, table.subtype, table.version),
]);

export const genericInstance = pgTable("generic_instance", {
  uuid: varchar("uuid").primaryKey().default(sql`gen_random_uuid()`),
  euid: text("euid").notNull(),
  name: text("name").notNull(),
  polymorphicDiscriminator: text("polymorphic_discriminator").notNull(),
  category: text("category").notNull(),
  type: text("type").notNull(),
  subtype: text("subtype").notNull(),
  version: text("version").notNull(),
  templateUuid: varchar("template_uuid").notNull(),
  properties: jsonb("properties").$type<Record<string, unknown>>().notNull().default({}),
  actionGroups: jsonb("action_groups").$type<ActionGroups>().notNull().default({}),
  status: text("status").notNull().default("active"),
  isSingleton: boolean("is_singleton").notNull().default(false),
  isDeleted: boolean("is_deleted").notNull().default(false),
  createdDt: timestamp("created_dt", { withTimezone: true }).defaultNow().notNull(),
  modifiedDt: timestamp("modified_dt", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  unique(CONSTRAINTS.instanceEuid).on(table.euid),
  uniqueIndex(CONSTRAINTS.instanceSingleton)
    .on(table.category, table.type, table.subtype, table.version)
    .where(sql`${table.isSingleton} AND NOT ${table.isDeleted}`),
  index("ix_generic_instance_template").on(table.templateUuid),
  foreignKey({
    name: CONSTRAINTS.instanceTemplate,
    columns: [table.templateUuid],
    foreignColumns: [genericTemplate.uuid],
  }),
]);

export const genericInstanceLineage = pgTable("generic_instance_lineage", {
  uuid: varchar("uuid").primaryKey().default(sql`gen_random_uuid()`),
  euid: text("euid").notNull(),
  name: text("name").notNull(),
  polymorphicDiscriminator: text("polymorphic_discriminator").notNull(),
  category: text("category").notNull(),
  type: text("type").notNull(),
  subtype: text("subtype").notNull(),
  version: text("version").notNull(),
  parentInstanceUuid: varchar("parent_instance_uuid").notNull(),
  childInstanceUuid: varchar("child_instance_uuid").notNull(),
  parentType: text("parent_type").notNull(),
  childType: text("child_type").notNull(),
  relationshipType: text("relationship_type").notNull(),
  properties: jsonb("properties").$type<Record<string, unknown>>().notNull().default({}),
  status: text("status").notNull().default("active"),
  isDeleted: boolean("is_deleted").notNull().default(false),
  createdDt: timestamp("created_dt", { withTimezone: true }).defaultNow().notNull(),
  modifiedDt: timestamp("modified_dt", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  unique(CONSTRAINTS.lineageEuid).on(table.euid),
  uniqueIndex(CONSTRAINTS.lineageEdge)
    .on(table.parentInstanceUuid, table.childInstanceUuid, table.relationshipType)
    .where(sql`NOT ${table.isDeleted}`),
  index("ix_generic_instance_lineage_parent").on(table.parentInstanceUuid),
  index("ix_generic_instance_lineage_child").on(table.childInstanceUuid),
  foreignKey({
    name: CONSTRAINTS.lineageParent,
    columns: [table.parentInstanceUuid],
    foreignColumns: [genericInstance.uuid],
  }),
  foreignKey({
    name: CONSTRAINTS.lineageChild,
    columns: [table.childInstanceUuid],
    foreignColumns: [genericInstance.uuid],
  }),
]);

export const auditLog = pgTable("audit_log", {
  uuid: varchar("uuid").primaryKey().default(sql`gen_random_uuid()`),
  relTableName: text("rel_table_name").notNull(),
  relTableUuid: varchar("rel_table_uuid").notNull(),
  relTableEuid: text("rel_table_euid").notNull(),
  columnName: text("column_name"),
  oldValue: text("old_value"),
  newValue: text("new_value"),
  changedBy: text("changed_by").notNull(),
  changedAt: timestamp("changed_at", { withTimezone: true }).defaultNow().notNull(),
  operationType: auditOperationEnum("operation_type").notNull(),
  deletedRecord: jsonb("deleted_record").$type<Record<string, unknown>>(),
}, (table) => [
  index("ix_audit_log_euid").on(table.relTableEuid),
  index("ix_audit_log_uuid").on(table.relTableUuid),
]);

// ---- Row types ----

export type Template = typeof genericTemplate.$inferSelect;
export type Instance = typeof genericInstance.$inferSelect;
export type Lineage = typeof genericInstanceLineage.$inferSelect;
export type AuditEntry = typeof auditLog.$inferSelect;
export type AuditOperation = (typeof auditOperationEnum.enumValues)[number];

// Rows handed to a store: everything except the columns the database fills in.
type GeneratedColumns = "uuid" | "isDeleted" | "createdDt" | "modifiedDt";
export type NewTemplate = Omit<Template, GeneratedColumns>;
export type NewInstance = Omit<Instance, GeneratedColumns>;
export type NewLineage = Omit<Lineage, GeneratedColumns>;
export type NewAuditEntry = Omit<AuditEntry, "uuid" | "changedAt">;

export type TemplatePatch = Partial<Omit<Template, "uuid" | "euid" | "createdDt" | "modifiedDt">>;
export type InstancePatch = Partial<Omit<Instance, "uuid" | "euid" | "templateUuid" | "createdDt" | "modifiedDt">>;
export type LineagePatch = Partial<Omit<Lineage, "uuid" | "euid" | "parentInstanceUuid" | "childInstanceUuid" | "createdDt" | "modifiedDt">>;

export const AUDITED_TABLES = {
  generic_template: genericTemplate,
  generic_instance: genericInstance,
  generic_instance_lineage: genericInstanceLineage,
} as const;

export type AuditedTableName = keyof typeof AUDITED_TABLES;
