import {
  CONSTRAINTS,
  type Instance,
  type InstancePatch,
  type Lineage,
  type LineagePatch,
  type NewInstance,
  type NewLineage,
  type NewTemplate,
  type Template,
  type TemplatePatch,
} from "@shared/schema";
import type { AuditRecorder } from "../../audit";
import type { EuidRegistry } from "../euid";
import { StoreConstraintViolation, StoreCounterMissing } from "../store/errors";
import {
  DuplicateEdge,
  IdentifierIntegrityError,
  SingletonConflict,
  TemplateIntegrityError,
} from "./errors";
import type { ObjectRecord, UnitOfWork } from "./types";

export type BoundaryHooks = Readonly<{
  onTemplateMutated?: () => void;
}>;

type TranslationContext = Readonly<{
  templateCode?: string;
  edge?: Readonly<{ parentEuid: string; childEuid: string; relationshipType: string }>;
}>;

function translateStoreError(err: unknown, ctx: TranslationContext = {}): never {
  if (err instanceof StoreCounterMissing) {
    throw new IdentifierIntegrityError(`No counter provisioned for prefix ${err.prefix}`);
  }
  if (err instanceof StoreConstraintViolation) {
    switch (err.constraint) {
      case CONSTRAINTS.instanceSingleton:
        throw new SingletonConflict(ctx.templateCode ?? "unknown template");
      case CONSTRAINTS.lineageEdge:
        if (ctx.edge) throw new DuplicateEdge(ctx.edge.parentEuid, ctx.edge.childEuid, ctx.edge.relationshipType);
        break;
      case CONSTRAINTS.templateKey:
        throw new TemplateIntegrityError(`A template with key ${ctx.templateCode ?? "?"} already exists`);
      case CONSTRAINTS.templateEuid:
      case CONSTRAINTS.instanceEuid:
      case CONSTRAINTS.lineageEuid:
        throw new IdentifierIntegrityError(err.message);
      case CONSTRAINTS.instanceTemplate:
      case CONSTRAINTS.lineageParent:
      case CONSTRAINTS.lineageChild:
        throw new TemplateIntegrityError(err.message);
    }
  }
  throw err instanceof Error ? err : new Error(String(err));
}

async function guarded<T>(work: () => Promise<T>, ctx?: TranslationContext): Promise<T> {
  try {
    return await work();
  } catch (err) {
    translateStoreError(err, ctx);
  }
}

/**
 * The only writer of templates, instances and lineage rows.
 *
 * Each write draws its euid from the registry and is audited in the same
 * unit of work. Storage constraint violations are rethrown as engine errors.
 */
export class PersistenceBoundary {
  constructor(
    private readonly registry: EuidRegistry,
    private readonly recorder: AuditRecorder,
    private readonly hooks: BoundaryHooks = {},
  ) {}

  // ---- Templates ----

  async insertTemplate(uow: UnitOfWork, row: Omit<NewTemplate, "euid">): Promise<Template> {
    const templateCode = `${row.category}/${row.type}/${row.subtype}/${row.version}`;
    const template = await guarded(async () => {
      const euid = await this.registry.generate(uow.session, "GT");
      return uow.session.insertTemplate({ ...row, euid });
    }, { templateCode });
    await this.recorder.recordInsert(uow.session, uow.actor.actorId, "generic_template", template);
    this.hooks.onTemplateMutated?.();
    return template;
  }

  async updateTemplate(uow: UnitOfWork, template: Template, patch: TemplatePatch): Promise<Template> {
    const templateCode = `${template.category}/${template.type}/${template.subtype}/${template.version}`;
    const updated = await guarded(() => uow.session.updateTemplate(template.uuid, patch), { templateCode });
    await this.recorder.recordUpdate(uow.session, uow.actor.actorId, "generic_template", template, updated);
    this.hooks.onTemplateMutated?.();
    return updated;
  }

  // ---- Instances ----

  async insertInstance(
    uow: UnitOfWork,
    row: Omit<NewInstance, "euid">,
    prefix: string,
    templateCode: string,
  ): Promise<Instance> {
    const instance = await guarded(async () => {
      const euid = await this.registry.generate(uow.session, prefix);
      return uow.session.insertInstance({ ...row, euid });
    }, { templateCode });
    await this.recorder.recordInsert(uow.session, uow.actor.actorId, "generic_instance", instance);
    return instance;
  }

  async updateInstance(uow: UnitOfWork, instance: Instance, patch: InstancePatch): Promise<Instance> {
    const templateCode = `${instance.category}/${instance.type}/${instance.subtype}/${instance.version}`;
    const updated = await guarded(() => uow.session.updateInstance(instance.uuid, patch), { templateCode });
    await this.recorder.recordUpdate(uow.session, uow.actor.actorId, "generic_instance", instance, updated);
    return updated;
  }

  // ---- Lineage ----

  async insertLineage(
    uow: UnitOfWork,
    row: Omit<NewLineage, "euid">,
    ends: Readonly<{ parentEuid: string; childEuid: string }>,
  ): Promise<Lineage> {
    const edge = { ...ends, relationshipType: row.relationshipType };
    const lineage = await guarded(async () => {
      const euid = await this.registry.generate(uow.session, "GN");
      return uow.session.insertLineage({ ...row, euid });
    }, { edge });
    await this.recorder.recordInsert(uow.session, uow.actor.actorId, "generic_instance_lineage", lineage);
    return lineage;
  }

  async updateLineage(uow: UnitOfWork, lineage: Lineage, patch: LineagePatch): Promise<Lineage> {
    const updated = await guarded(() => uow.session.updateLineage(lineage.uuid, patch));
    await this.recorder.recordUpdate(uow.session, uow.actor.actorId, "generic_instance_lineage", lineage, updated);
    return updated;
  }

  // ---- Soft delete ----

  /** Marks the row deleted and writes a single DELETE entry with its prior state. */
  async softDelete(uow: UnitOfWork, record: ObjectRecord): Promise<ObjectRecord> {
    switch (record.kind) {
      case "template":
        return { kind: "template", row: await this.softDeleteTemplate(uow, record.row) };
      case "instance":
        return { kind: "instance", row: await this.softDeleteInstance(uow, record.row) };
      case "lineage":
        return { kind: "lineage", row: await this.softDeleteLineage(uow, record.row) };
    }
  }

  async softDeleteTemplate(uow: UnitOfWork, template: Template): Promise<Template> {
    const row = await guarded(() => uow.session.updateTemplate(template.uuid, { isDeleted: true }));
    await this.recorder.recordDelete(uow.session, uow.actor.actorId, "generic_template", template);
    this.hooks.onTemplateMutated?.();
    return row;
  }

  async softDeleteInstance(uow: UnitOfWork, instance: Instance): Promise<Instance> {
    const row = await guarded(() => uow.session.updateInstance(instance.uuid, { isDeleted: true }));
    await this.recorder.recordDelete(uow.session, uow.actor.actorId, "generic_instance", instance);
    return row;
  }

  async softDeleteLineage(uow: UnitOfWork, lineage: Lineage): Promise<Lineage> {
    const row = await guarded(() => uow.session.updateLineage(lineage.uuid, { isDeleted: true }));
    await this.recorder.recordDelete(uow.session, uow.actor.actorId, "generic_instance_lineage", lineage);
    return row;
  }
}
