import type { AuditEntry, Instance, InstancePatch, Lineage, Template } from "@shared/schema";
import type { AuditRecorder } from "../../../audit";
import type { InstanceFilter, LineageFilter, Page, StoreReadOptions, StoreSession, TemplateFilter } from "../../store";
import { ObjectNotFound, ObjectValidationError } from "../errors";
import { deepMerge } from "../InstanceFactory";
import type { ObjectService, InstanceUpdate } from "../ObjectService";
import type { PayloadValidator } from "../PayloadValidator";
import type { PersistenceBoundary } from "../PersistenceBoundary";
import type { ObjectRecord, PagedResult, ReadOptions, UnitOfWork } from "../types";

export const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 1000;

function toStoreReadOpts(opts: ReadOptions = {}): { page: number; pageSize: number; store: StoreReadOptions } {
  const page = opts.page != null && opts.page >= 1 ? Math.floor(opts.page) : 1;
  const pageSize = opts.pageSize != null && opts.pageSize >= 1 ? Math.min(Math.floor(opts.pageSize), MAX_PAGE_SIZE) : DEFAULT_PAGE_SIZE;
  return {
    page,
    pageSize,
    store: { limit: pageSize, offset: (page - 1) * pageSize, includeDeleted: opts.includeDeleted },
  };
}

async function paged<T>(opts: ReadOptions | undefined, read: (store: StoreReadOptions) => Promise<Page<T>>): Promise<PagedResult<T>> {
  const { page, pageSize, store } = toStoreReadOpts(opts);
  const result = await read(store);
  return { items: result.items, total: result.total, page, pageSize };
}

/**
 * ObjectService backed by an ObjectStore session. Writes go through the
 * persistence boundary so they are audited like every other mutation.
 */
export class StoreBackedObjectService implements ObjectService {
  constructor(
    private readonly boundary: PersistenceBoundary,
    private readonly recorder: AuditRecorder,
    private readonly validator: PayloadValidator,
  ) {}

  async getByEuid(session: StoreSession, euid: string): Promise<ObjectRecord> {
    const instance = await session.findInstanceByEuid(euid);
    if (instance) return { kind: "instance", row: instance };
    const template = await session.findTemplateByEuid(euid);
    if (template) return { kind: "template", row: template };
    const lineage = await session.findLineageByEuid(euid);
    if (lineage) return { kind: "lineage", row: lineage };
    throw new ObjectNotFound(euid);
  }

  async listTemplates(session: StoreSession, filter?: TemplateFilter, opts?: ReadOptions): Promise<PagedResult<Template>> {
    return paged(opts, (store) => session.listTemplates(filter, store));
  }

  async listInstances(session: StoreSession, filter?: InstanceFilter, opts?: ReadOptions): Promise<PagedResult<Instance>> {
    return paged(opts, (store) => session.listInstances(filter, store));
  }

  async listLineages(session: StoreSession, filter?: LineageFilter, opts?: ReadOptions): Promise<PagedResult<Lineage>> {
    return paged(opts, (store) => session.listLineages(filter, store));
  }

  async updateInstance(uow: UnitOfWork, euid: string, update: InstanceUpdate): Promise<Instance> {
    const instance = await uow.session.findInstanceByEuid(euid);
    if (!instance || instance.isDeleted) throw new ObjectNotFound(euid);

    const patch: InstancePatch = {};
    if (update.name !== undefined) {
      if (update.name.trim() === "") throw new ObjectValidationError("name must not be empty");
      patch.name = update.name;
    }
    if (update.status !== undefined) {
      if (update.status.trim() === "") throw new ObjectValidationError("status must not be empty");
      patch.status = update.status;
    }
    if (update.properties !== undefined) {
      const properties = deepMerge(instance.properties, update.properties);
      const template = await uow.session.getTemplate(instance.templateUuid);
      if (template) this.validator.validate(template, properties);
      patch.properties = properties;
    }

    return this.boundary.updateInstance(uow, instance, patch);
  }

  async softDelete(uow: UnitOfWork, euid: string): Promise<ObjectRecord> {
    const record = await this.getByEuid(uow.session, euid);
    if (record.row.isDeleted) throw new ObjectNotFound(euid);
    return this.boundary.softDelete(uow, record);
  }

  async history(session: StoreSession, euid: string): Promise<AuditEntry[]> {
    await this.getByEuid(session, euid);
    return this.recorder.history(session, euid);
  }
}
