import type { AuditEntry, Instance, Lineage, Template } from "@shared/schema";
import type { InstanceFilter, LineageFilter, StoreSession, TemplateFilter } from "../store";
import type { ObjectRecord, PagedResult, ReadOptions, UnitOfWork } from "./types";

export type InstanceUpdate = Readonly<{
  name?: string;
  status?: string;
  /** Deep-merged into the current properties, then validated against the template. */
  properties?: Record<string, unknown>;
}>;

/**
 * ObjectService is the read/admin surface over stored objects.
 *
 * Rules:
 * - Lookups by euid find any object kind, deleted or not
 * - Lists exclude soft-deleted rows unless includeDeleted is set
 * - Every write takes a UnitOfWork and is audited
 */
export interface ObjectService {
  getByEuid(session: StoreSession, euid: string): Promise<ObjectRecord>;

  listTemplates(session: StoreSession, filter?: TemplateFilter, opts?: ReadOptions): Promise<PagedResult<Template>>;

  listInstances(session: StoreSession, filter?: InstanceFilter, opts?: ReadOptions): Promise<PagedResult<Instance>>;

  listLineages(session: StoreSession, filter?: LineageFilter, opts?: ReadOptions): Promise<PagedResult<Lineage>>;

  updateInstance(uow: UnitOfWork, euid: string, update: InstanceUpdate): Promise<Instance>;

  softDelete(uow: UnitOfWork, euid: string): Promise<ObjectRecord>;

  history(session: StoreSession, euid: string): Promise<AuditEntry[]>;
}
