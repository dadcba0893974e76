import type { Instance, Lineage, Template } from "@shared/schema";
import type { StoreSession } from "../store";

export type OpaqueId = string;

export type ActorContext = Readonly<{
  actorId: OpaqueId;
  actorType: "user" | "system" | "agent";
}>;

export const SYSTEM_ACTOR: ActorContext = { actorId: "system", actorType: "system" };

/**
 * The handle every write travels with: the open store session and the actor
 * audit entries are attributed to.
 */
export type UnitOfWork = Readonly<{
  session: StoreSession;
  actor: ActorContext;
}>;

export type ObjectRecord =
  | Readonly<{ kind: "template"; row: Template }>
  | Readonly<{ kind: "instance"; row: Instance }>
  | Readonly<{ kind: "lineage"; row: Lineage }>;

export type ReadOptions = Readonly<{
  page?: number;
  pageSize?: number;
  includeDeleted?: boolean;
}>;

export type PagedResult<T> = Readonly<{
  items: readonly T[];
  total: number;
  page: number;
  pageSize: number;
}>;
