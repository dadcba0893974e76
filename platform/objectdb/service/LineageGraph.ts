import type { Instance, Lineage } from "@shared/schema";
import { readAllPages, type StoreSession } from "../store";
import { toAuditText } from "../../audit";
import { ObjectNotFound, ObjectValidationError } from "./errors";
import { colorForCategory } from "./kinds";
import type { PersistenceBoundary } from "./PersistenceBoundary";
import type { UnitOfWork } from "./types";

export type LineageDirection = "children" | "parents";

const ATTRIBUTE_CRITERIA = ["category", "type", "subtype", "status", "polymorphicDiscriminator", "name"] as const;

type AttributeCriterion = (typeof ATTRIBUTE_CRITERIA)[number];

export type MemberCriteria = Readonly<Partial<Record<AttributeCriterion, string>>> &
  Readonly<{ properties?: Readonly<Record<string, unknown>> }>;

export type GraphNode = Readonly<{
  id: string;
  name: string;
  category: string;
  type: string;
  subtype: string;
  status: string;
  color: string;
}>;

export type GraphEdge = Readonly<{
  id: string;
  source: string;
  target: string;
  relationshipType: string;
}>;

export type GraphExport = Readonly<{
  nodes: GraphNode[];
  edges: GraphEdge[];
}>;

export type ExportOptions = Readonly<{
  startEuid?: string;
  depth?: number;
}>;

export const EXPORT_NODE_LIMIT = 200;
export const EXPORT_EDGE_LIMIT = 500;
const DEFAULT_EXPORT_DEPTH = 4;

function toNode(instance: Instance): GraphNode {
  return {
    id: instance.euid,
    name: instance.name,
    category: instance.category,
    type: instance.type,
    subtype: instance.subtype,
    status: instance.status,
    color: colorForCategory(instance.category),
  };
}

// Edges point from child to parent.
function toEdge(lineage: Lineage, parentEuid: string, childEuid: string): GraphEdge {
  return { id: lineage.euid, source: childEuid, target: parentEuid, relationshipType: lineage.relationshipType };
}

function matchesCriteria(instance: Instance, criteria: MemberCriteria): boolean {
  for (const attr of ATTRIBUTE_CRITERIA) {
    const expected = criteria[attr];
    if (expected !== undefined && instance[attr] !== expected) return false;
  }
  for (const [key, expected] of Object.entries(criteria.properties ?? {})) {
    if (toAuditText(instance.properties[key]) !== toAuditText(expected)) return false;
  }
  return true;
}

function hasCriteria(criteria: MemberCriteria): boolean {
  return ATTRIBUTE_CRITERIA.some((a) => criteria[a] !== undefined) || Object.keys(criteria.properties ?? {}).length > 0;
}

/**
 * Navigation over live lineage edges. Writes go through the boundary; reads
 * use the session directly and skip soft-deleted edges and instances.
 */
export class LineageGraph {
  constructor(private readonly boundary: PersistenceBoundary) {}

  async edgesOf(
    session: StoreSession,
    instance: Instance,
    direction: LineageDirection,
    relationshipType?: string,
  ): Promise<readonly Lineage[]> {
    const filter =
      direction === "children"
        ? { parentInstanceUuid: instance.uuid, relationshipType }
        : { childInstanceUuid: instance.uuid, relationshipType };
    return readAllPages((opts) => session.listLineages(filter, opts));
  }

  async childrenOf(session: StoreSession, instance: Instance, relationshipType?: string): Promise<Instance[]> {
    return this.neighbours(session, instance, "children", relationshipType);
  }

  async parentsOf(session: StoreSession, instance: Instance, relationshipType?: string): Promise<Instance[]> {
    return this.neighbours(session, instance, "parents", relationshipType);
  }

  async filterMembers(
    session: StoreSession,
    instance: Instance,
    direction: LineageDirection,
    criteria: MemberCriteria,
  ): Promise<Instance[]> {
    if (!hasCriteria(criteria)) {
      throw new ObjectValidationError("filterMembers needs at least one criterion");
    }
    const members = await this.neighbours(session, instance, direction);
    return members.filter((m) => matchesCriteria(m, criteria));
  }

  async softDeleteEdge(uow: UnitOfWork, edge: Lineage): Promise<Lineage> {
    if (edge.isDeleted) throw new ObjectNotFound(edge.euid);
    return this.boundary.softDeleteLineage(uow, edge);
  }

  /**
   * Breadth-first export around a start instance, up to `depth` hops in both
   * directions. Without a start, returns the first live instances and edges.
   */
  async exportGraph(session: StoreSession, opts: ExportOptions = {}): Promise<GraphExport> {
    if (!opts.startEuid) return this.exportAll(session);

    const start = await session.findInstanceByEuid(opts.startEuid);
    if (!start || start.isDeleted) throw new ObjectNotFound(opts.startEuid);

    const depth = Math.max(0, opts.depth ?? DEFAULT_EXPORT_DEPTH);
    const nodes = new Map<string, GraphNode>([[start.uuid, toNode(start)]]);
    const edges = new Map<string, GraphEdge>();
    let frontier: Instance[] = [start];

    for (let hop = 0; hop < depth && frontier.length > 0; hop++) {
      const next: Instance[] = [];
      for (const current of frontier) {
        for (const direction of ["children", "parents"] as const) {
          for (const edge of await this.edgesOf(session, current, direction)) {
            const otherUuid = direction === "children" ? edge.childInstanceUuid : edge.parentInstanceUuid;
            const other = await session.getInstance(otherUuid);
            if (!other || other.isDeleted) continue;

            const [parent, child] = direction === "children" ? [current, other] : [other, current];
            edges.set(edge.uuid, toEdge(edge, parent.euid, child.euid));
            if (!nodes.has(other.uuid)) {
              nodes.set(other.uuid, toNode(other));
              next.push(other);
            }
          }
        }
      }
      frontier = next;
    }

    return { nodes: [...nodes.values()], edges: [...edges.values()] };
  }

  private async exportAll(session: StoreSession): Promise<GraphExport> {
    const instances = await session.listInstances({}, { limit: EXPORT_NODE_LIMIT });
    const byUuid = new Map(instances.items.map((i): [string, Instance] => [i.uuid, i]));
    const lineages = await session.listLineages({}, { limit: EXPORT_EDGE_LIMIT });

    const edges: GraphEdge[] = [];
    for (const edge of lineages.items) {
      const parent = byUuid.get(edge.parentInstanceUuid);
      const child = byUuid.get(edge.childInstanceUuid);
      if (parent && child) edges.push(toEdge(edge, parent.euid, child.euid));
    }
    return { nodes: instances.items.map(toNode), edges };
  }

  private async neighbours(
    session: StoreSession,
    instance: Instance,
    direction: LineageDirection,
    relationshipType?: string,
  ): Promise<Instance[]> {
    const out: Instance[] = [];
    for (const edge of await this.edgesOf(session, instance, direction, relationshipType)) {
      const other = await session.getInstance(direction === "children" ? edge.childInstanceUuid : edge.parentInstanceUuid);
      if (other && !other.isDeleted) out.push(other);
    }
    return out;
  }
}
