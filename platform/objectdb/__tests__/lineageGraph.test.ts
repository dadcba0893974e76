import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Instance } from "@shared/schema";
import type { ObjectEngine } from "../core/ObjectEngine";
import { ObjectNotFound, ObjectValidationError } from "../service/errors";
import { TEST_ACTOR, seededEngine, templateDoc } from "./fixtures";

const PLATE = "container/plate/p1/1.0";
const WELL = "container/well/w1/1.0";
const SAMPLE = "content/sample/s1/1.0";

const templates = [
  templateDoc(PLATE, "CX", {
    payload: { instantiation_layouts: [{ child_templates: [{ template_code: WELL, count: 2 }] }] },
  }),
  templateDoc(WELL, "CX", { payload: { properties: { position: "A1" } } }),
  templateDoc(SAMPLE, "MX"),
];

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

/** Plate CX-19 holding wells CX-27 and CX-35; sample MX-1R placed in the first well. */
async function buildGraph(engine: ObjectEngine) {
  return engine.run(TEST_ACTOR, async (uow) => {
    const plate = await engine.factory.createInstance(uow, PLATE, "PL1");
    const [wellA, wellB] = await engine.lineage.childrenOf(uow.session, plate);
    const sample = await engine.factory.createInstance(uow, SAMPLE, "S1");
    await engine.factory.linkInstances(uow, wellA, sample, "contains");
    await engine.boundary.updateInstance(uow, wellB, { properties: { position: "A2" }, status: "in_use" });
    return { plate, wellA, sample };
  });
}

const euids = (instances: Instance[]) => instances.map((i) => i.euid);

describe("LineageGraph", () => {
  it("lists children and parents over live edges", async () => {
    const { engine } = await seededEngine(templates);
    const { plate, wellA, sample } = await buildGraph(engine);

    const [children, parentsOfSample, parentsOfWell] = await engine.read(async (s) => [
      await engine.lineage.childrenOf(s, plate),
      await engine.lineage.parentsOf(s, sample),
      await engine.lineage.parentsOf(s, wellA),
    ]);

    expect(euids(children)).toEqual(["CX-27", "CX-35"]);
    expect(euids(parentsOfSample)).toEqual(["CX-27"]);
    expect(euids(parentsOfWell)).toEqual(["CX-19"]);
  });

  it("filters neighbours by relationship type", async () => {
    const { engine } = await seededEngine(templates);
    const { plate } = await buildGraph(engine);

    const none = await engine.read((s) => engine.lineage.childrenOf(s, plate, "derived_from"));
    expect(none).toEqual([]);
  });

  it("filters members by attributes and property values", async () => {
    const { engine } = await seededEngine(templates);
    const { plate } = await buildGraph(engine);

    const [byStatus, byProperty, bySubtype] = await engine.read(async (s) => [
      await engine.lineage.filterMembers(s, plate, "children", { status: "in_use" }),
      await engine.lineage.filterMembers(s, plate, "children", { properties: { position: "A1" } }),
      await engine.lineage.filterMembers(s, plate, "children", { subtype: "w1", name: "PL1_w1_2" }),
    ]);

    expect(euids(byStatus)).toEqual(["CX-35"]);
    expect(euids(byProperty)).toEqual(["CX-27"]);
    expect(euids(bySubtype)).toEqual(["CX-35"]);
  });

  it("reads every edge when an instance has more neighbours than one store page", async () => {
    const rack = templateDoc("container/rack/r1/1.0", "CX", {
      payload: { instantiation_layouts: [{ child_templates: [{ template_code: WELL, count: 1001 }] }] },
    });
    const { engine } = await seededEngine([...templates, rack]);

    const { children, last } = await engine.run(TEST_ACTOR, async (uow) => {
      const instance = await engine.factory.createInstance(uow, "container/rack/r1/1.0", "R1");
      return {
        children: await engine.lineage.childrenOf(uow.session, instance),
        last: await engine.lineage.filterMembers(uow.session, instance, "children", { name: "R1_w1_1001" }),
      };
    });

    expect(children).toHaveLength(1001);
    expect(new Set(euids(children)).size).toBe(1001);
    expect(last).toHaveLength(1);
  }, 30_000);

  it("rejects empty member criteria", async () => {
    const { engine } = await seededEngine(templates);
    const { plate } = await buildGraph(engine);

    await expect(engine.read((s) => engine.lineage.filterMembers(s, plate, "children", {}))).rejects.toThrow(
      ObjectValidationError,
    );
  });

  it("hides a soft-deleted edge from navigation", async () => {
    const { engine } = await seededEngine(templates);
    const { wellA, sample } = await buildGraph(engine);

    const remaining = await engine.run(TEST_ACTOR, async (uow) => {
      const [edge] = await engine.lineage.edgesOf(uow.session, wellA, "children");
      await engine.lineage.softDeleteEdge(uow, edge);
      await expect(engine.lineage.softDeleteEdge(uow, { ...edge, isDeleted: true })).rejects.toThrow(ObjectNotFound);
      return engine.lineage.parentsOf(uow.session, sample);
    });

    expect(remaining).toEqual([]);
  });

  describe("exportGraph", () => {
    it("walks both directions up to the requested depth, with edges pointing from child to parent", async () => {
      const { engine } = await seededEngine(templates);
      await buildGraph(engine);

      const graph = await engine.read((s) => engine.lineage.exportGraph(s, { startEuid: "CX-27", depth: 1 }));

      expect(graph.nodes.map((n) => n.id)).toEqual(["CX-27", "MX-1R", "CX-19"]);
      expect(graph.edges).toEqual([
        { id: "GN-34", source: "MX-1R", target: "CX-27", relationshipType: "contains" },
        { id: "GN-18", source: "CX-27", target: "CX-19", relationshipType: "contains" },
      ]);
      expect(graph.nodes[0]).toEqual({
        id: "CX-27",
        name: "PL1_w1_1",
        category: "container",
        type: "well",
        subtype: "w1",
        status: "created",
        color: "#8B00FF",
      });
    });

    it("returns only the start node at depth zero", async () => {
      const { engine } = await seededEngine(templates);
      await buildGraph(engine);

      const graph = await engine.read((s) => engine.lineage.exportGraph(s, { startEuid: "CX-19", depth: 0 }));

      expect(graph).toEqual({
        nodes: [expect.objectContaining({ id: "CX-19" })],
        edges: [],
      });
    });

    it("terminates on cycles", async () => {
      const { engine } = await seededEngine(templates);
      await engine.run(TEST_ACTOR, async (uow) => {
        const a = await engine.factory.createInstance(uow, SAMPLE, "A");
        const b = await engine.factory.createInstance(uow, SAMPLE, "B");
        await engine.factory.linkInstances(uow, a, b);
        await engine.factory.linkInstances(uow, b, a);
      });

      const graph = await engine.read((s) => engine.lineage.exportGraph(s, { startEuid: "MX-1R", depth: 10 }));

      expect(graph.nodes.map((n) => n.id)).toEqual(["MX-1R", "MX-2P"]);
      expect(graph.edges).toHaveLength(2);
    });

    it("exports every live instance and edge without a start", async () => {
      const { engine } = await seededEngine(templates);
      await buildGraph(engine);

      const graph = await engine.read((s) => engine.lineage.exportGraph(s));

      expect(graph.nodes.map((n) => n.id)).toEqual(["CX-19", "CX-27", "CX-35", "MX-1R"]);
      expect(graph.edges.map((e) => e.id)).toEqual(["GN-18", "GN-26", "GN-34"]);
    });

    it("fails for an unknown start", async () => {
      const { engine } = await seededEngine(templates);

      await expect(engine.read((s) => engine.lineage.exportGraph(s, { startEuid: "CX-19" }))).rejects.toThrow(
        ObjectNotFound,
      );
    });
  });
});
