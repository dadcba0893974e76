import { describe, it, expect, vi } from "vitest";
import { TemplateNotFound } from "../service/errors";
import { normalizeTemplateCode, parseTemplateCode } from "../service/TemplateResolver";
import { SYSTEM_ACTOR } from "../service/types";
import { seededEngine, templateDoc } from "./fixtures";

const PLATE = "container/plate/fixed_plate_24/1.0";
const WELL = "container/well/standard/1.0";

describe("template codes", () => {
  it("allows a trailing slash", () => {
    expect(normalizeTemplateCode(" container/plate/p/1.0/ ")).toBe("container/plate/p/1.0");
    expect(parseTemplateCode("container/plate/p/1.0/")).toEqual({
      category: "container",
      type: "plate",
      subtype: "p",
      version: "1.0",
    });
  });

  it("rejects codes without four segments", () => {
    expect(parseTemplateCode("container/plate/p")).toBeUndefined();
    expect(parseTemplateCode("container//p/1.0")).toBeUndefined();
  });
});

describe("TemplateResolver", () => {
  it("resolves a code to the live template", async () => {
    const { engine } = await seededEngine([templateDoc(PLATE, "CX"), templateDoc(WELL, "CX")]);

    const template = await engine.read((s) => engine.resolver.resolve(s, `${PLATE}/`));

    expect(template.subtype).toBe("fixed_plate_24");
    expect(template.euid).toBe("GT-13");
  });

  it("throws TemplateNotFound for an unknown or malformed code", async () => {
    const { engine } = await seededEngine([templateDoc(PLATE, "CX")]);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    await expect(engine.read((s) => engine.resolver.resolve(s, "container/plate/missing/1.0"))).rejects.toThrow(
      TemplateNotFound,
    );
    await expect(engine.read((s) => engine.resolver.resolve(s, "container/plate"))).rejects.toThrow(TemplateNotFound);
    expect(warn).toHaveBeenCalledOnce();
    warn.mockRestore();
  });

  it("serves repeat lookups from the cache", async () => {
    const { engine } = await seededEngine([templateDoc(PLATE, "CX")]);

    await engine.read(async (session) => {
      const list = vi.spyOn(session, "listTemplates");
      await engine.resolver.resolve(session, PLATE);
      await engine.resolver.resolve(session, PLATE);
      expect(list).toHaveBeenCalledOnce();
    });
  });

  it("never serves a template deleted after it was cached", async () => {
    const { engine } = await seededEngine([templateDoc(PLATE, "CX")]);
    const template = await engine.read((s) => engine.resolver.resolve(s, PLATE));

    // Written straight to the store, so the cache is not invalidated.
    await engine.read((s) => s.updateTemplate(template.uuid, { isDeleted: true }));

    await expect(engine.read((s) => engine.resolver.resolve(s, PLATE))).rejects.toThrow(TemplateNotFound);
    await expect(engine.read((s) => engine.resolver.resolveByIdentifier(s, template.euid))).rejects.toThrow(
      TemplateNotFound,
    );
  });

  it("is invalidated by template writes through the boundary", async () => {
    const { engine } = await seededEngine([templateDoc(PLATE, "CX")]);
    const invalidate = vi.spyOn(engine.resolver, "invalidateCache");
    const template = await engine.read((s) => engine.resolver.resolve(s, PLATE));

    await engine.run(SYSTEM_ACTOR, (uow) => engine.boundary.softDeleteTemplate(uow, template));

    expect(invalidate).toHaveBeenCalledOnce();
  });

  it("resolves templates by identifier and uuid", async () => {
    const { engine } = await seededEngine([templateDoc(PLATE, "CX"), templateDoc(WELL, "CX")]);

    const [byEuid, byUuid] = await engine.read(async (s) => {
      const well = await engine.resolver.resolveByIdentifier(s, "GT-21");
      return [well, await engine.resolver.resolveByUuid(s, well.uuid)];
    });

    expect(byEuid.subtype).toBe("standard");
    expect(byUuid.euid).toBe("GT-21");
  });
});
