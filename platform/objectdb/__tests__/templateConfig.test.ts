import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { fileURLToPath } from "url";
import { parseInstantiationLayouts } from "../config/instantiationLayouts";
import { loadTemplateDocuments } from "../config/loadTemplateDocuments";
import { validateTemplateDocuments } from "../config/templateDocuments";
import { createDevEngine } from "../core/createDevEngine";
import { ConfigValidationError } from "../service/errors";
import { SYSTEM_ACTOR } from "../service/types";
import { TEST_ACTOR, newTemplateRow, seedTemplates, seededEngine, templateDoc } from "./fixtures";

const PLATE = "container/plate/p1/1.0";
const WELL = "container/well/w1/1.0";

const CONFIG_DIR = fileURLToPath(new URL("../../../config/templates", import.meta.url));

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("parseInstantiationLayouts", () => {
  it("treats absent and empty values as no layouts", () => {
    for (const raw of [undefined, null, [], {}]) {
      expect(parseInstantiationLayouts(raw)).toEqual({ ok: true, layouts: [] });
    }
  });

  it("expands bare codes and applies defaults", () => {
    expect(parseInstantiationLayouts([{ child_templates: [`${WELL}/`, { template_code: PLATE, count: 2 }] }])).toEqual({
      ok: true,
      layouts: [
        {
          relationshipType: "contains",
          childTemplates: [
            { templateCode: WELL, count: 1 },
            { templateCode: PLATE, count: 2 },
          ],
        },
      ],
    });
  });

  it("reports a count below one", () => {
    expect(parseInstantiationLayouts([{ child_templates: [{ template_code: WELL, count: 0 }] }])).toEqual({
      ok: false,
      errors: ["instantiation_layouts.0.child_templates.0.count: count must be >= 1"],
    });
  });

  it("reports a malformed template code", () => {
    expect(parseInstantiationLayouts([{ child_templates: ["container/well"] }])).toEqual({
      ok: false,
      errors: [
        "instantiation_layouts.0.child_templates.0.template_code: must be a template code of the form category/type/subtype/version",
      ],
    });
  });

  it("requires a list", () => {
    expect(parseInstantiationLayouts({ child_templates: [WELL] })).toEqual({
      ok: false,
      errors: ["instantiation_layouts: Expected array, received object"],
    });
  });
});

describe("validateTemplateDocuments", () => {
  const doc = (sourceFile: string, templates: unknown[]) => ({ sourceFile, content: { templates } });

  it("accepts a consistent set of documents", () => {
    const result = validateTemplateDocuments([
      doc("plates.json", [
        templateDoc(PLATE, "cx", { payload: { instantiation_layouts: [{ child_templates: [WELL] }] } }),
        templateDoc(WELL, "CX"),
      ]),
    ]);

    expect(result.issues).toEqual([]);
    expect(result.templates.map((t) => t.code)).toEqual([PLATE, WELL]);
  });

  it("reports documents without a templates list", () => {
    const result = validateTemplateDocuments([{ sourceFile: "bad.json", content: [] }]);

    expect(result.issues).toEqual([
      { level: "error", sourceFile: "bad.json", message: "Document must be an object with a 'templates' array" },
    ]);
  });

  it("reports missing fields with their position", () => {
    const { name: _name, ...nameless } = templateDoc(WELL, "CX");
    const result = validateTemplateDocuments([doc("wells.json", [nameless])]);

    expect(result.issues).toEqual([
      { level: "error", sourceFile: "wells.json", message: "templates[0].name: Required" },
    ]);
  });

  it("reports duplicate template keys across documents", () => {
    const result = validateTemplateDocuments([
      doc("a.json", [templateDoc(WELL, "CX")]),
      doc("b.json", [templateDoc(WELL, "CX")]),
    ]);

    expect(result.issues).toEqual([
      {
        level: "error",
        sourceFile: "b.json",
        templateCode: WELL,
        message: `Duplicate template ${WELL} (also defined in a.json)`,
      },
    ]);
  });

  it("reports malformed and conflicting instance prefixes", () => {
    const result = validateTemplateDocuments([
      doc("t.json", [
        templateDoc(WELL, "C1"),
        templateDoc(PLATE, "GX"),
        templateDoc("content/sample/s1/1.0", "MX"),
        templateDoc("content/sample/s2/1.0", "MX", { polymorphic_discriminator: "data_template" }),
      ]),
    ]);

    expect(result.issues.map((i) => i.message)).toEqual([
      'Invalid instance_prefix: Prefix "C1" must contain letters only',
      "Instance prefix GX is already used for generic_instance",
      "Instance prefix MX is already used for content_instance",
    ]);
  });

  it("warns about unresolved references, or fails on them when strict", () => {
    const sources = [
      doc("plates.json", [
        templateDoc(PLATE, "CX", { payload: { action_imports: { set_status: "action/core/set_status/1.0" } } }),
      ]),
    ];

    const lenient = validateTemplateDocuments(sources);
    const strict = validateTemplateDocuments(sources, { strict: true });
    const known = validateTemplateDocuments(sources, { strict: true, knownCodes: ["action/core/set_status/1.0/"] });

    const message = "Unresolved template reference action/core/set_status/1.0";
    expect(lenient.issues).toEqual([{ level: "warning", sourceFile: "plates.json", templateCode: PLATE, message }]);
    expect(lenient.templates).toHaveLength(1);
    expect(strict.issues).toEqual([{ level: "error", sourceFile: "plates.json", templateCode: PLATE, message }]);
    expect(known.issues).toEqual([]);
  });

  it("reports an empty configuration", () => {
    const result = validateTemplateDocuments([doc("empty.json", [])]);

    expect(result.issues).toEqual([{ level: "error", message: "No templates found" }]);
  });
});

describe("loadTemplateDocuments", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "objectdb-templates-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads JSON documents recursively and skips drafts", async () => {
    await mkdir(path.join(dir, "container"));
    await mkdir(path.join(dir, "_drafts"));
    await writeFile(path.join(dir, "container", "wells.json"), JSON.stringify({ templates: [templateDoc(WELL, "CX")] }));
    await writeFile(path.join(dir, "_drafts", "plates.json"), JSON.stringify({ templates: [] }));
    await writeFile(path.join(dir, "_unused.json"), "{}");
    await writeFile(path.join(dir, "README.md"), "not a template");

    const { sources, issues } = await loadTemplateDocuments(dir);

    expect(issues).toEqual([]);
    expect(sources.map((s) => s.sourceFile)).toEqual([path.join("container", "wells.json")]);
  });

  it("reports files that are not valid JSON", async () => {
    await writeFile(path.join(dir, "broken.json"), "{ templates: ");

    const { sources, issues } = await loadTemplateDocuments(dir);

    expect(sources).toEqual([]);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ level: "error", sourceFile: "broken.json" });
  });

  it("loads the shipped template configuration without issues", async () => {
    const { sources, issues } = await loadTemplateDocuments(CONFIG_DIR);

    expect(issues).toEqual([]);
    expect(validateTemplateDocuments(sources, { strict: true }).issues).toEqual([]);
  });
});

describe("TemplateSeeder", () => {
  const templates = [
    templateDoc(PLATE, "CX", { payload: { instantiation_layouts: [{ child_templates: [WELL] }] } }),
    templateDoc(WELL, "CX"),
  ];

  it("inserts new templates and skips them on a second run", async () => {
    const { engine } = createDevEngine();

    const first = await seedTemplates(engine, templates);
    const second = await seedTemplates(engine, templates);

    expect(first).toEqual({ inserted: 2, updated: 0, skipped: 0 });
    expect(second).toEqual({ inserted: 0, updated: 0, skipped: 2 });
    expect(engine.registry.discriminatorFor("CX")).toBe("container_instance");
  });

  it("updates and undeletes existing templates when overwriting", async () => {
    const { engine } = await seededEngine(templates);
    const well = await engine.read((s) => engine.resolver.resolve(s, WELL));
    await engine.run(SYSTEM_ACTOR, (uow) => engine.boundary.softDeleteTemplate(uow, well));

    const summary = await engine.run(SYSTEM_ACTOR, (uow) =>
      engine.seeder.seedDocuments(
        uow,
        [{ sourceFile: "t.json", content: { templates: [templateDoc(WELL, "CX", { name: "Renamed well" })] } }],
        { overwrite: true },
      ),
    );

    const updated = await engine.read((s) => engine.resolver.resolve(s, WELL));
    expect(summary).toEqual({ inserted: 0, updated: 1, skipped: 0 });
    expect(updated.uuid).toBe(well.uuid);
    expect(updated.name).toBe("Renamed well");
    expect(updated.isDeleted).toBe(false);
  });

  it("writes nothing when the documents have errors", async () => {
    const { engine } = createDevEngine();

    const err = await seedTemplates(engine, [templateDoc(WELL, "CX"), templateDoc(PLATE, "C1")]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigValidationError);
    expect(err).toMatchObject({ issues: [expect.objectContaining({ templateCode: PLATE })] });
    const page = await engine.read((s) => s.listTemplates({}, { includeDeleted: true }));
    expect(page.total).toBe(0);
  });

  it("resolves layout references against every stored template", async () => {
    const { engine, store } = createDevEngine();
    await store.transaction(async (s) => {
      for (let i = 1; i <= 1000; i++) {
        await s.insertTemplate(newTemplateRow({ euid: `GT-B${i}`, subtype: `bulk_${i}` }));
      }
      await s.insertTemplate(newTemplateRow({ euid: "GT-W1", type: "well", subtype: "w1" }));
    });

    const summary = await engine.run(SYSTEM_ACTOR, (uow) =>
      engine.seeder.seedDocuments(uow, [{ sourceFile: "t.json", content: { templates: [templates[0]] } }], {
        strict: true,
      }),
    );

    expect(summary).toEqual({ inserted: 1, updated: 0, skipped: 0 });
  }, 30_000);

  it("seeds the shipped configuration into a working engine", async () => {
    const { engine } = createDevEngine();
    await engine.provision();
    const { sources } = await loadTemplateDocuments(CONFIG_DIR);

    const summary = await engine.run(SYSTEM_ACTOR, (uow) => engine.seeder.seedDocuments(uow, sources, { strict: true }));
    const wells = await engine.run(TEST_ACTOR, async (uow) => {
      const plate = await engine.factory.createInstance(uow, "container/plate/fixed_plate_24/1.0", "PL1");
      return engine.lineage.childrenOf(uow.session, plate);
    });

    expect(summary).toEqual({ inserted: 5, updated: 0, skipped: 0 });
    expect(wells.map((w) => w.name)).toEqual(["PL1_A1", "PL1_A2", "PL1_A3"]);
  });
});
