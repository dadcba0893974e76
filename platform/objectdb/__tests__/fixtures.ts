import type { NewTemplate } from "@shared/schema";
import { createDevEngine } from "../core/createDevEngine";
import type { ObjectEngine, ObjectEngineOptions } from "../core/ObjectEngine";
import type { SeedSummary } from "../config/seedTemplates";
import { SYSTEM_ACTOR, type ActorContext } from "../service/types";

export const TEST_ACTOR: ActorContext = { actorId: "user-1", actorType: "user" };

/** A raw template definition as it appears in a configuration document. */
export function templateDoc(
  code: string,
  prefix: string,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  const [category, type, subtype, version] = code.split("/");
  return {
    name: `${subtype} ${type}`,
    polymorphic_discriminator: `${category}_template`,
    category,
    type,
    subtype,
    version,
    instance_prefix: prefix,
    payload: {},
    ...overrides,
  };
}

export function newTemplateRow(overrides: Partial<NewTemplate> = {}): NewTemplate {
  return {
    euid: "GT-13",
    name: "Plate",
    polymorphicDiscriminator: "container_template",
    category: "container",
    type: "plate",
    subtype: "fixed_plate_24",
    version: "1.0",
    instancePrefix: "CX",
    instancePolymorphicIdentity: null,
    payload: {},
    payloadSchema: null,
    status: "active",
    isSingleton: false,
    ...overrides,
  };
}

export async function seedTemplates(engine: ObjectEngine, templates: unknown[]): Promise<SeedSummary> {
  return engine.run(SYSTEM_ACTOR, (uow) =>
    engine.seeder.seedDocuments(uow, [{ sourceFile: "test.json", content: { templates } }]),
  );
}

export async function seededEngine(templates: unknown[], opts: ObjectEngineOptions = {}) {
  const dev = createDevEngine(opts);
  await dev.engine.provision();
  await seedTemplates(dev.engine, templates);
  return dev;
}
