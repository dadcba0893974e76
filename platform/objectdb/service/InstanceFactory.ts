import type { ActionGroups, Instance, Lineage, Template } from "@shared/schema";
import {
  DEFAULT_CHILD_NAME_PATTERN,
  parseInstantiationLayouts,
  type InstantiationLayout,
} from "../config/instantiationLayouts";
import { SelfReferenceNotAllowed, DuplicateEdge, ObjectNotFound, SingletonConflict, TemplateIntegrityError } from "./errors";
import { behaviourOf, instanceDiscriminatorFor, lineageDiscriminatorFor } from "./kinds";
import type { PayloadValidator } from "./PayloadValidator";
import type { PersistenceBoundary } from "./PersistenceBoundary";
import { templateCodeOf, type TemplateResolver } from "./TemplateResolver";
import type { UnitOfWork } from "./types";

export const MAX_INSTANTIATION_DEPTH = 10;
export const DEFAULT_LINK_RELATIONSHIP = "generic";

export type CreateInstanceOptions = Readonly<{
  properties?: Record<string, unknown>;
  createChildren?: boolean;
  status?: string;
}>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Plain objects merge recursively with the override winning; everything else is replaced. */
export function deepMerge(
  base: Readonly<Record<string, unknown>>,
  override: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const out: Record<string, unknown> = structuredClone({ ...base });
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : structuredClone(value);
  }
  return out;
}

/**
 * Fills a child name pattern. Unknown placeholders are a template defect.
 */
export function formatNamePattern(pattern: string, values: Readonly<Record<string, string | number>>): string {
  return pattern.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new TemplateIntegrityError(`Unknown placeholder {${key}} in name pattern "${pattern}"`);
    }
    return String(value);
  });
}

/**
 * Creates instances from templates, cascading instantiation layouts into
 * child instances and lineage edges.
 *
 * All writes go through the persistence boundary on the caller's unit of
 * work; the caller's transaction is what makes a cascade all-or-nothing.
 */
export class InstanceFactory {
  constructor(
    private readonly resolver: TemplateResolver,
    private readonly boundary: PersistenceBoundary,
    private readonly validator: PayloadValidator,
  ) {}

  async createInstance(
    uow: UnitOfWork,
    templateCode: string,
    name: string,
    opts: CreateInstanceOptions = {},
  ): Promise<Instance> {
    return this.build(uow, templateCode, name, opts, 0, new Set());
  }

  /** Creates from an already-resolved template row. */
  async createFromTemplate(
    uow: UnitOfWork,
    template: Template,
    name: string,
    opts: CreateInstanceOptions = {},
  ): Promise<Instance> {
    return this.buildFrom(uow, template, name, opts, 0, new Set());
  }

  /**
   * Returns the live singleton for the template, creating it if there is none.
   * Deleted singletons are never brought back.
   */
  async getOrCreateSingletonInstance(
    uow: UnitOfWork,
    templateCode: string,
    name: string,
    opts: CreateInstanceOptions = {},
  ): Promise<Instance> {
    const template = await this.resolver.resolve(uow.session, templateCode);
    if (!template.isSingleton) {
      throw new TemplateIntegrityError(`Template ${templateCodeOf(template)} is not a singleton`);
    }
    const existing = await this.findLiveSingleton(uow, template);
    return existing ?? this.createFromTemplate(uow, template, name, opts);
  }

  async linkInstances(
    uow: UnitOfWork,
    parent: Instance,
    child: Instance,
    relationshipType = DEFAULT_LINK_RELATIONSHIP,
  ): Promise<Lineage> {
    if (parent.uuid === child.uuid) throw new SelfReferenceNotAllowed(parent.euid);
    for (const end of [parent, child]) {
      if (end.isDeleted) throw new ObjectNotFound(end.euid);
    }

    const existing = await uow.session.listLineages({
      parentInstanceUuid: parent.uuid,
      childInstanceUuid: child.uuid,
      relationshipType,
    });
    if (existing.total > 0) throw new DuplicateEdge(parent.euid, child.euid, relationshipType);

    return this.boundary.insertLineage(
      uow,
      {
        name: `${parent.euid}->${child.euid}`,
        polymorphicDiscriminator: lineageDiscriminatorFor(parent),
        category: "generic",
        type: "lineage",
        subtype: "instance_lineage",
        version: "1.0.0",
        parentInstanceUuid: parent.uuid,
        childInstanceUuid: child.uuid,
        parentType: parent.polymorphicDiscriminator,
        childType: child.polymorphicDiscriminator,
        relationshipType,
        properties: {},
        status: "active",
      },
      { parentEuid: parent.euid, childEuid: child.euid },
    );
  }

  // ---- internals ----

  private async build(
    uow: UnitOfWork,
    templateCode: string,
    name: string,
    opts: CreateInstanceOptions,
    depth: number,
    chain: ReadonlySet<string>,
  ): Promise<Instance> {
    const template = await this.resolver.resolve(uow.session, templateCode);
    return this.buildFrom(uow, template, name, opts, depth, chain);
  }

  private async buildFrom(
    uow: UnitOfWork,
    template: Template,
    name: string,
    opts: CreateInstanceOptions,
    depth: number,
    chain: ReadonlySet<string>,
  ): Promise<Instance> {
    const code = templateCodeOf(template);
    if (depth > MAX_INSTANTIATION_DEPTH) {
      throw new TemplateIntegrityError(`Instantiation of ${code} exceeds the maximum depth of ${MAX_INSTANTIATION_DEPTH}`);
    }
    if (chain.has(code)) {
      throw new TemplateIntegrityError(`Instantiation layouts form a cycle: ${[...chain, code].join(" -> ")}`);
    }

    const payload = template.payload;
    const properties = deepMerge(payload.properties ?? {}, opts.properties ?? {});
    this.validator.validate(template, properties);

    if (template.isSingleton && (await this.findLiveSingleton(uow, template))) {
      throw new SingletonConflict(code);
    }

    const status = opts.status ?? payload.default_status ?? behaviourOf(template.polymorphicDiscriminator).defaultStatus;

    const instance = await this.boundary.insertInstance(
      uow,
      {
        name,
        polymorphicDiscriminator: instanceDiscriminatorFor(template),
        category: template.category,
        type: template.type,
        subtype: template.subtype,
        version: template.version,
        templateUuid: template.uuid,
        properties,
        actionGroups: await this.materializeActions(uow, template),
        status,
        isSingleton: template.isSingleton,
      },
      template.instancePrefix,
      code,
    );

    if (opts.createChildren ?? true) {
      await this.createChildren(uow, template, instance, depth, new Set([...chain, code]));
    }
    return instance;
  }

  private async createChildren(
    uow: UnitOfWork,
    template: Template,
    parent: Instance,
    depth: number,
    chain: ReadonlySet<string>,
  ): Promise<void> {
    const layouts = this.layoutsOf(template);
    for (const [layoutIndex, layout] of layouts.entries()) {
      for (const [childIndex, ref] of layout.childTemplates.entries()) {
        const childTemplate = await this.resolver.resolve(uow.session, ref.templateCode);
        const pattern = ref.namePattern ?? layout.namePattern ?? DEFAULT_CHILD_NAME_PATTERN;

        for (let index = 1; index <= ref.count; index++) {
          const childName = formatNamePattern(pattern, {
            parent_name: parent.name,
            parent_euid: parent.euid,
            index,
            layout_index: layoutIndex,
            child_index: childIndex,
            child_subtype: childTemplate.subtype,
            child_template_code: ref.templateCode,
          });
          const child = await this.buildFrom(uow, childTemplate, childName, {}, depth + 1, chain);
          await this.linkInstances(uow, parent, child, layout.relationshipType);
        }
      }
    }
  }

  private layoutsOf(template: Template): readonly InstantiationLayout[] {
    const parsed = parseInstantiationLayouts(template.payload.instantiation_layouts);
    if (!parsed.ok) {
      throw new TemplateIntegrityError(
        `Template ${templateCodeOf(template)} has invalid instantiation layouts: ${parsed.errors.join("; ")}`,
      );
    }
    return parsed.layouts;
  }

  /** One group per action template type; imports whose template is missing are skipped. */
  private async materializeActions(uow: UnitOfWork, template: Template): Promise<ActionGroups> {
    const groups: ActionGroups = {};
    for (const [actionKey, actionCode] of Object.entries(template.payload.action_imports ?? {})) {
      const actionTemplate = await this.resolver.find(uow.session, actionCode);
      if (!actionTemplate) {
        console.warn(`[instance-factory] Skipping action "${actionKey}" of ${templateCodeOf(template)}: ${actionCode} not found`);
        continue;
      }
      const groupName = `${actionTemplate.type}_actions`;
      groups[groupName] = {
        ...groups[groupName],
        [actionKey]: {
          ...(actionTemplate.payload.action_definition ?? {}),
          actionTemplateUuid: actionTemplate.uuid,
          actionTemplateEuid: actionTemplate.euid,
          actionTemplateCode: templateCodeOf(actionTemplate),
          actionExecuted: 0,
          executedAt: [],
          actionEnabled: true,
        },
      };
    }
    return groups;
  }

  private async findLiveSingleton(uow: UnitOfWork, template: Template): Promise<Instance | undefined> {
    const page = await uow.session.listInstances({
      category: template.category,
      type: template.type,
      subtype: template.subtype,
      version: template.version,
      isSingleton: true,
    });
    return page.items[0];
  }
}
