import type { NewTemplate, Template } from "@shared/schema";
import { normalizePrefix, type EuidRegistry } from "../euid";
import { readAllPages } from "../store";
import { ConfigValidationError } from "../service/errors";
import { instanceDiscriminatorOf } from "../service/kinds";
import type { PersistenceBoundary } from "../service/PersistenceBoundary";
import { parseTemplateCode, templateCodeOf } from "../service/TemplateResolver";
import type { UnitOfWork } from "../service/types";
import {
  hasErrors,
  validateTemplateDocuments,
  type TemplateDefinition,
  type TemplateDocumentSource,
  type ValidatedTemplate,
} from "./templateDocuments";

export type SeedOptions = Readonly<{
  /** Existing templates are updated (and undeleted) instead of skipped. */
  overwrite?: boolean;
  strict?: boolean;
}>;

export type SeedSummary = {
  inserted: number;
  updated: number;
  skipped: number;
};

function toRow(definition: TemplateDefinition, instancePrefix: string): Omit<NewTemplate, "euid"> {
  return {
    name: definition.name,
    polymorphicDiscriminator: definition.polymorphic_discriminator,
    category: definition.category,
    type: definition.type,
    subtype: definition.subtype,
    version: definition.version,
    instancePrefix,
    instancePolymorphicIdentity: definition.instance_polymorphic_identity ?? null,
    payload: { ...definition.payload },
    payloadSchema: definition.payload_schema ?? null,
    status: definition.status ?? "active",
    isSingleton: definition.is_singleton ?? false,
  };
}

/**
 * Loads validated template definitions into the store. Instance prefixes are
 * registered and their counters provisioned before any template is written.
 */
export class TemplateSeeder {
  constructor(
    private readonly registry: EuidRegistry,
    private readonly boundary: PersistenceBoundary,
  ) {}

  async seedDocuments(
    uow: UnitOfWork,
    sources: readonly TemplateDocumentSource[],
    opts: SeedOptions = {},
  ): Promise<SeedSummary> {
    const existing = await readAllPages((page) => uow.session.listTemplates({}, page), { includeDeleted: true });
    const { templates, issues } = validateTemplateDocuments(sources, {
      strict: opts.strict,
      knownCodes: existing.map(templateCodeOf),
    });
    for (const issue of issues.filter((i) => i.level === "warning")) {
      console.warn(`[template-seed] ${issue.sourceFile ?? "-"}: ${issue.message}`);
    }
    if (hasErrors(issues)) throw new ConfigValidationError(issues);
    return this.seed(uow, templates, opts);
  }

  async seed(uow: UnitOfWork, templates: readonly ValidatedTemplate[], opts: SeedOptions = {}): Promise<SeedSummary> {
    const summary: SeedSummary = { inserted: 0, updated: 0, skipped: 0 };

    for (const { definition } of templates) {
      this.registry.registerPrefix(
        definition.instance_prefix,
        instanceDiscriminatorOf(definition.polymorphic_discriminator, definition.instance_polymorphic_identity),
      );
    }
    await this.registry.provision(uow.session);

    for (const { code, definition } of templates) {
      const row = toRow(definition, normalizePrefix(definition.instance_prefix));
      const current = await this.findAny(uow, code);

      if (!current) {
        await this.boundary.insertTemplate(uow, row);
        summary.inserted += 1;
      } else if (opts.overwrite) {
        await this.boundary.updateTemplate(uow, current, { ...row, isDeleted: false });
        summary.updated += 1;
      } else {
        summary.skipped += 1;
      }
    }

    console.log(
      `[template-seed] inserted=${summary.inserted} updated=${summary.updated} skipped=${summary.skipped}`,
    );
    return summary;
  }

  private async findAny(uow: UnitOfWork, code: string): Promise<Template | undefined> {
    const key = parseTemplateCode(code);
    if (!key) return undefined;
    const page = await uow.session.listTemplates(key, { includeDeleted: true, limit: 1 });
    return page.items[0];
  }
}
