import { z } from "zod";
import { CORE_PREFIXES, OPTIONAL_PREFIXES } from "../euid/registry";
import { normalizePrefix } from "../euid/codec";
import type { ConfigIssue } from "../service/errors";
import { instanceDiscriminatorOf } from "../service/kinds";
import { normalizeTemplateCode, parseTemplateCode, templateCodeOf } from "../service/TemplateResolver";
import { parseInstantiationLayouts } from "./instantiationLayouts";

const requiredString = z.string().trim().min(1, "is required");

export const templatePayloadSchema = z
  .object({
    properties: z.record(z.unknown()).optional(),
    action_imports: z.record(z.string()).optional(),
    instantiation_layouts: z.unknown().optional(),
    default_status: z.string().min(1).optional(),
    action_definition: z.record(z.unknown()).optional(),
    expected_inputs: z.array(z.string()).optional(),
    expected_outputs: z.array(z.string()).optional(),
  })
  .passthrough();

export const templateDefinitionSchema = z
  .object({
    name: requiredString,
    polymorphic_discriminator: requiredString,
    category: requiredString,
    type: requiredString,
    subtype: requiredString,
    version: requiredString,
    instance_prefix: requiredString,
    instance_polymorphic_identity: z.string().min(1).nullish(),
    is_singleton: z.boolean().optional(),
    status: z.string().min(1).optional(),
    payload_schema: z.record(z.unknown()).nullish(),
    payload: templatePayloadSchema.default({}),
  })
  .passthrough();

export type TemplateDefinition = z.infer<typeof templateDefinitionSchema>;

export type TemplateDocumentSource = Readonly<{
  sourceFile: string;
  content: unknown;
}>;

export type ValidatedTemplate = Readonly<{
  sourceFile: string;
  code: string;
  definition: TemplateDefinition;
}>;

export type TemplateValidationResult = Readonly<{
  templates: ValidatedTemplate[];
  issues: ConfigIssue[];
}>;

export type ValidateOptions = Readonly<{
  /** Unresolved references become errors instead of warnings. */
  strict?: boolean;
  /** Codes of templates that already exist outside these documents. */
  knownCodes?: Iterable<string>;
}>;

export function hasErrors(issues: readonly ConfigIssue[]): boolean {
  return issues.some((i) => i.level === "error");
}

function referencesOf(definition: TemplateDefinition): Array<{ where: string; ref: string }> {
  const refs: Array<{ where: string; ref: string }> = [];
  for (const [key, ref] of Object.entries(definition.payload.action_imports ?? {})) {
    refs.push({ where: `action_imports.${key}`, ref });
  }
  for (const field of ["expected_inputs", "expected_outputs"] as const) {
    for (const [i, ref] of (definition.payload[field] ?? []).entries()) {
      refs.push({ where: `${field}.${i}`, ref });
    }
  }
  return refs;
}

/**
 * Checks template documents without touching the database: shape, duplicate
 * keys, instance prefixes, layouts and template references.
 */
export function validateTemplateDocuments(
  sources: readonly TemplateDocumentSource[],
  opts: ValidateOptions = {},
): TemplateValidationResult {
  const issues: ConfigIssue[] = [];
  const templates: ValidatedTemplate[] = [];
  const seen = new Map<string, string>();
  const prefixOwners = new Map<string, string>(Object.entries({ ...CORE_PREFIXES, ...OPTIONAL_PREFIXES }));

  for (const { sourceFile, content } of sources) {
    const doc = z.object({ templates: z.array(z.unknown()) }).safeParse(content);
    if (!doc.success) {
      issues.push({ level: "error", sourceFile, message: "Document must be an object with a 'templates' array" });
      continue;
    }

    for (const [index, raw] of doc.data.templates.entries()) {
      const parsed = templateDefinitionSchema.safeParse(raw);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          issues.push({
            level: "error",
            sourceFile,
            message: `templates[${index}].${issue.path.join(".")}: ${issue.message}`,
          });
        }
        continue;
      }

      const definition = parsed.data;
      const code = templateCodeOf(definition);
      const at = { sourceFile, templateCode: code };
      let valid = true;

      const previous = seen.get(code);
      if (previous !== undefined) {
        issues.push({ ...at, level: "error", message: `Duplicate template ${code} (also defined in ${previous})` });
        valid = false;
      } else {
        seen.set(code, sourceFile);
      }

      try {
        const prefix = normalizePrefix(definition.instance_prefix);
        const discriminator = instanceDiscriminatorOf(
          definition.polymorphic_discriminator,
          definition.instance_polymorphic_identity,
        );
        const owner = prefixOwners.get(prefix);
        if (owner !== undefined && owner !== discriminator) {
          issues.push({ ...at, level: "error", message: `Instance prefix ${prefix} is already used for ${owner}` });
          valid = false;
        } else {
          prefixOwners.set(prefix, discriminator);
        }
      } catch (err) {
        issues.push({ ...at, level: "error", message: `Invalid instance_prefix: ${err instanceof Error ? err.message : String(err)}` });
        valid = false;
      }

      const layouts = parseInstantiationLayouts(definition.payload.instantiation_layouts);
      if (!layouts.ok) {
        for (const message of layouts.errors) issues.push({ ...at, level: "error", message });
        valid = false;
      }

      for (const { where, ref } of referencesOf(definition)) {
        if (!parseTemplateCode(ref)) {
          issues.push({ ...at, level: "error", message: `Invalid template reference "${ref}" in ${where}` });
          valid = false;
        }
      }

      if (valid) templates.push({ sourceFile, code, definition });
    }
  }

  if (templates.length === 0 && !hasErrors(issues)) {
    issues.push({ level: "error", message: "No templates found" });
  }

  const known = new Set<string>([...(opts.knownCodes ?? []), ...seen.keys()].map(normalizeTemplateCode));
  for (const { sourceFile, code, definition } of templates) {
    const refs = referencesOf(definition).map((r) => r.ref);
    const layouts = parseInstantiationLayouts(definition.payload.instantiation_layouts);
    if (layouts.ok) {
      for (const layout of layouts.layouts) refs.push(...layout.childTemplates.map((c) => c.templateCode));
    }
    for (const ref of refs) {
      const normalized = normalizeTemplateCode(ref);
      if (!known.has(normalized)) {
        issues.push({
          level: opts.strict ? "error" : "warning",
          sourceFile,
          templateCode: code,
          message: `Unresolved template reference ${normalized}`,
        });
      }
    }
  }

  return { templates, issues };
}
