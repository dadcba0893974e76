import { z } from "zod";
import { normalizeTemplateCode, parseTemplateCode } from "../service/TemplateResolver";

export const DEFAULT_RELATIONSHIP_TYPE = "contains";
export const DEFAULT_CHILD_NAME_PATTERN = "{parent_name}_{child_subtype}_{index}";

export const templateCodeSchema = z
  .string()
  .refine((code) => parseTemplateCode(code) !== undefined, {
    message: "must be a template code of the form category/type/subtype/version",
  })
  .transform(normalizeTemplateCode);

// A bare string is shorthand for { template_code, count: 1 }.
const childTemplateSchema = z.preprocess(
  (ref) => (typeof ref === "string" ? { template_code: ref } : ref),
  z
    .object({
      template_code: templateCodeSchema,
      count: z.number().int().min(1, "count must be >= 1").default(1),
      name_pattern: z.string().min(1).optional(),
    })
    .passthrough()
    .transform((ref) => ({ templateCode: ref.template_code, count: ref.count, namePattern: ref.name_pattern })),
);

const layoutSchema = z
  .object({
    relationship_type: z.string().trim().min(1).default(DEFAULT_RELATIONSHIP_TYPE),
    name_pattern: z.string().min(1).nullish(),
    child_templates: z.array(childTemplateSchema).default([]),
  })
  .passthrough()
  .transform((layout) => ({
    relationshipType: layout.relationship_type,
    namePattern: layout.name_pattern ?? undefined,
    childTemplates: layout.child_templates,
  }));

export const instantiationLayoutsSchema = z.array(layoutSchema);

export type ChildTemplateRef = Readonly<{
  templateCode: string;
  count: number;
  namePattern?: string;
}>;

export type InstantiationLayout = Readonly<{
  relationshipType: string;
  namePattern?: string;
  childTemplates: readonly ChildTemplateRef[];
}>;

export type LayoutParseResult =
  | Readonly<{ ok: true; layouts: InstantiationLayout[] }>
  | Readonly<{ ok: false; errors: string[] }>;

function isEmpty(raw: unknown): boolean {
  if (raw === null || raw === undefined) return true;
  if (Array.isArray(raw)) return raw.length === 0;
  return typeof raw === "object" && Object.keys(raw).length === 0;
}

/** Absent, null, `[]` and `{}` all mean "no layouts". */
export function parseInstantiationLayouts(raw: unknown): LayoutParseResult {
  if (isEmpty(raw)) return { ok: true, layouts: [] };
  const parsed = instantiationLayoutsSchema.safeParse(raw);
  if (parsed.success) return { ok: true, layouts: parsed.data };
  return {
    ok: false,
    errors: parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? `instantiation_layouts.${issue.path.join(".")}` : "instantiation_layouts";
      return `${path}: ${issue.message}`;
    }),
  };
}
