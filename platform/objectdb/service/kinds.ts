import type { Instance, Template } from "@shared/schema";

export const OBJECT_KINDS = [
  "generic",
  "workflow",
  "workflow_step",
  "container",
  "content",
  "equipment",
  "data",
  "test_requisition",
  "actor",
  "action",
  "health_event",
  "file",
  "subject",
] as const;

export type ObjectKind = (typeof OBJECT_KINDS)[number];

export type KindBehaviour = Readonly<{
  defaultStatus: string;
  color: string;
  payloadSchema?: Readonly<Record<string, unknown>>;
}>;

// Action records are written by the dispatcher; their summary must name the action and its target.
const ACTION_RECORD_SCHEMA = {
  type: "object",
  required: ["action_key", "target_instance_euid"],
  properties: {
    action_key: { type: "string", minLength: 1 },
    target_instance_euid: { type: "string", minLength: 1 },
  },
} as const;

export const KIND_BEHAVIOUR: Readonly<Record<ObjectKind, KindBehaviour>> = {
  generic: { defaultStatus: "created", color: "#888888" },
  workflow: { defaultStatus: "created", color: "#00FF7F" },
  workflow_step: { defaultStatus: "created", color: "#ADFF2F" },
  container: { defaultStatus: "created", color: "#8B00FF" },
  content: { defaultStatus: "created", color: "#00BFFF" },
  equipment: { defaultStatus: "created", color: "#FF4500" },
  data: { defaultStatus: "created", color: "#FFD700" },
  test_requisition: { defaultStatus: "created", color: "#FFA500" },
  actor: { defaultStatus: "created", color: "#FF69B4" },
  action: { defaultStatus: "created", color: "#FF8C00", payloadSchema: ACTION_RECORD_SCHEMA },
  health_event: { defaultStatus: "created", color: "#DC143C" },
  file: { defaultStatus: "created", color: "#00FF00" },
  subject: { defaultStatus: "created", color: "#9370DB" },
};

export const DEFAULT_COLOR = "#888888";

const SUFFIXES = ["_instance_lineage", "_template", "_instance"] as const;

function isObjectKind(value: string): value is ObjectKind {
  return OBJECT_KINDS.some((k) => k === value);
}

/** Kind named by a discriminator such as "container_template"; generic when unknown. */
export function kindOf(discriminator: string): ObjectKind {
  for (const suffix of SUFFIXES) {
    if (discriminator.endsWith(suffix)) {
      const stem = discriminator.slice(0, -suffix.length);
      return isObjectKind(stem) ? stem : "generic";
    }
  }
  return isObjectKind(discriminator) ? discriminator : "generic";
}

export function behaviourOf(discriminator: string): KindBehaviour {
  return KIND_BEHAVIOUR[kindOf(discriminator)];
}

export function instanceDiscriminatorOf(templateDiscriminator: string, identity?: string | null): string {
  return identity ?? `${kindOf(templateDiscriminator)}_instance`;
}

export function instanceDiscriminatorFor(template: Template): string {
  return instanceDiscriminatorOf(template.polymorphicDiscriminator, template.instancePolymorphicIdentity);
}

export function lineageDiscriminatorFor(parent: Instance): string {
  return `${kindOf(parent.polymorphicDiscriminator)}_instance_lineage`;
}

export function colorForCategory(category: string): string {
  return isObjectKind(category) ? KIND_BEHAVIOUR[category].color : DEFAULT_COLOR;
}
