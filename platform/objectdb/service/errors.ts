export class ObjectDbError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = "ObjectDbError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class TemplateNotFound extends ObjectDbError {
  constructor(public readonly templateCode: string) {
    super("TEMPLATE_NOT_FOUND", `Template not found: ${templateCode}`, 404);
    this.name = "TemplateNotFound";
  }
}

export class TemplateIntegrityError extends ObjectDbError {
  constructor(message: string) {
    super("TEMPLATE_INTEGRITY_ERROR", message, 409);
    this.name = "TemplateIntegrityError";
  }
}

export type SchemaViolation = Readonly<{
  field: string;
  message: string;
}>;

export class SchemaValidationError extends ObjectDbError {
  constructor(
    public readonly templateCode: string,
    public readonly violations: readonly SchemaViolation[],
  ) {
    const summary = violations.map((v) => (v.field ? `${v.field}: ${v.message}` : v.message)).join("; ");
    super("SCHEMA_VALIDATION_ERROR", `Properties do not satisfy ${templateCode}: ${summary}`, 422);
    this.name = "SchemaValidationError";
  }
}

export class SingletonConflict extends ObjectDbError {
  constructor(templateCode: string) {
    super("SINGLETON_CONFLICT", `A live singleton instance already exists for ${templateCode}`, 409);
    this.name = "SingletonConflict";
  }
}

export class DuplicateEdge extends ObjectDbError {
  constructor(parentEuid: string, childEuid: string, relationshipType: string) {
    super(
      "DUPLICATE_EDGE",
      `Lineage ${parentEuid} -[${relationshipType}]-> ${childEuid} already exists`,
      409,
    );
    this.name = "DuplicateEdge";
  }
}

export class SelfReferenceNotAllowed extends ObjectDbError {
  constructor(euid: string) {
    super("SELF_REFERENCE_NOT_ALLOWED", `Instance ${euid} cannot be linked to itself`, 400);
    this.name = "SelfReferenceNotAllowed";
  }
}

export class InvalidIdentifierInput extends ObjectDbError {
  constructor(message: string) {
    super("INVALID_IDENTIFIER_INPUT", message, 400);
    this.name = "InvalidIdentifierInput";
  }
}

export class IdentifierIntegrityError extends ObjectDbError {
  constructor(message: string) {
    super("IDENTIFIER_INTEGRITY_ERROR", message, 500);
    this.name = "IdentifierIntegrityError";
  }
}

export class UnknownAction extends ObjectDbError {
  constructor(public readonly actionKey: string) {
    super("UNKNOWN_ACTION", `No handler registered for action "${actionKey}"`, 404);
    this.name = "UnknownAction";
  }
}

export class ActionHandlerFailure extends ObjectDbError {
  constructor(actionKey: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("ACTION_HANDLER_FAILURE", `Action "${actionKey}" failed: ${detail}`, 500);
    this.name = "ActionHandlerFailure";
  }
}

export class ObjectNotFound extends ObjectDbError {
  constructor(public readonly identifier: string) {
    super("OBJECT_NOT_FOUND", `Object not found: ${identifier}`, 404);
    this.name = "ObjectNotFound";
  }
}

export class ObjectValidationError extends ObjectDbError {
  constructor(message: string) {
    super("OBJECT_VALIDATION_ERROR", message, 400);
    this.name = "ObjectValidationError";
  }
}

export type ConfigIssue = Readonly<{
  level: "error" | "warning";
  message: string;
  sourceFile?: string;
  templateCode?: string;
}>;

export class ConfigValidationError extends ObjectDbError {
  constructor(public readonly issues: readonly ConfigIssue[]) {
    const errors = issues.filter((i) => i.level === "error");
    super("CONFIG_VALIDATION_ERROR", `Template configuration has ${errors.length} error(s)`, 422);
    this.name = "ConfigValidationError";
  }
}
