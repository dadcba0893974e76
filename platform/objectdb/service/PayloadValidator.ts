import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import type { Template } from "@shared/schema";
import { behaviourOf } from "./kinds";
import { SchemaValidationError, TemplateIntegrityError, type SchemaViolation } from "./errors";
import { templateCodeOf } from "./TemplateResolver";

/**
 * Checks an instance's final properties against what its template allows.
 * Throws SchemaValidationError listing every violated field.
 */
export interface PayloadValidator {
  validate(template: Template, properties: Record<string, unknown>): void;
}

function fieldOf(error: ErrorObject): string {
  const path = error.instancePath.replace(/^\//, "").replace(/\//g, ".");
  const missing: unknown = error.params.missingProperty;
  if (error.keyword === "required" && typeof missing === "string") {
    return path ? `${path}.${missing}` : missing;
  }
  return path;
}

function toViolations(errors: readonly ErrorObject[] | null | undefined): SchemaViolation[] {
  return (errors ?? []).map((e) => ({ field: fieldOf(e), message: e.message ?? e.keyword }));
}

/** JSON-Schema validation with ajv, against the template's schema and its kind's built-in one. */
export class AjvPayloadValidator implements PayloadValidator {
  private readonly ajv = new Ajv({ allErrors: true, strict: false });
  private readonly templateSchemas = new Map<string, ValidateFunction>();
  private readonly kindSchemas = new Map<string, ValidateFunction>();

  validate(template: Template, properties: Record<string, unknown>): void {
    const violations: SchemaViolation[] = [];

    const kindCheck = this.kindValidator(template);
    if (kindCheck && !kindCheck(properties)) violations.push(...toViolations(kindCheck.errors));

    const templateCheck = this.templateValidator(template);
    if (templateCheck && !templateCheck(properties)) violations.push(...toViolations(templateCheck.errors));

    if (violations.length > 0) {
      throw new SchemaValidationError(templateCodeOf(template), violations);
    }
  }

  private kindValidator(template: Template): ValidateFunction | undefined {
    const behaviour = behaviourOf(template.polymorphicDiscriminator);
    if (!behaviour.payloadSchema) return undefined;
    let fn = this.kindSchemas.get(template.polymorphicDiscriminator);
    if (!fn) {
      fn = this.ajv.compile(behaviour.payloadSchema);
      this.kindSchemas.set(template.polymorphicDiscriminator, fn);
    }
    return fn;
  }

  private templateValidator(template: Template): ValidateFunction | undefined {
    if (!template.payloadSchema || Object.keys(template.payloadSchema).length === 0) return undefined;
    // A template's schema only changes with its modified_dt.
    const cacheKey = `${template.uuid}:${template.modifiedDt.getTime()}`;
    let fn = this.templateSchemas.get(cacheKey);
    if (!fn) {
      try {
        fn = this.ajv.compile(template.payloadSchema);
      } catch (err) {
        throw new TemplateIntegrityError(
          `Template ${templateCodeOf(template)} has an invalid payload_schema: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
      this.templateSchemas.set(cacheKey, fn);
    }
    return fn;
  }
}
