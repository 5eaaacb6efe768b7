import type {
  ArgumentProperty,
  ArgumentSchema,
  ArgumentValue,
  ToolArguments,
} from "../../ports/tools/ToolRegistryPort";

export type ArgumentValidation =
  | { ok: true; value: ToolArguments }
  | { ok: false; field: string; reason: string };

type PropertyCheck = { ok: true; value: ArgumentValue } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkProperty(property: ArgumentProperty, input: unknown): PropertyCheck {
  switch (property.type) {
    case "string": {
      if (typeof input !== "string") return { ok: false, reason: "must be a string" };
      if (property.minLength !== undefined && input.trim().length < property.minLength) {
        return {
          ok: false,
          reason: `must contain at least ${property.minLength} non-blank character(s)`,
        };
      }
      return { ok: true, value: input };
    }
    case "boolean":
      return typeof input === "boolean"
        ? { ok: true, value: input }
        : { ok: false, reason: "must be a boolean" };
    case "integer":
    case "number": {
      if (typeof input !== "number" || !Number.isFinite(input)) {
        return { ok: false, reason: `must be ${property.type === "integer" ? "an integer" : "a number"}` };
      }
      if (property.type === "integer" && !Number.isInteger(input)) {
        return { ok: false, reason: "must be an integer" };
      }
      if (property.minimum !== undefined && input < property.minimum) {
        return { ok: false, reason: `must be >= ${property.minimum}` };
      }
      if (property.maximum !== undefined && input > property.maximum) {
        return { ok: false, reason: `must be <= ${property.maximum}` };
      }
      return { ok: true, value: input };
    }
  }
}

/**
 * Checks raw tool arguments against a tool's declared schema. Absent and null
 * optional arguments are dropped from the result.
 */
export function validateArguments(schema: ArgumentSchema, raw: unknown): ArgumentValidation {
  const input = raw ?? {};
  if (!isRecord(input)) {
    return { ok: false, field: "arguments", reason: "must be an object" };
  }

  for (const field of schema.required ?? []) {
    if (!Object.hasOwn(input, field) || input[field] === undefined || input[field] === null) {
      return { ok: false, field, reason: "is required" };
    }
  }

  const value: ToolArguments = {};
  for (const [field, candidate] of Object.entries(input)) {
    const property = Object.hasOwn(schema.properties, field) ? schema.properties[field] : undefined;
    if (!property) {
      if (schema.additionalProperties === false) {
        return { ok: false, field, reason: "is not a recognized argument" };
      }
      continue;
    }
    if (candidate === undefined || candidate === null) continue;

    const checked = checkProperty(property, candidate);
    if (!checked.ok) return { ok: false, field, reason: checked.reason };
    value[field] = checked.value;
  }

  return { ok: true, value };
}
