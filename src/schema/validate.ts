import type { SchemaNode, ValidationResult } from "./types.js";
import { isRecord } from "../utils.js";

const VALID: ValidationResult = { ok: true, error: null };

function fail(error: string): ValidationResult {
  return { ok: false, error };
}

function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}

function matchesType(value: unknown, type: string): boolean {
  switch (type) {
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
    case "array":
      return Array.isArray(value);
    case "string":
    case "number":
    case "boolean":
      return typeof value === type;
    default:
      // Unrecognised type names are not checked.
      return true;
  }
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

/**
 * Recursively checks `value` against `schema`. Stops at the first failure and
 * reports it with a path prefix (`Property 'a': Array item 2: ...`). Extra
 * properties are allowed.
 */
export function validateSchema(value: unknown, schema?: SchemaNode): ValidationResult {
  if (!schema) {
    return VALID;
  }

  if (!matchesType(value, schema.type)) {
    return fail(`Expected ${schema.type}, got ${describeType(value)}`);
  }

  if (schema.type === "object" && schema.properties && isRecord(value)) {
    const required = new Set(schema.required ?? []);
    for (const [name, propSchema] of Object.entries(schema.properties)) {
      const propValue = Object.hasOwn(value, name) ? value[name] : undefined;
      if (isAbsent(propValue)) {
        if (required.has(name)) {
          return fail(`Required property '${name}' is missing`);
        }
        continue;
      }
      const nested = validateSchema(propValue, propSchema);
      if (!nested.ok) {
        return fail(`Property '${name}': ${nested.error}`);
      }
    }
  }

  if (schema.type === "array" && schema.items && Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const nested = validateSchema(value[i], schema.items);
      if (!nested.ok) {
        return fail(`Array item ${i + 1}: ${nested.error}`);
      }
    }
  }

  return VALID;
}
