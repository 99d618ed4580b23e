export type SchemaType = "object" | "array" | "string" | "number" | "boolean";

/**
 * JSON-Schema-like descriptor used for tool parameters and structured output.
 * `description`, `enum` and `additionalProperties` are forwarded to the model
 * but not enforced by {@link validateSchema}. Schemas must not be cyclic.
 */
export type SchemaNode = {
  type: SchemaType;
  description?: string;
  properties?: Record<string, SchemaNode>;
  required?: string[];
  items?: SchemaNode;
  enum?: Array<string | number | boolean>;
  additionalProperties?: boolean;
};

export type ValidationResult =
  | { ok: true; error: null }
  | { ok: false; error: string };
