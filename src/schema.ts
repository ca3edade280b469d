/**
 * TypeBox schemas for pipeline input files and configuration.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";

export const JsonValueSchema = Type.Recursive(
  (This) =>
    Type.Union([
      Type.String(),
      Type.Number(),
      Type.Boolean(),
      Type.Null(),
      Type.Array(This),
      Type.Record(Type.String(), This),
    ]),
  { $id: "JsonValue" },
);

export const ResourceEntrySchema = Type.Object({
  ResourceType: Type.String({ minLength: 1, description: "Terraform resource type, e.g. aws_instance" }),
  ResourceName: Type.String({ minLength: 1, description: "Resource name before sanitization" }),
  Item: JsonValueSchema,
});

/** Input file for `hclprint print`. */
export const HclInputSchema = Type.Object({
  resources: Type.Array(ResourceEntrySchema),
  provider: Type.Record(Type.String(), JsonValueSchema),
});

export type HclInput = Static<typeof HclInputSchema>;

export const LogLevelSchema = Type.Union([
  Type.Literal("trace"),
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
  Type.Literal("fatal"),
]);

export const HclPrintConfigSchema = Type.Object(
  {
    logLevel: LogLevelSchema,
    /** Dump the rejected text when the formatter fails. */
    diagnostics: Type.Boolean(),
    /** Apply the renderer patch rules. */
    patches: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type HclPrintConfig = Static<typeof HclPrintConfigSchema>;

/**
 * Validate a parsed input file.
 */
export function validateInput(input: unknown): {
  valid: boolean;
  errors?: string[];
  input?: HclInput;
} {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return { valid: false, errors: ["Input must be an object"] };
  }

  if (Check(HclInputSchema, input)) {
    return { valid: true, input };
  }

  const errors = schemaErrors(HclInputSchema, input);
  return { valid: false, errors: errors.length > 0 ? errors : ["Input does not match schema"] };
}

/** `<path>: <message>` for every schema violation. */
export function schemaErrors(schema: TSchema, value: unknown): string[] {
  const errors: string[] = [];
  for (const error of Errors(schema, value)) {
    errors.push(`${error.path || "(root)"}: ${error.message}`);
  }
  return errors;
}
