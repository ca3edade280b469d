/**
 * tf-hclprint — render typed resource descriptions as canonically formatted
 * Terraform HCL.
 */

export { buildHcl, buildDocument, encodeDocument, groupResources, sanitizeResourceName } from "./src/document.js";
export { printHcl, applyPatchRules, dumpNumbered, HCL_PATCH_RULES } from "./src/printer.js";
export type { PatchRule, PrintOptions } from "./src/printer.js";
export { sanitize, unquoteKey, isSafeIdentifier, SAFE_KEY_CHARS } from "./src/sanitizer.js";
export { resolveConfig, toPrintOptions, DEFAULT_CONFIG, LOG_LEVEL_ENV } from "./src/config.js";
export { validateInput, HclInputSchema, HclPrintConfigSchema, ResourceEntrySchema, JsonValueSchema } from "./src/schema.js";
export type { HclInput, HclPrintConfig } from "./src/schema.js";
export { createHclPrintCli, processIO } from "./src/cli.js";
export type { CliIO } from "./src/cli.js";
export { stableStringify } from "./src/json.js";
export { VERSION } from "./src/version.js";
export * from "./src/errors.js";
export * from "./src/types.js";
export * from "./src/logging/index.js";
export * from "./src/hcl/index.js";
