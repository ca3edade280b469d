/**
 * Configuration — defaults, environment and explicit overrides, validated
 * against `HclPrintConfigSchema`.
 */

import { Check } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import type { HclLogger } from "./logging/index.js";
import { getHclLogger } from "./logging/index.js";
import type { PrintOptions } from "./printer.js";
import type { HclPrintConfig } from "./schema.js";
import { HclPrintConfigSchema, schemaErrors } from "./schema.js";

export type { HclPrintConfig } from "./schema.js";

export const LOG_LEVEL_ENV = "HCLPRINT_LOG_LEVEL";

export const DEFAULT_CONFIG: Readonly<HclPrintConfig> = Object.freeze({
  logLevel: "info",
  diagnostics: true,
  patches: true,
});

/**
 * Resolve configuration: defaults, then `HCLPRINT_LOG_LEVEL`, then `input`.
 * Undefined fields in `input` are ignored. Throws `ConfigError` listing every
 * schema violation.
 */
export function resolveConfig(
  input: Partial<Record<keyof HclPrintConfig, unknown>> = {},
  env: NodeJS.ProcessEnv = process.env,
): HclPrintConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };

  const envLevel = env[LOG_LEVEL_ENV];
  if (envLevel) merged.logLevel = envLevel.trim().toLowerCase();

  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) merged[key] = value;
  }

  if (Check(HclPrintConfigSchema, merged)) {
    return merged;
  }
  throw new ConfigError(schemaErrors(HclPrintConfigSchema, merged));
}

/**
 * Print options for a resolved configuration. Sets the logger's level.
 */
export function toPrintOptions(config: HclPrintConfig, logger: HclLogger = getHclLogger()): PrintOptions {
  logger.setLevel(config.logLevel);
  return {
    logger,
    diagnostics: config.diagnostics,
    patches: config.patches,
  };
}
