/**
 * tf-hclprint — Type Definitions
 *
 * Resource entries, provider configuration and the aggregate document that
 * is encoded to JSON before it is re-parsed as HCL.
 */

// ── JSON values ─────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ── Input ───────────────────────────────────────────────────────

/** One named configuration block, e.g. `aws_instance` / `web-server`. */
export interface ResourceEntry {
  ResourceType: string;
  ResourceName: string;
  Item: JsonValue;
}

/** Provider name → provider configuration. Passed through unmodified. */
export type ProviderConfig = Record<string, JsonValue>;

// ── Document ────────────────────────────────────────────────────

/** Resource type → sanitized resource name → item. */
export type ResourcesByType = Record<string, Record<string, JsonValue>>;

export interface HclDocument {
  resource: ResourcesByType;
  provider: ProviderConfig;
}
