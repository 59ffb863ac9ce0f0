import { loadAjv } from "../schema/ajv.js";
import type { TrainctlConfig } from "../types/config.js";

const positiveInt = (def: number) => ({ type: "integer", minimum: 1, default: def });

/** Config schema. Defaults are filled in by ajv during validation. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "environment", "execution"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    environment: { type: "string", pattern: "^[A-Za-z0-9][A-Za-z0-9._-]*$" },
    units_file: { type: "string", minLength: 1, default: "config/units.yaml" },
    state_dir: { type: "string", minLength: 1, default: ".trainctl" },
    approvals_dir: { type: "string", minLength: 1, default: ".trainctl/approvals" },
    stores: {
      type: "object",
      default: {},
      properties: {
        training: { type: "string", minLength: 1, default: ".trainctl/registry/{environment}" },
        shared: { type: "string", minLength: 1, default: ".trainctl/registry/shared" },
      },
    },
    selection: {
      type: "object",
      default: {},
      properties: {
        allow_full_retrain_without_baseline: { type: "boolean", default: false },
      },
    },
    submission: {
      type: "object",
      default: {},
      properties: {
        max_in_flight: positiveInt(5),
        retry_delays_seconds: {
          type: "array",
          items: { type: "number", minimum: 0 },
          maxItems: 10,
          default: [30, 60],
        },
      },
    },
    monitor: {
      type: "object",
      default: {},
      properties: {
        initial_interval_seconds: positiveInt(30),
        max_interval_seconds: positiveInt(300),
        max_wait_seconds: positiveInt(10800),
        heartbeat_seconds: positiveInt(14400),
      },
    },
    retry: {
      type: "object",
      default: {},
      properties: {
        enabled: { type: "boolean", default: true },
        approval_timeout_seconds: positiveInt(14400),
      },
    },
    registration: {
      type: "object",
      default: {},
      properties: {
        min_success_ratio: { type: "number", minimum: 0, maximum: 1, default: 0.9 },
      },
    },
    promotion: {
      type: "object",
      default: {},
      properties: {
        approval_timeout_hours: { type: "number", minimum: 24, maximum: 720, default: 24 },
        visibility: {
          type: "object",
          default: {},
          properties: {
            initial_ms: positiveInt(2000),
            max_ms: positiveInt(30000),
            ceiling_ms: positiveInt(120000),
          },
        },
      },
    },
    execution: {
      type: "object",
      required: ["submit", "status", "cancel"],
      properties: {
        submit: { type: "array", items: { type: "string" }, minItems: 1 },
        status: { type: "array", items: { type: "string" }, minItems: 1 },
        cancel: { type: "array", items: { type: "string" }, minItems: 1 },
      },
    },
    lineage: {
      type: "object",
      default: {},
      properties: {
        exclude_keys: {
          type: "array",
          items: { type: "string" },
          default: ["metadata", "lineage_hash", "generated_at"],
        },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: TrainctlConfig }
  | { valid: false; errors: string };

/**
 * Validate a loaded config against the config schema. Coerces environment
 * override strings and fills defaults in place.
 */
export async function validateConfig(raw: Record<string, unknown>): Promise<ConfigValidationResult> {
  const ajv = await loadAjv({ coerceTypes: true, useDefaults: true });
  const validate = ajv.compile<TrainctlConfig>(CONFIG_SCHEMA);
  if (validate(raw)) {
    return { valid: true, config: raw };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
