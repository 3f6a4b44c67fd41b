import { describeErrors, loadAjv } from "../schema/ajv.js";
import type { CocoConfig } from "../types/config.js";

type LoadedConfig = Omit<CocoConfig, "root_dir">;

const STRING_MAP = { type: "object", additionalProperties: { type: "string" } };

const RETRY_POLICY = {
  type: "object",
  required: ["attempts", "backoff_ms"],
  properties: {
    attempts: { type: "integer", minimum: 1 },
    backoff_ms: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
};

const COMPONENT_SCHEMA = {
  type: "object",
  required: ["version", "source", "dockerfile"],
  properties: {
    version: { type: "string", minLength: 1 },
    source: {
      type: "object",
      required: ["repo"],
      properties: {
        repo: { type: "string", minLength: 1 },
        ref: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
    patches: { type: "array", items: { type: "string", minLength: 1 } },
    dockerfile: { type: "string", minLength: 1 },
    context: { type: "string", minLength: 1 },
    target: { type: "string", minLength: 1 },
    build_args: STRING_MAP,
  },
  additionalProperties: false,
};

/** Config schema; version strings are checked later by the version resolver. */
const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "state_dir",
    "build_tool",
    "kubectl",
    "target_arch",
    "images",
    "build",
    "components",
    "operator",
    "manifests",
    "validation",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    state_dir: { type: "string", minLength: 1 },
    build_tool: { type: "string", minLength: 1 },
    kubectl: { type: "string", minLength: 1 },
    target_arch: { type: "string", enum: ["auto", "amd64", "arm64"] },
    images: {
      type: "object",
      required: ["build_namespace", "runtime_namespace"],
      properties: {
        build_namespace: { type: "string", minLength: 1 },
        runtime_namespace: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
    build: {
      type: "object",
      required: ["max_parallel", "log_excerpt_lines"],
      properties: {
        max_parallel: { type: "integer", minimum: 1 },
        log_excerpt_lines: { type: "integer", minimum: 1 },
      },
      additionalProperties: false,
    },
    components: {
      type: "object",
      propertyNames: { type: "string", pattern: "^[a-z0-9][a-z0-9._-]*$" },
      additionalProperties: COMPONENT_SCHEMA,
    },
    operator: {
      type: "object",
      required: ["version", "kustomize", "crd"],
      properties: {
        version: { type: "string", minLength: 1 },
        kustomize: { type: "string", minLength: 1 },
        crd: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
    manifests: {
      type: "object",
      required: ["cc_runtime"],
      properties: {
        runtime_classes: { type: "string", minLength: 1 },
        cc_runtime: { type: "string", minLength: 1 },
        overlays: { type: "array", items: { type: "string", minLength: 1 } },
      },
      additionalProperties: false,
    },
    node_labels: STRING_MAP,
    validation: {
      type: "object",
      required: [
        "cc_runtime_name",
        "poll_interval_seconds",
        "deadline_seconds",
        "converged_deadline_seconds",
        "runtime_class_preference",
        "smoke",
      ],
      properties: {
        cc_runtime_name: { type: "string", minLength: 1 },
        poll_interval_seconds: { type: "number", exclusiveMinimum: 0 },
        deadline_seconds: { type: "number", exclusiveMinimum: 0 },
        converged_deadline_seconds: { type: "number", exclusiveMinimum: 0 },
        runtime_class_preference: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
        smoke: {
          type: "object",
          required: ["pod_name", "namespace", "image"],
          properties: {
            pod_name: { type: "string", minLength: 1 },
            namespace: { type: "string", minLength: 1 },
            image: { type: "string", minLength: 1 },
          },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
    retry: {
      type: "object",
      properties: {
        source_fetch: RETRY_POLICY,
        registration: RETRY_POLICY,
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export type ConfigValidationResult =
  | { valid: true; config: LoadedConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<LoadedConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: describeErrors(ajv, validate.errors, "config") };
}
