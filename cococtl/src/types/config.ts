/** Configuration types: base.yaml ← {env}.yaml ← COCO_* variables. */
export type TargetArch = "auto" | "amd64" | "arm64";

export type ComponentConfig = {
  version: string;
  source: { repo: string; ref?: string };
  patches?: string[];
  dockerfile: string;
  context?: string;
  target?: string;
  build_args?: Record<string, string>;
};

export type RetryPolicy = {
  attempts: number;
  backoff_ms: number;
};

export type SmokeConfig = {
  pod_name: string;
  namespace: string;
  image: string;
};

export type ValidationConfig = {
  cc_runtime_name: string;
  poll_interval_seconds: number;
  deadline_seconds: number;
  converged_deadline_seconds: number;
  runtime_class_preference: string[];
  smoke: SmokeConfig;
};

export type CocoConfig = {
  schema_version: string;
  /** Directory relative paths resolve against; set by the loader. */
  root_dir: string;
  state_dir: string;
  build_tool: string;
  kubectl: string;
  target_arch: TargetArch;
  images: { build_namespace: string; runtime_namespace: string };
  build: { max_parallel: number; log_excerpt_lines: number };
  components: Record<string, ComponentConfig>;
  operator: { version: string; kustomize: string; crd: string };
  manifests: { runtime_classes?: string; cc_runtime: string; overlays?: string[] };
  node_labels?: Record<string, string>;
  validation: ValidationConfig;
  retry?: { source_fetch?: RetryPolicy; registration?: RetryPolicy };
};
