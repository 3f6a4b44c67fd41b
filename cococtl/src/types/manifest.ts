export type RuntimeManifestKind = "RuntimeClass" | "CcRuntime";

export type ManifestKind = RuntimeManifestKind | "Kustomization";

export type RuntimeManifest = {
  readonly kind: RuntimeManifestKind;
  /** Template path (or a label for in-memory templates). */
  readonly source: string;
  readonly rawTemplate: string;
  /** Field path → image reference; filled by the manifest patcher. */
  resolvedImageRefs: Record<string, string>;
  /** Re-serialised YAML with every known image reference substituted. */
  rendered: string;
};

export type AppliedResource = {
  kind: string;
  name: string;
  namespace: string | null;
  generationBefore: number | null;
  generationAfter: number | null;
  action: string;
};

export type ApplyOutcome = {
  manifestKind: ManifestKind;
  source: string;
  clusterGenerationBefore: number | null;
  clusterGenerationAfter: number | null;
  /** False when the cluster was already converged. */
  applied: boolean;
  resources: AppliedResource[];
};
