/** A component as resolved for one run. Frozen once loaded. */
export type ComponentSpec = Readonly<{
  name: string;
  declaredVersion: string;
  sourceRef: string;
  source: Readonly<{ repo: string }>;
  /** Absolute patch paths, in application order. */
  patchSet: readonly string[];
  buildStages: BuildStages;
}>;

export type BuildStages = Readonly<{
  dockerfile: string;
  /** Explicit build context; the patched source tree when absent. */
  context: string | null;
  target: string | null;
  args: Readonly<Record<string, string>>;
}>;
