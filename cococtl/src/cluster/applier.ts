import fs from "node:fs";
import path from "node:path";
import type { AppliedResource, ApplyOutcome, RuntimeManifest } from "../types/manifest.js";
import type { Reporter } from "../log/reporter.js";
import { Kubectl, numberField, stringField, type KubeObject } from "./kubectl.js";
import { ApplyError, errorDetail } from "../errors.js";

export type ApplierOptions = {
  kubectl: Kubectl;
  /** Resolved manifests are written here before `kubectl apply -f`. */
  manifestDir: string;
  reporter: Reporter;
};

type ApplyLine = { key: string; action: string };

/** `runtimeclass.node.k8s.io/kata unchanged` → { key: "runtimeclass/kata", action: "unchanged" } */
export function parseApplyLine(line: string): ApplyLine | null {
  const m = /^([^\s/]+)\/(\S+)\s+(.+)$/.exec(line);
  if (!m) return null;
  const resource = m[1].split(".")[0].toLowerCase();
  return { key: `${resource}/${m[2]}`, action: m[3].trim() };
}

function keyOf(obj: KubeObject): string {
  return `${(stringField(obj, "kind") ?? "").toLowerCase()}/${stringField(obj, "metadata", "name") ?? ""}`;
}

/** An apply changed something unless kubectl reported every resource unchanged. */
export function anyChanged(lines: string[]): boolean {
  return lines.some((l) => {
    const parsed = parseApplyLine(l);
    return parsed !== null && parsed.action !== "unchanged";
  });
}

/**
 * Declarative create-or-update against the cluster. Failures are surfaced as
 * ApplyError with kubectl's output; nothing is retried.
 */
export class ClusterApplier {
  constructor(private readonly opts: ApplierOptions) {}

  async applyManifest(manifest: RuntimeManifest, signal?: AbortSignal): Promise<ApplyOutcome> {
    const file = this.writeManifest(manifest);
    const kubectl = this.opts.kubectl;

    const before = await this.attempt(manifest.source, "read", () => kubectl.getFile(file, signal));
    const lines = await this.attempt(manifest.source, "apply", () => kubectl.applyFile(file, signal));
    const after = await this.attempt(manifest.source, "read back", () => kubectl.getFile(file, signal));

    const actions = new Map<string, string>();
    for (const line of lines) {
      const parsed = parseApplyLine(line);
      if (parsed) actions.set(parsed.key, parsed.action);
    }
    const generations = new Map(before.map((o) => [keyOf(o), numberField(o, "metadata", "generation")]));

    const resources: AppliedResource[] = after.map((o) => ({
      kind: stringField(o, "kind") ?? "",
      name: stringField(o, "metadata", "name") ?? "",
      namespace: stringField(o, "metadata", "namespace"),
      generationBefore: generations.get(keyOf(o)) ?? null,
      generationAfter: numberField(o, "metadata", "generation"),
      action: actions.get(keyOf(o)) ?? "unknown",
    }));

    const outcome: ApplyOutcome = {
      manifestKind: manifest.kind,
      source: manifest.source,
      clusterGenerationBefore: resources[0]?.generationBefore ?? null,
      clusterGenerationAfter: resources[0]?.generationAfter ?? null,
      applied: anyChanged(lines),
      resources,
    };
    this.report(outcome, lines);
    return outcome;
  }

  /** `kubectl apply -k` for a Kustomize directory or remote base. */
  async applyKustomize(target: string, signal?: AbortSignal): Promise<ApplyOutcome> {
    const lines = await this.attempt(target, "apply", () => this.opts.kubectl.applyKustomize(target, signal));
    const resources: AppliedResource[] = [];
    for (const line of lines) {
      const parsed = parseApplyLine(line);
      if (!parsed) continue;
      const [kind, name] = parsed.key.split("/");
      resources.push({ kind, name, namespace: null, generationBefore: null, generationAfter: null, action: parsed.action });
    }
    const outcome: ApplyOutcome = {
      manifestKind: "Kustomization",
      source: target,
      clusterGenerationBefore: null,
      clusterGenerationAfter: null,
      applied: anyChanged(lines),
      resources,
    };
    this.report(outcome, lines);
    return outcome;
  }

  /** Best effort; a node that cannot be labeled is reported, not fatal. */
  async labelNodes(labels: Record<string, string>, signal?: AbortSignal): Promise<void> {
    for (const [key, value] of Object.entries(labels)) {
      if (signal?.aborted) return;
      try {
        await this.opts.kubectl.labelAllNodes(`${key}=${value}`, signal);
        this.opts.reporter.info("NODES_LABELED", `Labeled nodes ${key}=${value}`);
      } catch (e) {
        this.opts.reporter.warn("NODE_LABEL_FAILED", `Could not label nodes ${key}=${value}; assuming they are labeled already`, {
          detail: errorDetail(e),
        });
      }
    }
  }

  async waitForCrd(crd: string, timeoutSeconds: number, signal?: AbortSignal): Promise<void> {
    this.opts.reporter.info("CRD_WAIT", `Waiting for CRD ${crd} to be established...`);
    await this.attempt(`crd/${crd}`, "wait for", () =>
      this.opts.kubectl.waitFor("condition=established", `crd/${crd}`, timeoutSeconds, signal),
    );
    this.opts.reporter.info("CRD_READY", `CRD ${crd} is ready.`);
  }

  private writeManifest(manifest: RuntimeManifest): string {
    fs.mkdirSync(this.opts.manifestDir, { recursive: true });
    const base = path.basename(manifest.source).replace(/[^A-Za-z0-9._-]/g, "_");
    const file = path.join(this.opts.manifestDir, base.endsWith(".yaml") || base.endsWith(".yml") ? base : `${base}.yaml`);
    fs.writeFileSync(file, manifest.rendered, "utf8");
    return file;
  }

  private async attempt<T>(target: string, verb: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new ApplyError(`Failed to ${verb} ${target}`, target, errorDetail(e));
    }
  }

  private report(outcome: ApplyOutcome, lines: string[]): void {
    const code = outcome.applied ? "APPLIED" : "UNCHANGED";
    const message = outcome.applied ? `Applied ${outcome.source}` : `${outcome.source} already converged`;
    this.opts.reporter.info(code, message, { kind: outcome.manifestKind, lines });
  }
}
