import fs from "node:fs";
import path from "node:path";
import type { ComponentSpec } from "../types/component.js";
import type { BuildResult } from "../types/build.js";
import type { RetryPolicy } from "../types/config.js";
import type { Reporter } from "../log/reporter.js";
import { GitOperations } from "../git/operations.js";
import { ContainerTool } from "./container-tool.js";
import { tailLines } from "../exec/tool.js";
import { NO_RETRY, sleep, withRetry, type Sleep } from "../core/retry.js";
import { imageReferenceFor } from "../version/resolver.js";
import { BuildError, PatchApplyError, SourceFetchError, errorDetail, errorMessage, throwIfCancelled } from "../errors.js";

export type ImageBuilderOptions = {
  git: GitOperations;
  tool: ContainerTool;
  /** Per-component work directories live under here. */
  workRoot: string;
  buildNamespace: string;
  targetArch: "amd64" | "arm64";
  logExcerptLines: number;
  fetchRetry?: RetryPolicy;
  reporter: Reporter;
  now?: () => number;
  wait?: Sleep;
};

/**
 * Image builder: fetch → patch → compile, strictly in that order.
 *
 * A failed fetch or patch removes the work tree before the error propagates.
 * An aborted signal stops the build before the next stage starts.
 */
export class ImageBuilder {
  private readonly now: () => number;

  constructor(private readonly opts: ImageBuilderOptions) {
    this.now = opts.now ?? Date.now;
  }

  workDirFor(spec: ComponentSpec): string {
    return path.join(this.opts.workRoot, `${spec.name}-${spec.declaredVersion}`, "src");
  }

  async build(spec: ComponentSpec, signal?: AbortSignal): Promise<BuildResult> {
    const started = this.now();
    const srcDir = this.workDirFor(spec);
    const tag = imageReferenceFor(spec.name, spec.declaredVersion);

    throwIfCancelled(signal, "fetch");
    await this.fetch(spec, srcDir, signal);
    throwIfCancelled(signal, "patch");
    await this.patch(spec, srcDir);
    throwIfCancelled(signal, "compile");
    const { digest, output } = await this.compile(spec, srcDir, tag, signal);

    return Object.freeze({
      componentName: spec.name,
      version: spec.declaredVersion,
      imageReference: tag,
      digest,
      buildDurationMs: this.now() - started,
      logExcerpt: tailLines(output, this.opts.logExcerptLines),
    });
  }

  private async fetch(spec: ComponentSpec, srcDir: string, signal?: AbortSignal): Promise<void> {
    this.opts.reporter.info("FETCH", `${spec.name}: fetching ${spec.source.repo} at ${spec.sourceRef}`);

    await withRetry(
      async (attempt) => {
        fs.rmSync(srcDir, { recursive: true, force: true });
        try {
          await this.opts.git.cloneAt(spec.source.repo, spec.sourceRef, srcDir);
        } catch (e) {
          fs.rmSync(srcDir, { recursive: true, force: true });
          throw new SourceFetchError(
            `${spec.name}: could not fetch ${spec.source.repo} at ${spec.sourceRef} (attempt ${attempt})`,
            spec.name,
            errorDetail(e),
          );
        }
      },
      this.opts.fetchRetry ?? NO_RETRY,
      (e) => e instanceof SourceFetchError,
      this.opts.wait ?? sleep,
      signal,
    );
  }

  private async patch(spec: ComponentSpec, srcDir: string): Promise<void> {
    if (spec.patchSet.length === 0) return;
    this.opts.reporter.info("PATCH", `${spec.name}: applying ${spec.patchSet.length} patch(es)`);

    const missing = spec.patchSet.filter((p) => !fs.existsSync(p));
    try {
      if (missing.length > 0) {
        throw new Error(`patch file(s) not found: ${missing.join(", ")}`);
      }
      await this.opts.git.checkPatches(srcDir, spec.patchSet);
      await this.opts.git.applyPatches(srcDir, spec.patchSet);
    } catch (e) {
      fs.rmSync(srcDir, { recursive: true, force: true });
      throw new PatchApplyError(
        `${spec.name}: patch set does not apply to ${spec.sourceRef}: ${errorMessage(e)}`,
        spec.name,
        [...spec.patchSet],
        errorDetail(e),
      );
    }
  }

  private async compile(
    spec: ComponentSpec,
    srcDir: string,
    tag: string,
    signal?: AbortSignal,
  ): Promise<{ digest: string; output: string }> {
    const ns = this.opts.buildNamespace;
    this.opts.reporter.info("COMPILE", `${spec.name}: building ${tag} (arch ${this.opts.targetArch}, namespace ${ns})`);

    let output: string;
    try {
      const request = {
        dockerfile: spec.buildStages.dockerfile,
        context: spec.buildStages.context ?? srcDir,
        tag,
        target: spec.buildStages.target,
        buildArgs: {
          TARGETARCH: this.opts.targetArch,
          VERSION: spec.declaredVersion,
          SOURCE_REF: spec.sourceRef,
          ...spec.buildStages.args,
        },
      };
      const res = await this.opts.tool.build(ns, request, signal);
      output = [res.stdout, res.stderr].join("\n");
    } catch (e) {
      throw new BuildError(`${spec.name}: image build failed`, spec.name, errorDetail(e));
    }

    let digest: string | null;
    try {
      digest = await this.opts.tool.inspectDigest(ns, tag, signal);
    } catch (e) {
      throw new BuildError(`${spec.name}: could not inspect ${tag}`, spec.name, errorDetail(e));
    }
    if (!digest) {
      throw new BuildError(`${spec.name}: build finished but ${tag} is missing from namespace ${ns}`, spec.name, tailLines(output, this.opts.logExcerptLines));
    }
    return { digest, output };
  }
}
