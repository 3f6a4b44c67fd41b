import path from "node:path";
import { minimatch } from "minimatch";
import type { CocoConfig } from "../types/config.js";
import type { BuildResult, RegistrationOutcome } from "../types/build.js";
import type { ApplyOutcome, RuntimeManifest } from "../types/manifest.js";
import type { ValidationReport } from "../types/validation.js";
import type { Reporter } from "../log/reporter.js";
import { runTool, type ToolRunner } from "../exec/tool.js";
import { resolvePath } from "../config/loader.js";
import { GitOperations } from "../git/operations.js";
import { ContainerTool } from "../image/container-tool.js";
import { ImageBuilder } from "../image/builder.js";
import { LocalImageRegistrar } from "../image/registrar.js";
import { loadTemplate, patchManifest } from "../manifest/patcher.js";
import { Kubectl } from "../cluster/kubectl.js";
import { ClusterApplier } from "../cluster/applier.js";
import { Validator } from "../validator/validator.js";
import { detectPlatform, targetArch, type PlatformInfo } from "../platform/detect.js";
import { checkPrereqs, type PrereqName, type PrereqReport } from "../platform/prereqs.js";
import { componentNames, imageReferenceFor, resolveComponent } from "../version/resolver.js";
import { BuildCache } from "./build-cache.js";
import { KeyedLock, runPool } from "./concurrency.js";
import type { Sleep } from "./retry.js";
import {
  ConfigurationError,
  PrerequisiteError,
  RegistrationError,
  throwIfCancelled,
  toCocoError,
  type CocoError,
  type Stage,
} from "../errors.js";

export type ControllerDeps = {
  config: CocoConfig;
  reporter: Reporter;
  /** Runs the container CLI and kubectl. */
  runner?: ToolRunner;
  git?: GitOperations;
  platform?: PlatformInfo;
  now?: () => number;
  wait?: Sleep;
};

export type ComponentBuildOutcome =
  | { component: string; ok: true; result: BuildResult; registration: RegistrationOutcome }
  | { component: string; ok: false; error: CocoError };

export type BuildReport = {
  ok: boolean;
  outcomes: ComponentBuildOutcome[];
};

export type SetupReport = {
  ok: boolean;
  failedStage: Stage | null;
  error: CocoError | null;
  builds: ComponentBuildOutcome[];
  manifests: RuntimeManifest[];
  applied: ApplyOutcome[];
  validation: ValidationReport | null;
};

export type ValidateOptions = {
  signal?: AbortSignal;
  deadlineSeconds?: number;
};

const CRD_WAIT_SECONDS = 60;

/**
 * Sequences build, setup and validate.
 *
 * Owns the process-scoped build cache and the locks that keep two builds of
 * the same image reference (or two applies of the same manifest) apart.
 */
export class LifecycleController {
  readonly cache = new BuildCache();
  private readonly buildLocks = new KeyedLock();
  private readonly manifestLocks = new KeyedLock();

  private readonly config: CocoConfig;
  private readonly reporter: Reporter;
  private readonly platform: PlatformInfo;
  private readonly arch: "amd64" | "arm64";
  private readonly stateDir: string;
  private readonly tool: ContainerTool;
  private readonly kubectl: Kubectl;
  private readonly builder: ImageBuilder;
  private readonly registrar: LocalImageRegistrar;
  private readonly applier: ClusterApplier;

  constructor(private readonly deps: ControllerDeps) {
    const { config, reporter } = deps;
    const runner = deps.runner ?? runTool;

    this.config = config;
    this.reporter = reporter;
    this.platform = deps.platform ?? detectPlatform();
    this.arch = targetArch(config.target_arch, this.platform.machine);
    this.stateDir = resolvePath(config, config.state_dir);
    this.tool = new ContainerTool(config.build_tool, runner);
    this.kubectl = new Kubectl(config.kubectl, runner);

    this.builder = new ImageBuilder({
      git: deps.git ?? new GitOperations(),
      tool: this.tool,
      workRoot: path.join(this.stateDir, "build"),
      buildNamespace: config.images.build_namespace,
      targetArch: this.arch,
      logExcerptLines: config.build.log_excerpt_lines,
      fetchRetry: config.retry?.source_fetch,
      reporter,
      now: deps.now,
      wait: deps.wait,
    });
    this.registrar = new LocalImageRegistrar({
      tool: this.tool,
      buildNamespace: config.images.build_namespace,
      runtimeNamespace: config.images.runtime_namespace,
      stagingDir: path.join(this.stateDir, "images"),
      retry: config.retry?.registration,
      wait: deps.wait,
    });
    this.applier = new ClusterApplier({
      kubectl: this.kubectl,
      manifestDir: path.join(this.stateDir, "manifests"),
      reporter,
    });
  }

  /**
   * Expand component arguments (names or globs) against the configuration.
   * No arguments means every configured component.
   */
  selectComponents(patterns: readonly string[] = []): string[] {
    const all = componentNames(this.config);
    if (patterns.length === 0) return all;

    const selected = new Set<string>();
    for (const pattern of patterns) {
      const matches = all.includes(pattern) ? [pattern] : all.filter((name) => minimatch(name, pattern));
      if (matches.length === 0) {
        throw new ConfigurationError(`Unknown component: ${pattern}`, `configured components: ${all.join(", ")}`);
      }
      for (const m of matches) selected.add(m);
    }
    return [...selected];
  }

  /**
   * Resolve → build → register each component. Independent components run in
   * parallel and one failure does not stop the others, unless `failFast` is
   * set, which builds in order and stops at the first failure. Components not
   * started when `signal` aborts are reported as cancelled.
   */
  async build(
    patterns: readonly string[] = [],
    opts: { failFast?: boolean; signal?: AbortSignal } = {},
  ): Promise<BuildReport> {
    const components = this.selectComponents(patterns);
    this.reporter.section(`Building ${components.join(", ")}`);

    const outcomes: ComponentBuildOutcome[] = [];
    if (opts.failFast) {
      for (const component of components) {
        const outcome = await this.buildOne(component, opts.signal);
        outcomes.push(outcome);
        if (!outcome.ok) break;
      }
    } else {
      const settled = await runPool(components, this.config.build.max_parallel, (c) => this.buildOne(c, opts.signal));
      settled.forEach((s, i) => {
        outcomes.push(s.ok ? s.value : { component: components[i], ok: false, error: toCocoError(s.error, "compile", opts.signal) });
      });
    }

    return { ok: outcomes.every((o) => o.ok), outcomes };
  }

  private async buildOne(component: string, signal?: AbortSignal): Promise<ComponentBuildOutcome> {
    try {
      throwIfCancelled(signal, "resolve");
      const spec = resolveComponent(this.config, component);
      const ref = imageReferenceFor(spec.name, spec.declaredVersion);
      return await this.buildLocks.withLock(ref, async () => {
        const result = await this.builder.build(spec, signal);
        const registration = await this.registrar.register(result, signal);
        this.cache.put(result);
        this.reporter.info("BUILT", `${component}: ${result.imageReference} (${result.digest})`, {
          component,
          imageReference: result.imageReference,
          digest: result.digest,
          durationMs: result.buildDurationMs,
          registered: registration.changed,
        });
        return { component, ok: true as const, result, registration };
      });
    } catch (e) {
      const error = toCocoError(e, "compile", signal);
      this.reporter.error(error.code, `${component}: ${error.stage} failed: ${error.message}`, {
        component,
        stage: error.stage,
        detail: error.detail ?? "",
      });
      return { component, ok: false, error };
    }
  }

  /**
   * Build (unless results are cached) → patch → apply → validate. Every
   * template is patched and its images checked before the first change to the
   * cluster. Stops at the first failing stage, or where `signal` aborts;
   * nothing already applied is rolled back.
   */
  async setup(opts: { signal?: AbortSignal } = {}): Promise<SetupReport> {
    const { signal } = opts;
    const report: SetupReport = {
      ok: false,
      failedStage: null,
      error: null,
      builds: [],
      manifests: [],
      applied: [],
      validation: null,
    };
    let stage: Stage = "compile";

    try {
      let built: BuildResult[] = [];
      if (this.cache.size === 0) {
        this.reporter.info("BUILD_FIRST", "No build results in this session; building all components first");
        const res = await this.build([], { failFast: true, signal });
        report.builds = res.outcomes;
        const failed = res.outcomes.find((o) => !o.ok);
        if (failed && !failed.ok) {
          report.failedStage = failed.error.stage;
          report.error = failed.error;
          return report;
        }
        built = res.outcomes.flatMap((o) => (o.ok ? [o.result] : []));
      }

      this.reporter.section("Setting up Confidential Containers");

      stage = "patch-manifest";
      const templates = [this.config.manifests.runtime_classes, this.config.manifests.cc_runtime]
        .filter((t): t is string => typeof t === "string")
        .map((t) => resolvePath(this.config, t));
      for (const file of templates) {
        report.manifests.push(
          patchManifest(loadTemplate(file), {
            built,
            cached: this.cache.all(),
            knownComponents: componentNames(this.config),
          }),
        );
      }

      stage = "register";
      for (const manifest of report.manifests) {
        await this.ensureImagesPresent(manifest, signal);
      }

      stage = "apply";
      throwIfCancelled(signal, stage);
      if (this.config.node_labels) await this.applier.labelNodes(this.config.node_labels, signal);
      const { operator } = this.config;
      throwIfCancelled(signal, stage);
      report.applied.push(await this.applier.applyKustomize(`${operator.kustomize}?ref=${operator.version}`, signal));
      await this.applier.waitForCrd(operator.crd, CRD_WAIT_SECONDS, signal);
      for (const overlay of this.config.manifests.overlays ?? []) {
        throwIfCancelled(signal, stage);
        report.applied.push(await this.applier.applyKustomize(resolvePath(this.config, overlay), signal));
      }
      for (const manifest of report.manifests) {
        throwIfCancelled(signal, stage);
        report.applied.push(
          await this.manifestLocks.withLock(manifest.source, () => this.applier.applyManifest(manifest, signal)),
        );
      }

      stage = "validate";
      this.reporter.section("Validating CoCo Installation");
      const validation = await this.newValidator().run({ trigger: report.applied, signal });
      report.validation = validation;
      report.ok = validation.ready;
      if (!validation.ready) report.failedStage = "validate";
      return report;
    } catch (e) {
      const error = toCocoError(e, stage, signal);
      report.failedStage = error.stage;
      report.error = error;
      return report;
    }
  }

  /** Read-only health check of what is already on the cluster. */
  async validate(opts: ValidateOptions = {}): Promise<ValidationReport> {
    this.reporter.section("Validating CoCo Installation");
    return this.newValidator().run({ signal: opts.signal, deadlineSeconds: opts.deadlineSeconds });
  }

  async check(): Promise<PrereqReport> {
    this.reporter.section("Checking Prerequisites");
    const report = await checkPrereqs({ kubectl: this.kubectl, tool: this.tool, platform: this.platform });
    this.reporter.info("PLATFORM", `Detected platform: OS=${report.platform.system}, Arch=${report.platform.machine} (images: ${this.arch})`);
    for (const c of report.checks) {
      if (c.ok) this.reporter.info("PREREQ_OK", `${c.name}: ${c.detail.split("\n")[0]}`);
      else if (c.severity === "warn") this.reporter.warn("PREREQ_WARN", `${c.name}: ${c.detail}`);
      else this.reporter.error("PREREQ_FAILED", `${c.name} check failed`, { detail: c.detail });
    }
    return report;
  }

  /**
   * Fails with PrerequisiteError, after reporting each failing check, unless
   * every named prerequisite is met.
   */
  async requirePrereqs(names: readonly PrereqName[]): Promise<void> {
    const report = await checkPrereqs({ kubectl: this.kubectl, tool: this.tool, platform: this.platform, only: names });
    const failed = report.checks.filter((c) => !c.ok);
    if (failed.length === 0) return;
    for (const c of failed) this.reporter.error("PREREQ_FAILED", `${c.name} check failed`, { detail: c.detail });
    throw new PrerequisiteError(
      failed.map((c) => c.name),
      failed.map((c) => `${c.name}: ${c.detail}`).join("\n"),
    );
  }

  private async ensureImagesPresent(manifest: RuntimeManifest, signal?: AbortSignal): Promise<void> {
    for (const ref of new Set(Object.values(manifest.resolvedImageRefs))) {
      if (!(await this.registrar.imageExists(ref, signal))) {
        throw new RegistrationError(`${ref} is not present in namespace ${this.registrar.namespace}; rebuild it`, ref);
      }
    }
  }

  private newValidator(): Validator {
    return new Validator({
      kubectl: this.kubectl,
      config: this.config.validation,
      arch: this.arch,
      manifestDir: path.join(this.stateDir, "manifests"),
      reporter: this.reporter,
      now: this.deps.now,
      wait: this.deps.wait,
    });
  }
}
