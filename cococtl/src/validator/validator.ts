import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ValidationConfig } from "../types/config.js";
import type { ApplyOutcome } from "../types/manifest.js";
import type { SmokeTestResult, ValidationReport, ValidatorState } from "../types/validation.js";
import type { Reporter } from "../log/reporter.js";
import { Kubectl, stringField } from "../cluster/kubectl.js";
import { sleep, type Sleep } from "../core/retry.js";
import { tailLines } from "../exec/tool.js";
import { errorDetail, errorMessage } from "../errors.js";
import { isTerminal, nextState, type ValidatorEvent } from "./state-machine.js";
import { evaluateCcRuntime, evaluateSmokePod, selectRuntimeClass, type Verdict } from "./readiness.js";

export type ValidatorOptions = {
  kubectl: Kubectl;
  config: ValidationConfig;
  arch: "amd64" | "arm64";
  /** Where the smoke pod manifest is written. */
  manifestDir: string;
  reporter: Reporter;
  now?: () => number;
  wait?: Sleep;
};

export type ValidateRequest = {
  /** Apply outcomes that preceded this validation, if any. */
  trigger?: readonly ApplyOutcome[];
  signal?: AbortSignal;
  /** Overrides the deadline picked from the trigger. */
  deadlineSeconds?: number;
};

type PollContext = {
  signal?: AbortSignal;
  runtimeClass: string | null;
  smokeStarted: boolean;
  smoke: SmokeTestResult | null;
};

const DESCRIBE_TAIL_LINES = 20;

/**
 * Polls the cluster until the confidential runtime is usable, a conclusive
 * failure shows up, or the deadline passes.
 *
 * Ready needs both signals: the CcRuntime reports ready AND a smoke pod under
 * the selected RuntimeClass starts. One instance runs once.
 */
export class Validator {
  private current: ValidatorState = "Pending";
  private readonly now: () => number;
  private readonly wait: Sleep;

  constructor(private readonly opts: ValidatorOptions) {
    this.now = opts.now ?? Date.now;
    this.wait = opts.wait ?? sleep;
  }

  get state(): ValidatorState {
    return this.current;
  }

  /** Deadline in seconds: the full one after a real change, the short one to confirm a converged cluster. */
  deadlineFor(req: ValidateRequest): number {
    if (req.deadlineSeconds !== undefined) return req.deadlineSeconds;
    const changed = (req.trigger ?? []).some((o) => o.applied);
    return changed ? this.opts.config.deadline_seconds : this.opts.config.converged_deadline_seconds;
  }

  async run(req: ValidateRequest = {}): Promise<ValidationReport> {
    const started = this.now();
    const deadline = started + this.deadlineFor(req) * 1000;
    const interval = this.opts.config.poll_interval_seconds * 1000;
    const ctx: PollContext = { signal: req.signal, runtimeClass: null, smokeStarted: false, smoke: null };

    this.transition("start");
    let lastReason = "no check completed";

    const finish = (event: ValidatorEvent, reason: string | null): ValidationReport => {
      const state = this.transition(event);
      if (!isTerminal(state)) throw new Error(`Validator finished in non-terminal state ${state}`);
      return {
        state,
        ready: state === "Ready",
        elapsedMs: this.now() - started,
        failureReason: reason,
        runtimeClass: ctx.runtimeClass,
        smokeTestResult: ctx.smoke,
      };
    };

    for (;;) {
      if (req.signal?.aborted) return finish("cancelled", `cancelled while polling: ${lastReason}`);
      if (this.now() >= deadline) return finish("deadline", `deadline elapsed: ${lastReason}`);

      let verdict: Verdict;
      try {
        verdict = await this.poll(ctx);
      } catch (e) {
        if (req.signal?.aborted) return finish("cancelled", `cancelled while polling: ${lastReason}`);
        verdict = { kind: "pending", reason: `cluster query failed: ${errorMessage(e)}` };
      }

      if (verdict.kind === "ready") return finish("ready", null);
      if (verdict.kind === "failed") return finish("failed", verdict.reason);

      this.transition("inconclusive");
      lastReason = verdict.reason;
      this.opts.reporter.info("POLLING", `Not ready yet: ${verdict.reason}`);

      const remaining = deadline - this.now();
      await this.wait(Math.max(0, Math.min(interval, remaining)), req.signal);
    }
  }

  private transition(event: ValidatorEvent): ValidatorState {
    this.current = nextState(this.current, event);
    return this.current;
  }

  private async poll(ctx: PollContext): Promise<Verdict> {
    const { kubectl, config } = this.opts;

    const cc = await kubectl.get("ccruntime", config.cc_runtime_name, null, ctx.signal);
    if (!cc) {
      return { kind: "failed", reason: `ccruntime/${config.cc_runtime_name} does not exist; run setup first` };
    }
    const resource = evaluateCcRuntime(cc);
    if (resource.kind !== "ready") return resource;

    if (!ctx.runtimeClass) {
      const classes = await kubectl.list("runtimeclass", null, ctx.signal);
      const names = classes.map((c) => stringField(c, "metadata", "name")).filter((n): n is string => n !== null);
      ctx.runtimeClass = selectRuntimeClass(names, config.runtime_class_preference, this.opts.arch);
      if (!ctx.runtimeClass) {
        return { kind: "pending", reason: `none of the runtime classes ${config.runtime_class_preference.join(", ")} exist yet` };
      }
      this.opts.reporter.info("RUNTIME_CLASS", `Target RuntimeClass: ${ctx.runtimeClass}`);
    }

    return this.smoke(ctx, ctx.runtimeClass);
  }

  private async smoke(ctx: PollContext, runtimeClass: string): Promise<Verdict> {
    const { kubectl } = this.opts;
    const { pod_name: podName, namespace } = this.opts.config.smoke;

    if (!ctx.smokeStarted) {
      await kubectl.deletePod(podName, namespace, ctx.signal);
      try {
        await kubectl.applyFile(this.writeSmokePod(runtimeClass), ctx.signal);
      } catch (e) {
        if (ctx.signal?.aborted) throw e;
        ctx.smoke = this.smokeResult(runtimeClass, "NotCreated", false, null, errorDetail(e));
        return { kind: "failed", reason: `smoke pod rejected: ${errorMessage(e)}` };
      }
      ctx.smokeStarted = true;
      this.opts.reporter.info("SMOKE_STARTED", `Deployed smoke pod ${podName} under ${runtimeClass}`);
    }

    const pod = await kubectl.get("pod", podName, namespace, ctx.signal);
    const events = await kubectl.podEvents(podName, namespace, ctx.signal);
    const verdict = evaluateSmokePod(pod, events);
    const phase = (pod && stringField(pod, "status", "phase")) ?? "Unknown";

    if (verdict.kind === "failed") {
      const description = await kubectl.describePod(podName, namespace, ctx.signal).catch((e: unknown) => errorDetail(e));
      ctx.smoke = this.smokeResult(runtimeClass, phase, false, null, tailLines(description, DESCRIBE_TAIL_LINES));
    } else if (verdict.kind === "ready") {
      const kernel = phase === "Running" ? await this.kernelOf(podName, namespace, ctx.signal) : null;
      ctx.smoke = this.smokeResult(runtimeClass, phase, true, kernel, null);
    }
    return verdict;
  }

  private async kernelOf(podName: string, namespace: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const kernel = await this.opts.kubectl.execInPod(podName, namespace, ["uname", "-r"], signal);
      this.opts.reporter.info("SMOKE_KERNEL", `Pod kernel: ${kernel}`);
      return kernel;
    } catch (e) {
      this.opts.reporter.warn("SMOKE_KERNEL_UNKNOWN", "Could not read the kernel version inside the smoke pod", { detail: errorDetail(e) });
      return null;
    }
  }

  private smokeResult(runtimeClass: string, phase: string, succeeded: boolean, kernel: string | null, detail: string | null): SmokeTestResult {
    return { podName: this.opts.config.smoke.pod_name, runtimeClass, phase, succeeded, kernel, detail };
  }

  private writeSmokePod(runtimeClass: string): string {
    const { pod_name: podName, namespace, image } = this.opts.config.smoke;
    const pod = {
      apiVersion: "v1",
      kind: "Pod",
      metadata: { name: podName, namespace, labels: { app: podName } },
      spec: {
        restartPolicy: "Never",
        runtimeClassName: runtimeClass,
        containers: [{ name: "smoke", image }],
      },
    };
    fs.mkdirSync(this.opts.manifestDir, { recursive: true });
    const file = path.join(this.opts.manifestDir, "smoke-pod.yaml");
    fs.writeFileSync(file, YAML.stringify(pod), "utf8");
    return file;
  }
}
