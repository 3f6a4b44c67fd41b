import { field, isRecord, numberField, stringField, type KubeEvent, type KubeObject } from "../cluster/kubectl.js";

export type Verdict =
  | { kind: "ready" }
  | { kind: "pending"; reason: string }
  | { kind: "failed"; reason: string };

/** Container waiting reasons that mean the runtime cannot start the workload. */
const FATAL_WAITING_REASONS = new Set([
  "CreateContainerError",
  "CreateContainerConfigError",
  "RunContainerError",
  "CrashLoopBackOff",
  "ErrImagePull",
  "ImagePullBackOff",
  "InvalidImageName",
]);

const SANDBOX_FAILURE = "FailedCreatePodSandBox";

function records(v: unknown): Record<string, unknown>[] {
  return Array.isArray(v) ? v.filter(isRecord) : [];
}

/**
 * Readiness of a CcRuntime from its status: explicit conditions first, then
 * the operator's per-node installation counters.
 */
export function evaluateCcRuntime(obj: KubeObject): Verdict {
  const conditions = records(field(obj, "status", "conditions"));
  const readyCond = conditions.find((c) => c.type === "Ready");

  const failedNodes = numberField(obj, "status", "installationStatus", "failed", "failedNodesCount") ?? 0;
  if (failedNodes > 0) {
    const list = field(obj, "status", "installationStatus", "failed", "failedNodesList");
    const nodes = Array.isArray(list) ? list.map(String).join(", ") : "unknown nodes";
    return { kind: "failed", reason: `runtime installation failed on ${failedNodes} node(s): ${nodes}` };
  }

  if (readyCond) {
    const status = stringField(readyCond, "status");
    const reason = stringField(readyCond, "reason") ?? "";
    const message = stringField(readyCond, "message") ?? reason;
    if (status === "True") return { kind: "ready" };
    if (status === "False" && /fail|error/i.test(reason)) {
      return { kind: "failed", reason: `ccruntime reports ${reason}: ${message}` };
    }
  }

  const total = numberField(obj, "status", "totalNodesCount") ?? 0;
  const completed = numberField(obj, "status", "installationStatus", "completed", "completedNodesCount") ?? 0;
  if (total > 0 && completed >= total) return { kind: "ready" };

  return { kind: "pending", reason: `runtime installation in progress (${completed}/${total} nodes)` };
}

/**
 * Preference entries are `name` or `name@arch`; the latter only counts on that
 * architecture.
 */
export function selectRuntimeClass(available: readonly string[], preference: readonly string[], arch: string): string | null {
  const present = new Set(available);
  for (const entry of preference) {
    const [name, onlyArch] = entry.split("@");
    if (onlyArch && onlyArch !== arch) continue;
    if (present.has(name)) return name;
  }
  return null;
}

/** Smoke workload outcome from the pod and its events. */
export function evaluateSmokePod(pod: KubeObject | null, events: readonly KubeEvent[]): Verdict {
  const sandbox = events.find((e) => e.reason === SANDBOX_FAILURE);
  if (sandbox) {
    return { kind: "failed", reason: `${SANDBOX_FAILURE}: ${sandbox.message ?? "pod sandbox could not be created"}` };
  }
  if (!pod) return { kind: "pending", reason: "smoke pod not created yet" };

  const phase = stringField(pod, "status", "phase") ?? "Unknown";
  const statuses = records(field(pod, "status", "containerStatuses"));

  if (phase === "Succeeded") return { kind: "ready" };

  for (const cs of statuses) {
    const name = stringField(cs, "name") ?? "container";
    const waiting = stringField(cs, "state", "waiting", "reason");
    if (waiting && FATAL_WAITING_REASONS.has(waiting)) {
      const message = stringField(cs, "state", "waiting", "message");
      return { kind: "failed", reason: `${name}: ${waiting}${message ? `: ${message}` : ""}` };
    }
  }

  if (phase === "Failed") {
    const terminated = statuses
      .map((cs) => stringField(cs, "state", "terminated", "reason"))
      .filter((r): r is string => r !== null);
    const why = terminated.length > 0 ? terminated.join(", ") : stringField(pod, "status", "reason") ?? "unknown reason";
    return { kind: "failed", reason: `smoke pod failed: ${why}` };
  }

  if (phase === "Running" && statuses.length > 0 && statuses.every((cs) => cs.ready === true)) {
    return { kind: "ready" };
  }

  return { kind: "pending", reason: `smoke pod is ${phase}` };
}
