import { runTool, type ToolOutput, type ToolRunner } from "../exec/tool.js";
import { ToolError } from "../errors.js";

/** A Kubernetes object as decoded from `kubectl -o json`. */
export type KubeObject = Record<string, unknown>;

export type KubeEvent = {
  reason: string | null;
  message: string | null;
  type: string | null;
};

export function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

/** Value at a nested path, or undefined. */
export function field(obj: unknown, ...path: string[]): unknown {
  let cur = obj;
  for (const key of path) {
    if (!isRecord(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

export function stringField(obj: unknown, ...path: string[]): string | null {
  const v = field(obj, ...path);
  return typeof v === "string" ? v : null;
}

export function numberField(obj: unknown, ...path: string[]): number | null {
  const v = field(obj, ...path);
  return typeof v === "number" ? v : null;
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`kubectl returned invalid JSON for ${what}`);
  }
}

/** Objects from `kubectl get -o json`: a single object or a List. */
export function objectsFromJson(text: string, what: string): KubeObject[] {
  if (text.trim().length === 0) return [];
  const parsed = parseJson(text, what);
  if (!isRecord(parsed)) return [];
  const items = parsed.items;
  if (Array.isArray(items)) return items.filter(isRecord);
  return [parsed];
}

/** Absent object, or a kind whose CRD is not installed yet. */
function isNotFound(e: unknown): boolean {
  return e instanceof ToolError && /NotFound|not found|doesn't have a resource type/.test(e.stderr);
}

/**
 * kubectl wrapper. Every call can be aborted through `signal`.
 */
export class Kubectl {
  constructor(
    private readonly binary: string,
    private readonly run: ToolRunner = runTool,
  ) {}

  exec(args: string[], signal?: AbortSignal): Promise<ToolOutput> {
    return this.run(this.binary, args, { signal });
  }

  /** One object, or null when it does not exist. */
  async get(kind: string, name: string, namespace: string | null, signal?: AbortSignal): Promise<KubeObject | null> {
    const args = ["get", kind, name, "-o", "json"];
    if (namespace) args.push("-n", namespace);
    try {
      const { stdout } = await this.exec(args, signal);
      return objectsFromJson(stdout, `${kind}/${name}`)[0] ?? null;
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async list(kind: string, namespace: string | null, signal?: AbortSignal): Promise<KubeObject[]> {
    const args = ["get", kind, "-o", "json"];
    if (namespace) args.push("-n", namespace);
    const { stdout } = await this.exec(args, signal);
    return objectsFromJson(stdout, kind);
  }

  /** Current state of every resource a manifest file names; absent ones are skipped. */
  async getFile(file: string, signal?: AbortSignal): Promise<KubeObject[]> {
    const { stdout } = await this.exec(["get", "-f", file, "-o", "json", "--ignore-not-found"], signal);
    return objectsFromJson(stdout, file);
  }

  /** `kubectl apply`, returning its per-resource lines (`kind/name configured`). */
  async applyFile(file: string, signal?: AbortSignal): Promise<string[]> {
    const { stdout } = await this.exec(["apply", "-f", file], signal);
    return nonEmptyLines(stdout);
  }

  async applyKustomize(target: string, signal?: AbortSignal): Promise<string[]> {
    const { stdout } = await this.exec(["apply", "-k", target], signal);
    return nonEmptyLines(stdout);
  }

  async waitFor(condition: string, resource: string, timeoutSeconds: number, signal?: AbortSignal): Promise<void> {
    await this.exec(["wait", "--for", condition, resource, `--timeout=${timeoutSeconds}s`], signal);
  }

  async labelAllNodes(label: string, signal?: AbortSignal): Promise<void> {
    await this.exec(["label", "nodes", "--all", label, "--overwrite"], signal);
  }

  async deletePod(name: string, namespace: string, signal?: AbortSignal): Promise<void> {
    await this.exec(["delete", "pod", name, "-n", namespace, "--ignore-not-found=true", "--wait=true"], signal);
  }

  async podEvents(name: string, namespace: string, signal?: AbortSignal): Promise<KubeEvent[]> {
    const { stdout } = await this.exec(
      ["get", "events", "-n", namespace, "--field-selector", `involvedObject.name=${name}`, "-o", "json"],
      signal,
    );
    return objectsFromJson(stdout, "events").map((o) => ({
      reason: stringField(o, "reason"),
      message: stringField(o, "message"),
      type: stringField(o, "type"),
    }));
  }

  async describePod(name: string, namespace: string, signal?: AbortSignal): Promise<string> {
    const { stdout } = await this.exec(["describe", "pod", name, "-n", namespace], signal);
    return stdout;
  }

  async execInPod(name: string, namespace: string, command: string[], signal?: AbortSignal): Promise<string> {
    const { stdout } = await this.exec(["exec", name, "-n", namespace, "--", ...command], signal);
    return stdout.trim();
  }

  async clusterInfo(): Promise<string> {
    const { stdout } = await this.exec(["cluster-info"]);
    return stdout.trim();
  }

  async clientVersion(): Promise<string> {
    const { stdout } = await this.exec(["version", "--client"]);
    return stdout.trim();
  }
}

function nonEmptyLines(text: string): string[] {
  return text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}
