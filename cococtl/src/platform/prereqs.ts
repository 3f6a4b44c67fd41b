import fs from "node:fs";
import type { Kubectl } from "../cluster/kubectl.js";
import type { ContainerTool } from "../image/container-tool.js";
import type { PlatformInfo } from "./detect.js";
import { errorDetail } from "../errors.js";

export type PrereqCheck = {
  name: string;
  ok: boolean;
  /** A failing warning-only check does not fail the report. */
  severity: "error" | "warn";
  detail: string;
};

export type PrereqReport = {
  ok: boolean;
  platform: PlatformInfo;
  checks: PrereqCheck[];
};

export type PrereqName = "kubectl" | "build-tool" | "cluster";

/** What each command needs before it starts changing anything. */
export const COMMAND_PREREQS: Record<"build" | "setup" | "validate", readonly PrereqName[]> = {
  build: ["build-tool"],
  setup: ["kubectl", "build-tool", "cluster"],
  validate: ["kubectl", "cluster"],
};

type KvmAccess = (mode: number) => boolean;

const defaultKvmAccess: KvmAccess = (mode) => {
  try {
    fs.accessSync("/dev/kvm", mode);
    return true;
  } catch {
    return false;
  }
};

async function runCheck(name: string, fn: () => Promise<string>): Promise<PrereqCheck> {
  try {
    return { name, ok: true, severity: "error", detail: await fn() };
  } catch (e) {
    return { name, ok: false, severity: "error", detail: errorDetail(e) };
  }
}

/**
 * Tools on PATH, a reachable cluster, and virtualization access. Nothing is
 * installed or changed; missing pieces are only reported.
 *
 * `only` restricts the run to the named checks and skips the KVM check.
 */
export async function checkPrereqs(deps: {
  kubectl: Kubectl;
  tool: ContainerTool;
  platform: PlatformInfo;
  kvmAccess?: KvmAccess;
  only?: readonly PrereqName[];
}): Promise<PrereqReport> {
  const kvmAccess = deps.kvmAccess ?? defaultKvmAccess;
  const checkFns: [PrereqName, () => Promise<string>][] = [
    ["kubectl", () => deps.kubectl.clientVersion()],
    ["build-tool", () => deps.tool.version()],
    ["cluster", () => deps.kubectl.clusterInfo()],
  ];
  const checks: PrereqCheck[] = [];
  for (const [name, fn] of checkFns) {
    if (!deps.only || deps.only.includes(name)) checks.push(await runCheck(name, fn));
  }

  const kvm = deps.only ? null : kvmCheck(deps.platform, kvmAccess);
  if (kvm) checks.push(kvm);

  return {
    ok: checks.every((c) => c.ok || c.severity === "warn"),
    platform: deps.platform,
    checks,
  };
}

function kvmCheck(platform: PlatformInfo, kvmAccess: KvmAccess): PrereqCheck | null {
  if (platform.system === "linux") {
    const ok = kvmAccess(fs.constants.W_OK);
    return {
      name: "kvm",
      ok,
      severity: "warn",
      detail: ok ? "/dev/kvm is writable" : "/dev/kvm is not writable by the current user; add it to the kvm group",
    };
  }
  if (platform.system === "wsl") {
    const ok = kvmAccess(fs.constants.R_OK);
    return {
      name: "kvm",
      ok,
      severity: "warn",
      detail: ok ? "KVM device node found (/dev/kvm)" : "/dev/kvm not readable; set nestedVirtualization=true in .wslconfig",
    };
  }
  return null;
}
