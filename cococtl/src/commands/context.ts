import { loadConfig } from "../config/loader.js";
import { LifecycleController, type ControllerDeps } from "../core/controller.js";
import type { PrereqName } from "../platform/prereqs.js";
import { createReporter, type OutputFormat, type Reporter } from "../log/reporter.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type CommandOpts = {
  configDir: string;
  env?: string;
  /** Source of COCO_* overrides; defaults to process.env. */
  environment?: NodeJS.ProcessEnv;
  format?: OutputFormat;
  /** Defaults to a reporter writing to stdout/stderr in `format`. */
  reporter?: Reporter;
  /** Test seams forwarded to the controller. */
  deps?: Omit<ControllerDeps, "config" | "reporter">;
};

export type Opened =
  | { ok: true; controller: LifecycleController; reporter: Reporter }
  | { ok: false; exitCode: ExitCode; error: string };

export async function openController(opts: CommandOpts): Promise<Opened> {
  const reporter = opts.reporter ?? createReporter(opts.format ?? "human");
  try {
    const config = await loadConfig(opts.configDir, opts.env, opts.environment);
    return { ok: true, controller: new LifecycleController({ config, reporter, ...opts.deps }), reporter };
  } catch (e) {
    const detail = e instanceof ConfigurationError && e.detail ? e.detail : "";
    reporter.error("CONFIG_INVALID", errorMessage(e), { detail });
    return { ok: false, exitCode: EXIT.CONFIG_INVALID, error: errorMessage(e) };
  }
}

export type Gate = { ok: true } | { ok: false; exitCode: ExitCode; error: string };

/** Stops a command before its first stage when a tool or the cluster is missing. */
export async function gatePrereqs(controller: LifecycleController, names: readonly PrereqName[]): Promise<Gate> {
  try {
    await controller.requirePrereqs(names);
    return { ok: true };
  } catch (e) {
    return { ok: false, exitCode: EXIT.STAGE_FAILED, error: `prereqs failed: ${errorMessage(e)}` };
  }
}
