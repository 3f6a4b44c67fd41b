import type { BuildReport, ComponentBuildOutcome } from "../core/controller.js";
import { CancelledError, ConfigurationError, errorMessage } from "../errors.js";
import { COMMAND_PREREQS } from "../platform/prereqs.js";
import { gatePrereqs, openController, type CommandOpts } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type BuildCommandResult =
  | { ok: true; exitCode: ExitCode; outcomes: ComponentBuildOutcome[] }
  | { ok: false; exitCode: ExitCode; error: string; outcomes: ComponentBuildOutcome[] };

/** `cococtl build [component...]` */
export async function buildCommand(
  opts: CommandOpts & { components: string[]; signal?: AbortSignal },
): Promise<BuildCommandResult> {
  const opened = await openController(opts);
  if (!opened.ok) return { ok: false, exitCode: opened.exitCode, error: opened.error, outcomes: [] };
  const { controller, reporter } = opened;

  const gate = await gatePrereqs(controller, COMMAND_PREREQS.build);
  if (!gate.ok) return { ok: false, exitCode: gate.exitCode, error: gate.error, outcomes: [] };

  let report: BuildReport;
  try {
    report = await controller.build(opts.components, { signal: opts.signal });
  } catch (e) {
    // Only component selection throws; per-component failures are outcomes.
    reporter.error("CONFIG_INVALID", errorMessage(e), { detail: e instanceof ConfigurationError ? (e.detail ?? "") : "" });
    return { ok: false, exitCode: EXIT.CONFIG_INVALID, error: errorMessage(e), outcomes: [] };
  }

  const failed = report.outcomes.filter((o) => !o.ok).map((o) => o.component);
  if (failed.length > 0) {
    reporter.error("BUILD_FAILED", `Build failed for ${failed.join(", ")}`);
    const onlyConfig = report.outcomes.every((o) => o.ok || o.error instanceof ConfigurationError);
    const cancelled = report.outcomes.some((o) => !o.ok && o.error instanceof CancelledError);
    return {
      ok: false,
      exitCode: cancelled ? EXIT.TIMED_OUT : onlyConfig ? EXIT.CONFIG_INVALID : EXIT.STAGE_FAILED,
      error: `Build failed for ${failed.join(", ")}`,
      outcomes: report.outcomes,
    };
  }

  reporter.info("OK", `Built ${report.outcomes.length} component(s)`);
  return { ok: true, exitCode: EXIT.SUCCESS, outcomes: report.outcomes };
}
