import type { SetupReport } from "../core/controller.js";
import { CancelledError, ConfigurationError } from "../errors.js";
import { COMMAND_PREREQS } from "../platform/prereqs.js";
import { gatePrereqs, openController, type CommandOpts } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type SetupCommandResult =
  | { ok: true; exitCode: ExitCode; report: SetupReport }
  | { ok: false; exitCode: ExitCode; error: string; report: SetupReport | null };

export function setupExitCode(report: SetupReport): ExitCode {
  if (report.ok) return EXIT.SUCCESS;
  if (report.error instanceof ConfigurationError) return EXIT.CONFIG_INVALID;
  if (report.error instanceof CancelledError) return EXIT.TIMED_OUT;
  if (report.validation?.state === "TimedOut") return EXIT.TIMED_OUT;
  return EXIT.STAGE_FAILED;
}

function describeFailure(report: SetupReport): string {
  if (report.error instanceof CancelledError) return `setup ${report.error.message}`;
  if (report.error) return `${report.failedStage ?? report.error.stage} failed: ${report.error.message}`;
  return `validation ${report.validation?.state ?? "failed"}: ${report.validation?.failureReason ?? "unknown reason"}`;
}

/** `cococtl setup` */
export async function setupCommand(opts: CommandOpts & { signal?: AbortSignal }): Promise<SetupCommandResult> {
  const opened = await openController(opts);
  if (!opened.ok) return { ok: false, exitCode: opened.exitCode, error: opened.error, report: null };
  const { controller, reporter } = opened;

  const gate = await gatePrereqs(controller, COMMAND_PREREQS.setup);
  if (!gate.ok) return { ok: false, exitCode: gate.exitCode, error: gate.error, report: null };

  const report = await controller.setup({ signal: opts.signal });
  const exitCode = setupExitCode(report);
  if (report.ok) {
    reporter.info("OK", "CoCo is installed and a confidential pod started", {
      runtimeClass: report.validation?.runtimeClass ?? null,
    });
    return { ok: true, exitCode, report };
  }

  const error = describeFailure(report);
  reporter.error(report.error?.code ?? "SETUP_FAILED", error, { stage: report.failedStage, detail: report.error?.detail ?? "" });
  return { ok: false, exitCode, error, report };
}
