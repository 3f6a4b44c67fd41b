import type { ValidationReport } from "../types/validation.js";
import { COMMAND_PREREQS } from "../platform/prereqs.js";
import { gatePrereqs, openController, type CommandOpts } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ValidateCommandResult =
  | { ok: true; exitCode: ExitCode; report: ValidationReport }
  | { ok: false; exitCode: ExitCode; error: string; report: ValidationReport | null };

/** `cococtl validate`: read-only readiness check. */
export async function validateCommand(
  opts: CommandOpts & { signal?: AbortSignal; deadlineSeconds?: number },
): Promise<ValidateCommandResult> {
  const opened = await openController(opts);
  if (!opened.ok) return { ok: false, exitCode: opened.exitCode, error: opened.error, report: null };
  const { controller, reporter } = opened;

  const gate = await gatePrereqs(controller, COMMAND_PREREQS.validate);
  if (!gate.ok) return { ok: false, exitCode: gate.exitCode, error: gate.error, report: null };

  const report = await controller.validate({ signal: opts.signal, deadlineSeconds: opts.deadlineSeconds });
  if (report.ready) {
    reporter.info("OK", `CoCo is ready (RuntimeClass ${report.runtimeClass ?? "unknown"})`, {
      elapsedMs: report.elapsedMs,
      kernel: report.smokeTestResult?.kernel ?? null,
    });
    return { ok: true, exitCode: EXIT.SUCCESS, report };
  }

  const error = `${report.state}: ${report.failureReason ?? "unknown reason"}`;
  reporter.error(report.state === "TimedOut" ? "VALIDATE_TIMED_OUT" : "VALIDATE_FAILED", error, {
    detail: report.smokeTestResult?.detail ?? "",
  });
  return { ok: false, exitCode: report.state === "TimedOut" ? EXIT.TIMED_OUT : EXIT.STAGE_FAILED, error, report };
}
