import type { PrereqReport } from "../platform/prereqs.js";
import { openController, type CommandOpts } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type CheckCommandResult = {
  ok: boolean;
  exitCode: ExitCode;
  report: PrereqReport | null;
  error?: string;
};

/** `cococtl check` */
export async function checkCommand(opts: CommandOpts): Promise<CheckCommandResult> {
  const opened = await openController(opts);
  if (!opened.ok) return { ok: false, exitCode: opened.exitCode, error: opened.error, report: null };

  const report = await opened.controller.check();
  if (report.ok) opened.reporter.info("OK", "All prerequisites found");
  return { ok: report.ok, exitCode: report.ok ? EXIT.SUCCESS : EXIT.STAGE_FAILED, report };
}
