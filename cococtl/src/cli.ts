#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { buildCommand } from "./commands/build.js";
import { setupCommand } from "./commands/setup.js";
import { validateCommand } from "./commands/validate.js";
import { checkCommand } from "./commands/check.js";
import { EXIT } from "./commands/exit-codes.js";
import type { OutputFormat } from "./log/reporter.js";
import { errorMessage } from "./errors.js";

type GlobalOpts = { config: string; env?: string; format: OutputFormat };

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("Expected human or jsonl.");
}

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive number of seconds.");
  return n;
}

/** Aborted on SIGINT/SIGTERM; the running command stops at its next tool call or stage. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  const abort = () => controller.abort(new Error("interrupted"));
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  return controller.signal;
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory", "config")
    .option("--env <name>", "Environment overlay (<name>.yaml in the config directory)")
    .option("--format <format>", "Output format: human|jsonl", parseFormat, "human");
}

const program = new Command();

program
  .name("cococtl")
  .description("Build, install and validate Confidential Containers on a local cluster")
  .version("0.1.0")
  .exitOverride();

withCommonOptions(
  program
    .command("build")
    .description("Build and register component images")
    .argument("[components...]", "Component names or globs (default: all)"),
).action(async (components: string[], opts: GlobalOpts) => {
  const res = await buildCommand({
    configDir: opts.config,
    env: opts.env,
    format: opts.format,
    components,
    signal: interruptSignal(),
  });
  process.exit(res.exitCode);
});

withCommonOptions(
  program.command("setup").description("Build if needed, install the operator and runtime, then validate"),
).action(async (opts: GlobalOpts) => {
  const res = await setupCommand({ configDir: opts.config, env: opts.env, format: opts.format, signal: interruptSignal() });
  process.exit(res.exitCode);
});

withCommonOptions(
  program
    .command("validate")
    .description("Check that the confidential runtime is ready and a smoke pod starts")
    .option("--deadline <seconds>", "Give up after this many seconds", parseSeconds),
).action(async (opts: GlobalOpts & { deadline?: number }) => {
  const res = await validateCommand({
    configDir: opts.config,
    env: opts.env,
    format: opts.format,
    deadlineSeconds: opts.deadline,
    signal: interruptSignal(),
  });
  process.exit(res.exitCode);
});

withCommonOptions(program.command("check").description("Check local tools, cluster access and virtualization support")).action(
  async (opts: GlobalOpts) => {
    const res = await checkCommand({ configDir: opts.config, env: opts.env, format: opts.format });
    process.exit(res.exitCode);
  },
);

program.parseAsync(process.argv).catch((e: unknown) => {
  if (e instanceof CommanderError) {
    process.exit(e.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  }
  console.error(errorMessage(e));
  process.exit(EXIT.STAGE_FAILED);
});
