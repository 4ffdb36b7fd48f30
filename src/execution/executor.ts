// Command execution layer. Every backend invocation passes through this module.
// LocalExecutor is the hard boundary between backend code and the OS; tests swap in a
// recording Executor. runChecked() owns the dry-run rule and exit-code checking so no
// backend re-implements either.
import execa from "execa";
import { formatCommand, type Command } from "../types/command.js";
import type { BackendId } from "../backends/types.js";
import type { UpgradeContext } from "../context.js";
import { UpgradeError, UpgradeErrorCode, type UpgradeStep } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Exit code reported when the executable could not be spawned at all. */
export const SPAWN_FAILED_EXIT_CODE = 127;

export interface RunResult {
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface ExecResult extends RunResult {
  readonly stdout: string;
  readonly stderr: string;
}

/** The only way backends reach child processes. */
export interface Executor {
  /** Run with inherited stdio so the wrapped tool can prompt the user. */
  run(command: Command): Promise<RunResult>;
  /** Run with stdout and stderr captured as UTF-8 text. */
  capture(command: Command): Promise<ExecResult>;
}

/** Local executor using execa. Environment overrides extend the parent environment. */
export class LocalExecutor implements Executor {
  async run(command: Command): Promise<RunResult> {
    const start = performance.now();
    const [file, ...args] = command.argv;
    const result = await execa(file, args, { env: command.env, stdio: "inherit", reject: false });
    return { exitCode: exitCodeOf(result), durationMs: Math.round(performance.now() - start) };
  }

  async capture(command: Command): Promise<ExecResult> {
    const start = performance.now();
    const [file, ...args] = command.argv;
    const result = await execa(file, args, { env: command.env, encoding: "utf8", reject: false });
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: exitCodeOf(result),
      durationMs: Math.round(performance.now() - start),
    };
  }
}

// execa leaves exitCode unset when the process never started or died from a signal.
function exitCodeOf(result: { exitCode?: number; signal?: string }): number {
  if (typeof result.exitCode === "number") return result.exitCode;
  return result.signal ? 128 : SPAWN_FAILED_EXIT_CODE;
}

export interface CheckedRunOptions {
  backend: BackendId;
  step: UpgradeStep;
  /** Exit codes treated as success. Defaults to [0]. */
  acceptedExitCodes?: readonly number[];
}

/**
 * Run a mutating command for a backend step. In dry-run mode the command is
 * printed and counts as exit 0. Any exit code outside the whitelist throws
 * SUBPROCESS_FAILED naming the backend and step.
 */
export async function runChecked(ctx: UpgradeContext, command: Command, options: CheckedRunOptions): Promise<number> {
  const rendered = formatCommand(command);
  if (ctx.runMode === "dry") {
    ctx.print(`Dry running: ${rendered}`);
    return 0;
  }

  logger.info({ backend: options.backend, step: options.step, command: rendered }, "Executing");
  const { exitCode, durationMs } = await ctx.executor.run(command);
  const accepted = options.acceptedExitCodes ?? [0];
  if (!accepted.includes(exitCode)) {
    throw new UpgradeError(
      UpgradeErrorCode.SUBPROCESS_FAILED,
      `${options.backend} ${options.step} failed: \`${rendered}\` exited with ${exitCode}`,
      { backend: options.backend, step: options.step, exitCode, command: rendered },
    );
  }
  logger.debug({ backend: options.backend, step: options.step, exitCode, durationMs }, "Command finished");
  return exitCode;
}

/**
 * Capture the output of a read-only query. Runs in dry-run mode too, since
 * the answer decides which commands would be run.
 */
export async function captureChecked(ctx: UpgradeContext, command: Command, options: CheckedRunOptions): Promise<string> {
  const rendered = formatCommand(command);
  logger.debug({ backend: options.backend, step: options.step, command: rendered }, "Querying");
  const result = await ctx.executor.capture(command);
  const accepted = options.acceptedExitCodes ?? [0];
  if (!accepted.includes(result.exitCode)) {
    throw new UpgradeError(
      UpgradeErrorCode.SUBPROCESS_FAILED,
      `${options.backend} ${options.step} failed: \`${rendered}\` exited with ${result.exitCode}`,
      { backend: options.backend, step: options.step, exitCode: result.exitCode, command: rendered, output: result.stderr.trim() },
    );
  }
  return result.stdout;
}
