import { resolve } from "node:path";
import { jobs } from "../core/barrier.js";
import { ConfigurationError, JobsFailedError, WorkFailure, describeCause } from "../core/errors.js";
import { CommandFailedError, Shell, type CommandResult } from "../shell/shell.js";
import { loadConfig, resolveLimit } from "../utils/config.js";
import { dim, errorMsg, formatDuration, heading, indent, jobStatusIcon } from "../utils/display.js";
import type { Future, FutureState } from "../core/future.js";

export interface RunOptions {
  path?: string;
  jobs?: number;
  echo?: boolean;
  json?: boolean;
}

export interface JobReport {
  command: string;
  status: "ok" | "failed";
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number | null;
  error?: string;
}

export function toReport(command: string, state: FutureState<CommandResult>): JobReport {
  if (state.status === "fulfilled") {
    const { exitCode, stdout, stderr, durationMs } = state.value;
    return { command, status: "ok", exitCode, stdout, stderr, durationMs };
  }

  if (state.status === "pending") {
    return { command, status: "failed", exitCode: null, stdout: "", stderr: "", durationMs: null, error: "job did not finish" };
  }

  const cause = state.reason instanceof WorkFailure ? state.reason.cause : state.reason;
  if (cause instanceof CommandFailedError) {
    const { exitCode, stdout, stderr, durationMs } = cause.result;
    return { command, status: "failed", exitCode, stdout, stderr, durationMs, error: cause.message };
  }
  return { command, status: "failed", exitCode: null, stdout: "", stderr: "", durationMs: null, error: describeCause(cause) };
}

/**
 * Run command lines as background jobs, at most `limit` at a time,
 * and report each one in the order given.
 */
export async function runCommand(commands: string[], options: RunOptions): Promise<void> {
  const rootPath = resolve(options.path ?? ".");

  if (commands.length === 0) {
    console.error(errorMsg("No commands given"));
    process.exitCode = 1;
    return;
  }

  const config = await loadConfig(rootPath);
  let limit: number;
  try {
    limit = resolveLimit(options.jobs, config);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    console.error(errorMsg(err.message));
    process.exitCode = 1;
    return;
  }

  const shell = Shell.fromProcess({
    cwd: rootPath,
    echo: options.echo ?? config?.echo ?? false,
    shellPath: config?.shell,
  });

  const launched: Array<{ command: string; future: Future<CommandResult> }> = [];
  try {
    await jobs(limit, async (job) => {
      for (const command of commands) {
        const future = await job.background((sh) => sh.exec(command), { label: command });
        launched.push({ command, future });
      }
    }, {
      shell,
      onFailure: (failure) => {
        if (!options.json) console.error(errorMsg(failure.message));
      },
    });
  } catch (err) {
    // Job failures are reported per command below.
    if (!(err instanceof WorkFailure) && !(err instanceof JobsFailedError)) throw err;
  }

  const entries = launched.map(({ command, future }) => {
    const state = future.peek();
    return { state, report: toReport(command, state) };
  });
  const summary = {
    ok: entries.filter((e) => e.report.status === "ok").length,
    failed: entries.filter((e) => e.report.status === "failed").length,
  };

  if (summary.failed > 0) {
    process.exitCode = 1;
  }

  if (options.json) {
    const results = entries.map((e) => e.report);
    process.stdout.write(JSON.stringify({ results, summary }, null, 2) + "\n");
    return;
  }

  console.log(heading(`\nbgjobs run: ${commands.length} job${commands.length !== 1 ? "s" : ""}, limit ${limit}\n`));
  for (const { state, report } of entries) {
    const detail = [
      report.exitCode !== null ? `exit ${report.exitCode}` : undefined,
      report.durationMs !== null ? formatDuration(report.durationMs) : undefined,
    ].filter((part): part is string => part !== undefined).join(", ");
    console.log(`  ${jobStatusIcon(state)} ${report.command}${detail ? " " + dim(`(${detail})`) : ""}`);
    if (report.stdout) console.log(indent(report.stdout));
    if (report.status === "failed" && report.stderr) console.log(indent(report.stderr));
  }

  console.log(`\n  ${summary.ok} succeeded, ${summary.failed} failed\n`);
}
