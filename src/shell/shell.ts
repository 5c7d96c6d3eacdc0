import { spawn } from "node:child_process";
import { resolve } from "node:path";
import { performance } from "node:perf_hooks";
import { dim } from "../utils/display.js";
import type { ContextSource } from "../core/context.js";

/** Frozen snapshot of everything a Shell carries. */
export interface ShellState {
  readonly cwd: string;
  readonly env: Readonly<Record<string, string>>;
  readonly echo: boolean;
  /** Shell used by exec(); `undefined` means the platform default. */
  readonly shellPath?: string;
  readonly history: readonly string[];
}

export interface CommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export class CommandFailedError extends Error {
  constructor(public readonly result: CommandResult, detail?: string) {
    super(detail
      ? `Command \`${result.command}\` could not run: ${detail}`
      : `Command \`${result.command}\` exited with code ${result.exitCode}`);
    this.name = "CommandFailedError";
  }
}

function definedEnv(source: NodeJS.ProcessEnv): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

/**
 * Working directory, environment and echo settings for running commands.
 *
 * A Shell is the context background jobs run under: capture() hands each job
 * its own copy, so `cd` or `setenv` inside a job never leaks into the parent.
 */
export class Shell implements ContextSource<Shell> {
  private cwdPath: string;
  private env: Record<string, string>;
  private echoEnabled: boolean;
  private readonly shellPath: string | undefined;
  private readonly commandHistory: string[];

  constructor(state: ShellState) {
    this.cwdPath = state.cwd;
    this.env = { ...state.env };
    this.echoEnabled = state.echo;
    this.shellPath = state.shellPath;
    this.commandHistory = [...state.history];
  }

  static fromProcess(options: { cwd?: string; echo?: boolean; shellPath?: string } = {}): Shell {
    return new Shell({
      cwd: resolve(options.cwd ?? process.cwd()),
      env: definedEnv(process.env),
      echo: options.echo ?? false,
      shellPath: options.shellPath,
      history: [],
    });
  }

  get cwd(): string {
    return this.cwdPath;
  }

  get echo(): boolean {
    return this.echoEnabled;
  }

  /** Commands this shell has started, oldest first. */
  get history(): readonly string[] {
    return this.commandHistory;
  }

  cd(path: string): void {
    this.cwdPath = resolve(this.cwdPath, path);
  }

  getenv(key: string): string | undefined {
    return this.env[key];
  }

  setenv(key: string, value: string): void {
    this.env[key] = value;
  }

  unsetenv(key: string): void {
    delete this.env[key];
  }

  setEcho(enabled: boolean): void {
    this.echoEnabled = enabled;
  }

  snapshot(): ShellState {
    return Object.freeze({
      cwd: this.cwdPath,
      env: Object.freeze({ ...this.env }),
      echo: this.echoEnabled,
      shellPath: this.shellPath,
      history: Object.freeze([...this.commandHistory]),
    });
  }

  capture(): Shell {
    return new Shell(this.snapshot());
  }

  /** Run a command line through the system shell. */
  exec(commandLine: string): Promise<CommandResult> {
    return this.spawnCommand(commandLine, commandLine, [], this.shellPath ?? true);
  }

  /** Run a program directly, without a shell. */
  run(program: string, args: string[] = []): Promise<CommandResult> {
    const display = [program, ...args].join(" ");
    return this.spawnCommand(display, program, args, false);
  }

  private spawnCommand(
    display: string,
    file: string,
    args: string[],
    shell: string | boolean,
  ): Promise<CommandResult> {
    this.commandHistory.push(display);
    if (this.echoEnabled) console.error(dim(`$ ${display}`));

    const started = performance.now();
    return new Promise((resolvePromise, reject) => {
      const child = spawn(file, args, {
        cwd: this.cwdPath,
        env: { ...this.env },
        shell,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      const result = (exitCode: number): CommandResult => ({
        command: display,
        exitCode,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        durationMs: Math.round(performance.now() - started),
      });

      child.on("error", (err) => {
        reject(new CommandFailedError(result(-1), err.message));
      });

      child.on("close", (code, signal) => {
        const exitCode = code ?? (signal ? 128 : -1);
        const finished = result(exitCode);
        if (exitCode === 0) {
          resolvePromise(finished);
        } else {
          reject(new CommandFailedError(finished));
        }
      });
    });
  }
}
