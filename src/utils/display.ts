import chalk from "chalk";
import type { FutureState } from "../core/future.js";

export function jobStatusIcon(state: FutureState<unknown>): string {
  switch (state.status) {
    case "fulfilled": return chalk.green("✓ ok     ");
    case "rejected": return chalk.red("✗ failed ");
    case "pending": return chalk.yellow("… pending");
  }
}

export function successMsg(msg: string): string {
  return chalk.green(`  ✓ ${msg}`);
}

export function errorMsg(msg: string): string {
  return chalk.red(`  ✗ ${msg}`);
}

export function heading(msg: string): string {
  return chalk.bold(msg);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

export function indent(text: string, prefix = "    "): string {
  return text
    .replace(/\n+$/u, "")
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
