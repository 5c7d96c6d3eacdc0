import { resolve } from "node:path";
import { loadConfig, saveConfig, parsePositiveInt } from "../utils/config.js";
import { heading, errorMsg, successMsg } from "../utils/display.js";
import { CONFIG_FILENAME, DEFAULT_LIMIT, type ConfigFile } from "../core/schema.js";

export async function configCommand(
  options: {
    path?: string;
    limit?: string;
    echo?: boolean;
    shell?: string;
  },
): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const existing = await loadConfig(rootPath);

  // If no flags, show current config
  if (options.limit === undefined && options.echo === undefined && options.shell === undefined) {
    if (!existing) {
      console.log(errorMsg(`No ${CONFIG_FILENAME} found. Run \`bgjobs config --limit <n>\` to create one.`));
      return;
    }
    console.log(heading("\nCurrent configuration:\n"));
    console.log(`  limit: ${existing.limit ?? `${DEFAULT_LIMIT} (default)`}`);
    console.log(`  echo: ${existing.echo ?? false}`);
    if (existing.shell) console.log(`  shell: ${existing.shell}`);
    console.log("");
    return;
  }

  const updated: ConfigFile = { ...(existing ?? {}) };

  if (options.limit !== undefined) {
    const limit = parsePositiveInt(options.limit);
    if (limit === undefined) {
      console.log(errorMsg("limit must be a positive integer"));
      process.exitCode = 1;
      return;
    }
    updated.limit = limit;
  }

  if (options.echo !== undefined) {
    updated.echo = options.echo;
  }

  if (options.shell !== undefined) {
    if (!options.shell.trim()) {
      console.log(errorMsg("shell must not be empty"));
      process.exitCode = 1;
      return;
    }
    updated.shell = options.shell;
  }

  await saveConfig(rootPath, updated);
  console.log(successMsg("Configuration updated."));
}
