import { readConfig, writeConfig } from "../core/writer.js";
import { DEFAULT_LIMIT, LIMIT_ENV_VAR, type ConfigFile } from "../core/schema.js";
import { ConfigurationError } from "../core/errors.js";

/**
 * Load project config, returning null if none exists.
 */
export async function loadConfig(rootPath: string): Promise<ConfigFile | null> {
  return readConfig(rootPath);
}

/**
 * Save project config.
 */
export async function saveConfig(rootPath: string, config: ConfigFile): Promise<void> {
  await writeConfig(rootPath, config);
}

/**
 * Parse a positive integer from user input. Returns undefined when invalid.
 */
export function parsePositiveInt(raw: string): number | undefined {
  if (!/^\d+$/u.test(raw.trim())) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && value > 0 ? value : undefined;
}

/**
 * Resolve the job limit: explicit flag, then BGJOBS_LIMIT, then config, then default.
 */
export function resolveLimit(
  flag: number | undefined,
  config: ConfigFile | null,
  env: NodeJS.ProcessEnv = process.env,
): number {
  if (flag !== undefined) {
    if (!Number.isInteger(flag) || flag < 1) {
      throw new ConfigurationError(`--jobs must be a positive integer, got ${flag}`);
    }
    return flag;
  }

  const fromEnv = env[LIMIT_ENV_VAR];
  if (fromEnv !== undefined && fromEnv !== "") {
    const parsed = parsePositiveInt(fromEnv);
    if (parsed === undefined) {
      throw new ConfigurationError(`${LIMIT_ENV_VAR} must be a positive integer, got "${fromEnv}"`);
    }
    return parsed;
  }

  return config?.limit ?? DEFAULT_LIMIT;
}
