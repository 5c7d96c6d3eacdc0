import { z } from "zod";

// --- Config file schema (.bgjobs.yaml) ---

export const configSchema = z.object({
  limit: z.number().int().positive().optional()
    .describe("Maximum number of background jobs running at once"),
  echo: z.boolean().optional().describe("Print each command before it runs"),
  shell: z.string().min(1).optional().describe("Shell used to run command lines"),
});

// --- Types ---

export type ConfigFile = z.infer<typeof configSchema>;

// --- Constants ---

export const CONFIG_FILENAME = ".bgjobs.yaml";
export const LIMIT_ENV_VAR = "BGJOBS_LIMIT";
export const DEFAULT_LIMIT = 4;
