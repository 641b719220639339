import path from "node:path";
import { z } from "zod";
import { getDefaultSshConfigPaths, getSshConfigPathsOverride, SYSTEM_SSH_CONFIG_PATH } from "../ssh/config/paths.js";
import { readJsonIfExistsSync } from "./fs.js";
import { getSshdeckDir } from "./paths.js";

export const configSchema = z
  .object({
    // Parsed in order; their hosts are concatenated.
    configPaths: z.array(z.string().min(1)).min(1).default(getDefaultSshConfigPaths()),
    // Listed paths may be missing without failing the run.
    optionalPaths: z.array(z.string().min(1)).default([SYSTEM_SSH_CONFIG_PATH]),
    strict: z.boolean().default(false),
    sortByName: z.boolean().default(true),
    showProxyCommand: z.boolean().default(false),
  })
  .strict();

export type SshdeckConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: SshdeckConfig = configSchema.parse({});

export function getConfigPath(baseDir?: string) {
  const root = baseDir ?? getSshdeckDir();
  return path.join(root, "config.json");
}

export function loadConfig(baseDir?: string): SshdeckConfig {
  const json = readJsonIfExistsSync(getConfigPath(baseDir));
  const cfg = json ? configSchema.parse(json) : DEFAULT_CONFIG;

  const override = getSshConfigPathsOverride();
  if (override?.length) return { ...cfg, configPaths: override };
  return cfg;
}
