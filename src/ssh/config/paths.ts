import os from "node:os";
import path from "node:path";

export const SYSTEM_SSH_CONFIG_PATH = "/etc/ssh/ssh_config";

export function getSshDir() {
  // OpenSSH uses ~/.ssh across macOS/Linux and also on Windows (OpenSSH for Windows).
  return path.join(os.homedir(), ".ssh");
}

export function getDefaultSshConfigPaths() {
  return [SYSTEM_SSH_CONFIG_PATH, "~/.ssh/config"];
}

/** `SSHDECK_SSH_CONFIG` holds one or more paths separated by the platform delimiter. */
export function getSshConfigPathsOverride(): string[] | undefined {
  const override = process.env.SSHDECK_SSH_CONFIG;
  if (!override || !override.trim()) return undefined;
  return override
    .split(path.delimiter)
    .map((p) => p.trim())
    .filter(Boolean);
}

export function expandTilde(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}
