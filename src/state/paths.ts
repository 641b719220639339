import os from "node:os";
import path from "node:path";

export function getSshdeckDir() {
  // Allow callers (and tests) to override storage root.
  const override = process.env.SSHDECK_HOME;
  if (override && override.trim()) return override;
  return path.join(os.homedir(), ".sshdeck");
}
