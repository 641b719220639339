import { classifyKey } from "../../../src/ssh/config/entries.js";
import type { Entries } from "../../../src/ssh/config/host.js";

/** Build an entry map from `{ Keyword: value }`, dropping keys that are not ssh_config keywords. */
export function entryMap(obj: Record<string, string>): Entries {
  const out: Entries = new Map();
  for (const [k, v] of Object.entries(obj)) {
    const key = classifyKey(k);
    if (key.kind === "directive") out.set(key.name, v);
  }
  return out;
}
