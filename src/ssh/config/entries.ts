import { UnparseableLineError, type SourceLocation } from "./errors.js";
import { KEYWORDS, type Keyword } from "./keywords.js";

export const Directive = {
  Host: "Host",
  Include: "Include",
  HostName: "HostName",
  User: "User",
  Port: "Port",
  ProxyCommand: "ProxyCommand",
  ProxyJump: "ProxyJump",
} as const satisfies Record<string, Keyword>;

export type EntryKey =
  | { kind: "directive"; name: Keyword }
  | { kind: "unknown"; raw: string };

export type Entry = {
  key: EntryKey;
  value: string;
};

const keywordIndex = new Map<string, Keyword>(KEYWORDS.map((k) => [k.toLowerCase(), k]));

export function classifyKey(key: string): EntryKey {
  const name = keywordIndex.get(key.toLowerCase());
  return name ? { kind: "directive", name } : { kind: "unknown", raw: key };
}

// Key, then either `=` with optional whitespace around it, or plain whitespace.
const LINE_RE = /^([^\s=]+)(?:\s*=\s*|\s+)(.*)$/s;

/**
 * Split a trimmed, non-comment line into its key and value.
 * Accepts `Key Value`, `Key=Value` and `Key = Value`.
 */
export function classifyLine(line: string, location?: SourceLocation): Entry {
  const m = LINE_RE.exec(line.trim());
  if (!m) throw new UnparseableLineError(line, location);
  const [, key, value] = m;
  return { key: classifyKey(key), value: value.trim() };
}
