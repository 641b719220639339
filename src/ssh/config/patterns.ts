export type CompiledPattern = {
  regex: RegExp;
  negated: boolean;
};

const WILDCARD_CHARS = ["*", "?", "!"];

export function isWildcardPattern(pattern: string) {
  return WILDCARD_CHARS.some((c) => pattern.includes(c));
}

/**
 * Compile a `Host` pattern into an anchored matcher.
 * Literal patterns return undefined; they are compared with `===`.
 */
export function compilePattern(pattern: string): CompiledPattern | undefined {
  if (!isWildcardPattern(pattern)) return undefined;

  const negated = pattern.startsWith("!");
  const body = negated ? pattern.slice(1) : pattern;
  const source = body
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*")
    .replace(/\?/g, ".");

  return { regex: new RegExp(`^${source}$`), negated };
}

export function compilePatterns(patterns: string[]): CompiledPattern[] {
  const out: CompiledPattern[] = [];
  for (const p of patterns) {
    const compiled = compilePattern(p);
    if (compiled) out.push(compiled);
  }
  return out;
}

/** Whether a compiled pattern applies to `name`. A negated pattern applies when it does not match. */
export function patternApplies(pattern: CompiledPattern, name: string) {
  return pattern.regex.test(name) !== pattern.negated;
}

/**
 * Split a `Host` (or `Include`) value into patterns.
 * Double-quoted spans may contain whitespace; unquoted whitespace separates.
 */
export function tokenizePatterns(value: string): string[] {
  const out: string[] = [];
  let cur = "";
  let quoted = false;

  const push = () => {
    const token = cur.trim();
    if (token) out.push(token);
    cur = "";
  };

  for (const ch of value) {
    if (ch === '"') {
      if (quoted) push();
      quoted = !quoted;
      continue;
    }
    if (/\s/.test(ch) && !quoted) {
      push();
      continue;
    }
    cur += ch;
  }

  push();
  return out;
}
