import fs from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { classifyLine, Directive } from "./entries.js";
import {
  ConfigIoError,
  InvalidIncludeError,
  UnknownEntryError,
  UnparseableLineError,
  toError,
  type SourceLocation,
} from "./errors.js";
import { createHostBlock, fillIfAbsent, overwriteEntries, type HostBlock } from "./host.js";
import { expandTilde, getSshDir } from "./paths.js";
import { tokenizePatterns } from "./patterns.js";

export type ParserOptions = {
  /** Fail on directives that are not ssh_config keywords instead of dropping them. */
  strict?: boolean;
  /** Base directory for relative `Include` paths. Defaults to ~/.ssh. */
  sshDir?: string;
};

export type ParsedConfig = {
  global: HostBlock;
  hosts: HostBlock[];
};

type ParseContext = {
  strict: boolean;
  sshDir: string;
  // Canonical paths of the files currently being parsed, outermost first.
  stack: string[];
};

function createContext(options: ParserOptions): ParseContext {
  return {
    strict: options.strict ?? false,
    sshDir: options.sshDir ?? getSshDir(),
    stack: [],
  };
}

function stripInlineComment(line: string) {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') quoted = !quoted;
    else if (ch === "#" && !quoted) return line.slice(0, i);
  }
  return line;
}

function canonicalize(filePath: string) {
  try {
    return fs.realpathSync(filePath);
  } catch (err) {
    throw new ConfigIoError(filePath, toError(err));
  }
}

function readText(filePath: string) {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigIoError(filePath, toError(err));
  }
}

function expandIncludePattern(
  pattern: string,
  ctx: ParseContext,
  line: string,
  location: SourceLocation
) {
  const p = expandTilde(pattern);
  const abs = path.isAbsolute(p) ? p : path.join(ctx.sshDir, p);

  // A plain path must exist; a glob may match nothing.
  if (!fg.isDynamicPattern(abs)) return [abs];

  let matches: string[];
  try {
    matches = fg.sync(abs, { dot: true, onlyFiles: true, unique: true, suppressErrors: false });
  } catch (err) {
    throw new InvalidIncludeError(line, "glob", location, toError(err));
  }
  matches.sort();
  return matches;
}

function parseIncludedFile(
  filePath: string,
  ctx: ParseContext,
  line: string,
  location: SourceLocation
): ParsedConfig {
  const canonical = canonicalize(filePath);
  if (ctx.stack.includes(canonical)) {
    throw new InvalidIncludeError(line, "cycle", location);
  }
  return parseFileRaw(canonical, ctx);
}

function parseFileRaw(canonical: string, ctx: ParseContext): ParsedConfig {
  const text = readText(canonical);
  ctx.stack.push(canonical);
  try {
    return parseRaw(text, canonical, ctx);
  } finally {
    ctx.stack.pop();
  }
}

function parseRaw(text: string, source: string, ctx: ParseContext): ParsedConfig {
  const global = createHostBlock();
  const hosts: HostBlock[] = [];
  // Most recently opened Host block; undefined while still in the global section.
  let current: HostBlock | undefined;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const rawLine = lines[i];
    const line = stripInlineComment(rawLine).trim();
    if (!line) continue;

    const location: SourceLocation = { file: source, line: i + 1 };
    const { key, value } = classifyLine(line, location);

    if (key.kind === "unknown") {
      if (ctx.strict) throw new UnknownEntryError(key.raw, rawLine.trim(), location);
      continue;
    }

    if (key.name === Directive.Host) {
      const patterns = tokenizePatterns(value);
      if (!patterns.length) throw new UnparseableLineError(line, location);
      current = createHostBlock(patterns);
      hosts.push(current);
      continue;
    }

    if (key.name === Directive.Include) {
      const includePatterns = tokenizePatterns(value);
      if (!includePatterns.length) {
        throw new InvalidIncludeError(line, "pattern", location);
      }

      for (const pattern of includePatterns) {
        for (const filePath of expandIncludePattern(pattern, ctx, line, location)) {
          const included = parseIncludedFile(filePath, ctx, line, location);

          if (current) {
            // Inside a Host block an include may only contribute settings.
            if (included.hosts.length) {
              throw new InvalidIncludeError(line, "hosts-inside-host-block", location);
            }
            current.entries = fillIfAbsent(current.entries, included.global.entries);
          } else {
            global.entries = overwriteEntries(global.entries, included.global.entries);
            hosts.push(...included.hosts);
          }
        }
      }
      continue;
    }

    (current ?? global).entries.set(key.name, value);
  }

  return { global, hosts };
}

function applyGlobal({ global, hosts }: ParsedConfig): ParsedConfig {
  if (!global.entries.size) return { global, hosts };
  return {
    global,
    hosts: hosts.map((h) => ({ ...h, entries: fillIfAbsent(h.entries, global.entries) })),
  };
}

/**
 * Parse ssh_config text into its global block and Host blocks.
 * Global settings are filled into every Host block that does not set them.
 */
export function parseSshConfig(text: string, options: ParserOptions = {}, source = "<input>"): ParsedConfig {
  return applyGlobal(parseRaw(text, source, createContext(options)));
}

export function parseSshConfigFile(filePath: string, options: ParserOptions = {}): ParsedConfig {
  const canonical = canonicalize(expandTilde(filePath));
  return applyGlobal(parseFileRaw(canonical, createContext(options)));
}
