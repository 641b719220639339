import { Directive } from "./entries.js";
import { ConfigIoError } from "./errors.js";
import type { HostBlock } from "./host.js";
import type { Keyword } from "./keywords.js";
import { parseSshConfigFile, type ParserOptions } from "./parser.js";
import { expandTilde } from "./paths.js";
import { resolveHostBlocks } from "./resolve.js";

export type ResolvedHost = {
  readonly name: string;
  /** Remaining patterns of the merged block, joined with ", ". */
  readonly aliases: string;
  readonly user?: string;
  readonly destination: string;
  readonly port?: string;
  readonly proxyCommand?: string;
};

export function toResolvedHost(block: HostBlock): ResolvedHost {
  const [name = "", ...aliases] = block.patterns;
  const get = (key: Keyword) => block.entries.get(key);
  return {
    name,
    aliases: aliases.join(", "),
    user: get(Directive.User),
    destination: get(Directive.HostName) ?? name,
    port: get(Directive.Port),
    proxyCommand: get(Directive.ProxyCommand),
  };
}

/**
 * Parse one ssh_config file (and everything it includes) into display rows.
 * Throws an SshConfigError subclass on failure.
 */
export function parseConfig(configPath: string, options: ParserOptions = {}): ResolvedHost[] {
  const { hosts } = parseSshConfigFile(configPath, options);
  return resolveHostBlocks(hosts).map(toResolvedHost);
}

export type HostLoadOptions = ParserOptions & {
  paths: string[];
  /** Paths whose absence is not an error, e.g. the system-wide config. */
  optionalPaths?: string[];
};

export type HostLoadResult = {
  hosts: ResolvedHost[];
  /** Optional paths that did not exist. */
  skipped: string[];
};

export function loadHosts(options: HostLoadOptions): HostLoadResult {
  const { paths, optionalPaths = [], ...parserOptions } = options;
  const hosts: ResolvedHost[] = [];
  const skipped: string[] = [];

  for (const p of paths) {
    try {
      hosts.push(...parseConfig(p, parserOptions));
    } catch (err) {
      // Only the optional file itself may be missing, not something it includes.
      const missing = err instanceof ConfigIoError && err.errno === "ENOENT" && err.path === expandTilde(p);
      if (missing && optionalPaths.includes(p)) {
        skipped.push(p);
        continue;
      }
      throw err;
    }
  }

  return { hosts, skipped };
}

export function sortHosts(hosts: readonly ResolvedHost[]): ResolvedHost[] {
  return [...hosts].sort((a, b) => {
    const x = a.name.toLowerCase();
    const y = b.name.toLowerCase();
    return x < y ? -1 : x > y ? 1 : 0;
  });
}

function fuzzyMatch(text: string, query: string) {
  const haystack = text.toLowerCase();
  let pos = 0;
  for (const ch of query.toLowerCase()) {
    pos = haystack.indexOf(ch, pos);
    if (pos === -1) return false;
    pos++;
  }
  return true;
}

/** Keep hosts whose name, destination or aliases contain the query's characters in order. */
export function filterHosts(hosts: readonly ResolvedHost[], search: string | undefined): ResolvedHost[] {
  const query = search?.trim() ?? "";
  if (!query) return [...hosts];
  return hosts.filter(
    (h) => fuzzyMatch(h.name, query) || fuzzyMatch(h.destination, query) || fuzzyMatch(h.aliases, query)
  );
}
