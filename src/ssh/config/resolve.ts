import { Directive } from "./entries.js";
import { cloneHostBlock, entriesEqual, fillIfAbsent, type HostBlock } from "./host.js";
import { compilePatterns, isWildcardPattern, patternApplies } from "./patterns.js";

/** One block per pattern, each with its own copy of the entries. */
export function spread(hosts: HostBlock[]): HostBlock[] {
  const out: HostBlock[] = [];
  for (const host of hosts) {
    if (!host.patterns.length) {
      out.push(cloneHostBlock(host));
      continue;
    }
    for (const pattern of host.patterns) {
      out.push(cloneHostBlock(host, [pattern]));
    }
  }
  return out;
}

function isPatternBlock(host: HostBlock) {
  return host.patterns.some(isWildcardPattern);
}

/**
 * Fill entries of wildcard/negated blocks into the literal blocks they apply to,
 * then drop the wildcard blocks. Literal values always win.
 */
export function applyPatterns(hosts: HostBlock[]): HostBlock[] {
  const blocks = spread(hosts);
  const patternBlocks = blocks
    .filter(isPatternBlock)
    .map((block) => ({ block, matchers: compilePatterns(block.patterns) }));

  return blocks
    .filter((block) => !isPatternBlock(block))
    .map((literal) => {
      const name = literal.patterns[0];
      let entries = literal.entries;
      for (const { block, matchers } of patternBlocks) {
        if (name !== undefined && matchers.some((m) => patternApplies(m, name))) {
          entries = fillIfAbsent(entries, block.entries);
        }
      }
      return { patterns: literal.patterns, entries };
    });
}

/** A host without HostName connects to its own name. */
export function applyNameToEmptyHostname(hosts: HostBlock[]): HostBlock[] {
  return hosts.map((host) => {
    const name = host.patterns[0];
    if (host.entries.has(Directive.HostName) || name === undefined) return host;
    const out = cloneHostBlock(host);
    out.entries.set(Directive.HostName, name);
    return out;
  });
}

/**
 * Collapse blocks with identical entries into the earliest one, which collects
 * the patterns of the others. Scans from the end so patterns keep file order.
 */
export function mergeSameHosts(hosts: HostBlock[]): HostBlock[] {
  const merged = hosts.map((h) => cloneHostBlock(h));
  const keep = merged.map(() => true);

  for (let i = merged.length - 1; i > 0; i--) {
    for (let j = i - 1; j >= 0; j--) {
      if (!entriesEqual(merged[i].entries, merged[j].entries)) continue;
      merged[j].patterns.push(...merged[i].patterns);
      keep[i] = false;
      break;
    }
  }

  return merged.filter((_, i) => keep[i]);
}

export function resolveHostBlocks(hosts: HostBlock[]): HostBlock[] {
  return mergeSameHosts(applyNameToEmptyHostname(applyPatterns(hosts)));
}
