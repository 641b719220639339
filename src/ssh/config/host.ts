import type { Keyword } from "./keywords.js";

export type Entries = Map<Keyword, string>;

/**
 * One `Host` section, or the implicit global section (no patterns).
 * `entries` is keyed by canonical directive name and never holds Host or Include.
 */
export type HostBlock = {
  patterns: string[];
  entries: Entries;
};

export function createHostBlock(patterns: string[] = [], entries?: Iterable<[Keyword, string]>): HostBlock {
  return { patterns, entries: new Map(entries) };
}

export function cloneHostBlock(block: HostBlock, patterns = block.patterns): HostBlock {
  return { patterns: [...patterns], entries: new Map(block.entries) };
}

/** Donor values replace the target's. */
export function overwriteEntries(target: Entries, donor: Entries): Entries {
  return new Map([...target, ...donor]);
}

/** Target keeps its values; only keys it lacks are taken from the donor. */
export function fillIfAbsent(target: Entries, donor: Entries): Entries {
  const out = new Map(target);
  for (const [key, value] of donor) {
    if (!out.has(key)) out.set(key, value);
  }
  return out;
}

export function entriesEqual(a: Entries, b: Entries) {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (b.get(key) !== value) return false;
  }
  return true;
}
