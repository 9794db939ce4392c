import type { ProxyNode } from "./types.js";

export interface NameFilterRules {
  blacklist: readonly string[];
  whitelist: readonly string[];
}

export interface NameFilterResult<T> {
  kept: T[];
  removed: T[];
}

function matchesAny(name: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => keyword.trim() && name.includes(keyword.trim().toLowerCase()));
}

/** Whitelist hits are kept even when a blacklist keyword also matches. */
export function filterByName<T extends ProxyNode>(nodes: readonly T[], rules: NameFilterRules): NameFilterResult<T> {
  const kept: T[] = [];
  const removed: T[] = [];
  for (const node of nodes) {
    const name = node.name.toLowerCase();
    if (matchesAny(name, rules.whitelist)) {
      kept.push(node);
    } else if (matchesAny(name, rules.blacklist)) {
      removed.push(node);
    } else {
      kept.push(node);
    }
  }
  return { kept, removed };
}
