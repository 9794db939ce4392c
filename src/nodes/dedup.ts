import { nodeKey, type ProxyNode } from "./types.js";

/** First occurrence of each (type, server, port) wins; order is preserved. */
export function dedupeNodes<T extends ProxyNode>(nodes: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const node of nodes) {
    const key = nodeKey(node);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(node);
  }
  return unique;
}
