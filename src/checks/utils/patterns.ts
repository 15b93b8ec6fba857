import type { OwnershipEntry } from "../../types.js";

/**
 * Patterns that become ignore rules for the not-owned check: every entry
 * pattern, in declaration order, minus the ones listed in `skip` (exact
 * string match). Duplicates are kept as declared.
 */
export function computeExcludedPatterns(
  entries: readonly OwnershipEntry[],
  skip: ReadonlySet<string>,
): string[] {
  const patterns: string[] = [];
  for (const entry of entries) {
    if (skip.has(entry.pattern)) continue;
    patterns.push(entry.pattern);
  }
  return patterns;
}
