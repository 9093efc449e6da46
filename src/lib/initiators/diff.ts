/**
 * Port names in `requested` that are not yet in `existing`,
 * in first-seen order of `requested`.
 */
export function computeAdditions(existing: Iterable<string>, requested: Iterable<string>): string[] {
  const present = new Set(existing);
  return unique(requested).filter((name) => !present.has(name));
}

/**
 * Port names in `requested` that are actually present in `existing`.
 * Asking to remove an unknown initiator is a no-op.
 */
export function computeRemovals(existing: Iterable<string>, requested: Iterable<string>): string[] {
  const present = new Set(existing);
  return unique(requested).filter((name) => present.has(name));
}

export function isSubset(candidate: Iterable<string>, of: Iterable<string>): boolean {
  const container = new Set(of);
  for (const name of candidate) {
    if (!container.has(name)) return false;
  }
  return true;
}

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}
