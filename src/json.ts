const MAX_DEPTH = 20;

function canonicalize(
  value: unknown,
  depth: number,
  seen: WeakSet<object>
): unknown {
  if (typeof value !== 'object' || value === null) return value;

  if (depth > MAX_DEPTH) {
    throw new Error(`stableStringify: Max depth (${MAX_DEPTH}) exceeded`);
  }
  // Tracks the active path only, so shared siblings are fine.
  if (seen.has(value)) {
    throw new Error('stableStringify: Circular reference detected');
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => canonicalize(item, depth + 1, seen));
    }

    const entries = Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      sorted[key] = canonicalize(entry, depth + 1, seen);
    }
    return sorted;
  } finally {
    seen.delete(value);
  }
}

/** JSON with object keys in code-unit order at every level. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value, 0, new WeakSet()));
}
