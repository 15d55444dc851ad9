function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item));
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value as Record<string, unknown>).sort()) {
      sorted[key] = sortKeys((value as Record<string, unknown>)[key]);
    }
    return sorted;
  }

  return value;
}

/** JSON with object keys in sorted order, UTF-8 encoded. */
export function canonicalize(object: unknown): Uint8Array {
  const json = JSON.stringify(sortKeys(object));
  return new TextEncoder().encode(json);
}
