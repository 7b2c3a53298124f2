const sortValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((entry) => sortValue(entry));
  }
  if (value && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    return entries
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .reduce<Record<string, unknown>>((acc, [key, entry]) => {
        acc[key] = sortValue(entry);
        return acc;
      }, {});
  }
  return value;
};

/**
 * JSON with object keys sorted at every depth, so equal values always
 * serialise to equal bytes.
 */
export const canonicalizeJson = (value: unknown): string => JSON.stringify(sortValue(value));
