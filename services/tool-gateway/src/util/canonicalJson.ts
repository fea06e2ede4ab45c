const byKey = ([a]: [string, unknown], [b]: [string, unknown]): number => (a < b ? -1 : a > b ? 1 : 0);

const sortKeys = (value: unknown): unknown => {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const entries: [string, unknown][] = Object.entries(value);
        return Object.fromEntries(entries.sort(byKey).map(([key, item]) => [key, sortKeys(item)]));
    }
    return value;
};

/** JSON with object keys sorted at every depth, so equal arguments serialize identically. */
export const canonicalJson = (value: unknown): string => JSON.stringify(sortKeys(value)) ?? 'null';
