/**
 * Recursively removes `null` values from parsed YAML.
 *
 * A key written with no value (`workdir:`) parses as null; dropping it makes it
 * read as absent instead of failing validation with "Expected string, received null".
 */
export function cleanNullValues(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.filter((item) => item !== null).map(cleanNullValues);
    }
    if (value !== null && typeof value === 'object') {
        const cleaned: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(value)) {
            if (entry === null) {
                continue;
            }
            cleaned[key] = cleanNullValues(entry);
        }
        return cleaned;
    }
    return value;
}
