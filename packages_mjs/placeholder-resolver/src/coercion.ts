/**
 * Text form of a configuration value when it replaces a placeholder.
 * Mappings and lists use their JSON form; null becomes the empty string.
 */
export function coerceToString(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
    }
    return JSON.stringify(value);
}
