import type { FragmentMapping, FragmentValue } from './domain.js';

export const PATH_SEPARATOR = '.';

export function isMapping(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function joinPath(prefix: string, key: string): string {
    return prefix ? `${prefix}${PATH_SEPARATOR}${key}` : key;
}

/**
 * Narrow parsed YAML/JSON data into the value model. Dates (from loaders
 * that produce them) become ISO strings; anything else unknown is rejected
 * by returning `undefined`.
 */
export function toFragmentValue(value: unknown): FragmentValue | undefined {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) {
        const items: FragmentValue[] = [];
        for (const item of value) {
            const converted = toFragmentValue(item);
            if (converted === undefined) return undefined;
            items.push(converted);
        }
        return items;
    }
    if (isMapping(value)) {
        const mapping: FragmentMapping = {};
        for (const [key, item] of Object.entries(value)) {
            const converted = toFragmentValue(item);
            if (converted === undefined) return undefined;
            mapping[key] = converted;
        }
        return mapping;
    }
    return undefined;
}

/**
 * Flatten nested mappings into dotted key paths. Lists are leaves and an
 * empty mapping contributes no path.
 */
export function flatten(mapping: FragmentMapping, prefix = ''): Array<[string, FragmentValue]> {
    const entries: Array<[string, FragmentValue]> = [];
    for (const [key, value] of Object.entries(mapping)) {
        const path = joinPath(prefix, key);
        if (isMapping(value) && !Array.isArray(value)) {
            entries.push(...flatten(value, path));
        } else {
            entries.push([path, value]);
        }
    }
    return entries;
}

/**
 * Rebuild the nested form of a flat key-path map, visiting paths in sorted
 * order. A path whose ancestor already holds a leaf is skipped; the merge
 * engine never produces one.
 */
export function unflatten(values: ReadonlyMap<string, FragmentValue>, prefix = ''): FragmentMapping {
    const result: FragmentMapping = {};
    const start = prefix ? `${prefix}${PATH_SEPARATOR}` : '';

    for (const path of [...values.keys()].sort()) {
        if (!path.startsWith(start)) continue;
        const value = values.get(path);
        if (value === undefined) continue;

        const segments = path.slice(start.length).split(PATH_SEPARATOR);
        const last = segments.pop();
        if (last === undefined) continue;

        let current: FragmentMapping = result;
        let blocked = false;
        for (const segment of segments) {
            const next: FragmentValue | undefined = current[segment];
            if (next === undefined) {
                const created: FragmentMapping = {};
                current[segment] = created;
                current = created;
            } else if (isMapping(next) && !Array.isArray(next)) {
                current = next;
            } else {
                blocked = true;
                break;
            }
        }
        if (!blocked) {
            current[last] = value;
        }
    }
    return result;
}

/**
 * Interior prefix → leaf paths below it. Keeps displacement on write and
 * subtree lookups proportional to the paths involved instead of the whole
 * configuration.
 */
export class PathIndex {
    private readonly below = new Map<string, Set<string>>();

    static from(paths: Iterable<string>): PathIndex {
        const index = new PathIndex();
        for (const path of paths) {
            index.add(path);
        }
        return index;
    }

    add(path: string): void {
        for (const ancestor of ancestorPaths(path)) {
            let leaves = this.below.get(ancestor);
            if (!leaves) {
                leaves = new Set();
                this.below.set(ancestor, leaves);
            }
            leaves.add(path);
        }
    }

    remove(path: string): void {
        for (const ancestor of ancestorPaths(path)) {
            const leaves = this.below.get(ancestor);
            if (!leaves) continue;
            leaves.delete(path);
            if (leaves.size === 0) {
                this.below.delete(ancestor);
            }
        }
    }

    /** Leaf paths strictly below `prefix`, unordered. */
    descendants(prefix: string): string[] {
        const leaves = this.below.get(prefix);
        return leaves ? [...leaves] : [];
    }
}

/**
 * Value for a placeholder key: the leaf stored at that exact path, or the
 * nested mapping of everything under it, or `undefined`. Without an index
 * the whole map is scanned.
 */
export function lookupPath(
    values: ReadonlyMap<string, FragmentValue>,
    key: string,
    index?: PathIndex
): FragmentValue | undefined {
    const leaf = values.get(key);
    if (leaf !== undefined) return leaf;

    const paths = index ? index.descendants(key) : [...values.keys()].filter(path => isUnder(path, key));
    if (paths.length === 0) return undefined;

    const subtree = new Map<string, FragmentValue>();
    for (const path of paths) {
        const value = values.get(path);
        if (value !== undefined) subtree.set(path, value);
    }
    return unflatten(subtree, key);
}

/** Ancestor paths of `a.b.c`: `a`, `a.b`. */
export function ancestorPaths(path: string): string[] {
    const segments = path.split(PATH_SEPARATOR);
    const ancestors: string[] = [];
    for (let i = 1; i < segments.length; i++) {
        ancestors.push(segments.slice(0, i).join(PATH_SEPARATOR));
    }
    return ancestors;
}

export function isUnder(path: string, prefix: string): boolean {
    return path.startsWith(`${prefix}${PATH_SEPARATOR}`);
}
