import type { FragmentMapping, FragmentValue, ProvenanceEntry } from './domain.js';
import { PathIndex, lookupPath, unflatten } from './flatten.js';
import { ProvenanceTracker, type NestedProvenance } from './provenance.js';
import { ProvenanceInconsistencyError } from './validators.js';

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const item of Object.values(value)) {
            deepFreeze(item);
        }
    }
    return value;
}

/**
 * Every key path has exactly one provenance entry and every entry belongs
 * to a key path.
 */
export function assertProvenanceConsistency(
    values: ReadonlyMap<string, FragmentValue>,
    provenance: ProvenanceTracker
): void {
    const missing = [...values.keys()].filter(path => !provenance.has(path)).sort();
    const orphan = provenance.paths().filter(path => !values.has(path));
    if (missing.length > 0 || orphan.length > 0) {
        throw new ProvenanceInconsistencyError(missing, orphan);
    }
}

/**
 * The frozen result of a merge. Nothing reachable from it can be mutated,
 * so renderers only ever read it.
 */
export class ResolvedConfiguration {
    /** Names the merge left unsubstituted; renderers skip them too. Sorted. */
    readonly safePlaceholders: readonly string[];
    private readonly values: ReadonlyMap<string, FragmentValue>;
    private readonly index: PathIndex;
    private readonly provenance: ProvenanceTracker;

    constructor(
        values: ReadonlyMap<string, FragmentValue>,
        provenance: ProvenanceTracker,
        safePlaceholders: Iterable<string> = []
    ) {
        assertProvenanceConsistency(values, provenance);
        const frozen = new Map<string, FragmentValue>();
        for (const path of [...values.keys()].sort()) {
            const value = values.get(path);
            if (value !== undefined) frozen.set(path, deepFreeze(value));
        }
        this.values = frozen;
        this.index = PathIndex.from(frozen.keys());
        this.provenance = provenance.clone();
        this.safePlaceholders = Object.freeze([...new Set(safePlaceholders)].sort());
        Object.freeze(this);
    }

    get size(): number {
        return this.values.size;
    }

    /** Key paths in sorted order. */
    keys(): string[] {
        return [...this.values.keys()];
    }

    has(path: string): boolean {
        return this.values.has(path);
    }

    get(path: string): FragmentValue | undefined {
        return this.values.get(path);
    }

    /** Leaf at `key`, or the nested mapping below it. */
    lookup(key: string): FragmentValue | undefined {
        return lookupPath(this.values, key, this.index);
    }

    toNested(): FragmentMapping {
        return unflatten(this.values);
    }

    getParameterSource(path: string): ProvenanceEntry | undefined {
        return this.provenance.get(path);
    }

    provenanceEntries(): Array<[string, ProvenanceEntry]> {
        return this.provenance.entries();
    }

    exportProvenance(): NestedProvenance {
        return this.provenance.exportToDict();
    }

    describeProvenance(): string {
        return this.provenance.toString();
    }
}
