/**
 * Provenance tracking for configuration key paths.
 *
 * One entry per key path, always the last writer. Stored flat (dotted
 * paths) and exported as a nested mapping mirroring the configuration.
 */

import type { ProvenanceEntry, ResolutionKind } from './domain.js';
import { PATH_SEPARATOR, isMapping, isUnder, joinPath } from './flatten.js';
import { ProvenanceEntrySchema, ProvenanceInconsistencyError, formatIssues, DocumentFormatError } from './validators.js';
import { getLogger } from './logger.js';

const logger = getLogger('provenance');

export interface NestedProvenance {
    [key: string]: NestedProvenance | ProvenanceEntry;
}

function isEntry(value: unknown): boolean {
    return isMapping(value) && typeof value.source === 'string' && typeof value.kind === 'string';
}

function isProvenanceEntry(node: NestedProvenance | ProvenanceEntry): node is ProvenanceEntry {
    return typeof node.source === 'string';
}

export class ProvenanceTracker {
    private readonly entries_ = new Map<string, ProvenanceEntry>();

    /** Record the writer of `path`, replacing any earlier entry. */
    track(path: string, entry: ProvenanceEntry): void {
        const stored: ProvenanceEntry = { source: entry.source, kind: entry.kind, timestamp: entry.timestamp };
        if (entry.line !== undefined) stored.line = entry.line;
        if (entry.col !== undefined) stored.col = entry.col;
        this.entries_.set(path, stored);
    }

    get(path: string): ProvenanceEntry | undefined {
        const entry = this.entries_.get(path);
        return entry ? { ...entry } : undefined;
    }

    has(path: string): boolean {
        return this.entries_.has(path);
    }

    get size(): number {
        return this.entries_.size;
    }

    delete(path: string): boolean {
        return this.entries_.delete(path);
    }

    /** Drop every entry strictly below `prefix`. */
    deleteUnder(prefix: string): string[] {
        const removed: string[] = [];
        for (const path of [...this.entries_.keys()]) {
            if (isUnder(path, prefix)) {
                this.entries_.delete(path);
                removed.push(path);
            }
        }
        return removed;
    }

    setKind(path: string, kind: ResolutionKind): void {
        const entry = this.entries_.get(path);
        if (!entry) {
            throw new ProvenanceInconsistencyError([path], []);
        }
        entry.kind = kind;
    }

    paths(): string[] {
        return [...this.entries_.keys()].sort();
    }

    entries(): Array<[string, ProvenanceEntry]> {
        const result: Array<[string, ProvenanceEntry]> = [];
        for (const path of this.paths()) {
            const entry = this.entries_.get(path);
            if (entry) result.push([path, { ...entry }]);
        }
        return result;
    }

    clone(): ProvenanceTracker {
        const copy = new ProvenanceTracker();
        for (const [path, entry] of this.entries_) {
            copy.track(path, entry);
        }
        return copy;
    }

    clear(): void {
        this.entries_.clear();
    }

    /**
     * Nested form, keys in path order. Optional `line`/`col` are omitted
     * when unknown.
     */
    exportToDict(): NestedProvenance {
        const result: NestedProvenance = {};

        for (const [path, entry] of this.entries()) {
            const segments = path.split(PATH_SEPARATOR);
            const leaf = segments.pop();
            if (leaf === undefined) continue;

            let current: NestedProvenance = result;
            let collided = false;
            for (const segment of segments) {
                const next: NestedProvenance | ProvenanceEntry | undefined = current[segment];
                if (next === undefined) {
                    const created: NestedProvenance = {};
                    current[segment] = created;
                    current = created;
                } else if (!isProvenanceEntry(next)) {
                    current = next;
                } else {
                    collided = true;
                    break;
                }
            }

            if (collided) {
                logger.warn(`Skipping provenance for '${path}': an ancestor path holds an entry`);
                continue;
            }
            current[leaf] = entry;
        }

        return result;
    }

    /** Inverse of `exportToDict`. A leaf is any mapping with `source` and `kind`. */
    importFromDict(nested: unknown, prefix = ''): void {
        if (!isMapping(nested)) {
            throw new DocumentFormatError(`Provenance section at '${prefix || '<root>'}' is not a mapping`);
        }

        for (const [key, value] of Object.entries(nested)) {
            const path = joinPath(prefix, key);
            if (isEntry(value)) {
                const parsed = ProvenanceEntrySchema.safeParse(value);
                if (!parsed.success) {
                    throw new DocumentFormatError(`Invalid provenance entry for '${path}': ${formatIssues(parsed.error)}`);
                }
                this.track(path, parsed.data);
            } else {
                this.importFromDict(value, path);
            }
        }
    }

    toString(): string {
        const count = this.entries_.size;
        return `ProvenanceTracker(${count} ${count === 1 ? 'parameter' : 'parameters'} tracked)`;
    }
}
