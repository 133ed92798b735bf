import type { FragmentValue, ResolutionKind, SourcePosition } from './domain.js';
import { PathIndex, ancestorPaths, lookupPath } from './flatten.js';
import { ProvenanceTracker } from './provenance.js';
import { ResolvedConfiguration } from './configuration.js';

export interface WriteSource {
    fragmentId: string;
    position?: SourcePosition;
}

/**
 * Mutable merge state passed through the pipeline. Values and provenance
 * are updated in the same call so they cannot drift apart.
 */
export class ConfigurationBuilder {
    private readonly values = new Map<string, FragmentValue>();
    private readonly index = new PathIndex();
    private readonly provenance = new ProvenanceTracker();
    private fragmentIndex = -1;

    constructor(private readonly clock: () => number = Date.now) { }

    /** Advance to the next fragment; returns its position in load order. */
    beginFragment(): number {
        this.fragmentIndex++;
        return this.fragmentIndex;
    }

    /**
     * Last writer wins. A leaf replaces any leaf at an ancestor path and
     * everything below its own path.
     */
    write(path: string, value: FragmentValue, source: WriteSource): void {
        for (const ancestor of ancestorPaths(path)) {
            if (this.values.has(ancestor)) {
                this.remove(ancestor);
            }
        }
        for (const descendant of this.index.descendants(path)) {
            this.remove(descendant);
        }

        this.values.set(path, value);
        this.index.add(path);
        this.provenance.track(path, {
            source: source.fragmentId,
            kind: 'direct',
            line: source.position?.line,
            col: source.position?.col,
            timestamp: this.clock()
        });
    }

    /** Replace a value after substitution, keeping its writer. */
    resolve(path: string, value: FragmentValue, kind: ResolutionKind): void {
        this.provenance.setKind(path, kind);
        this.values.set(path, value);
    }

    has(path: string): boolean {
        return this.values.has(path);
    }

    get(path: string): FragmentValue | undefined {
        return this.values.get(path);
    }

    lookup(key: string): FragmentValue | undefined {
        return lookupPath(this.values, key, this.index);
    }

    /** Fragment that last wrote `path`. */
    sourceOf(path: string): string | undefined {
        return this.provenance.get(path)?.source;
    }

    paths(): string[] {
        return [...this.values.keys()];
    }

    build(safePlaceholders: Iterable<string> = []): ResolvedConfiguration {
        return new ResolvedConfiguration(this.values, this.provenance, safePlaceholders);
    }

    private remove(path: string): void {
        this.values.delete(path);
        this.index.remove(path);
        this.provenance.delete(path);
    }
}
