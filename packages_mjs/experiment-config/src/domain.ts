/**
 * Data models for the configuration pipeline.
 */

export type Scalar = string | number | boolean | null;

export type FragmentValue = Scalar | FragmentValue[] | FragmentMapping;

export interface FragmentMapping {
    [key: string]: FragmentValue;
}

export interface SourcePosition {
    /** 1-based */
    line: number;
    /** 1-based */
    col: number;
}

/**
 * One unit of configuration input. `content` is checked to be a mapping
 * when the fragment is merged, so loaders may hand over anything they parsed.
 */
export interface Fragment {
    id: string;
    content: unknown;
    /** Key path → position of the key in the fragment's source text. */
    positions?: ReadonlyMap<string, SourcePosition>;
}

export type ResolutionKind = 'direct' | 'immediate-placeholder' | 'deferred-placeholder';

export interface ProvenanceEntry {
    source: string;
    kind: ResolutionKind;
    line?: number;
    col?: number;
    timestamp: number;
}

export interface MergeOptions {
    /** Names exempt from substitution, in addition to any SAFE_PLACEHOLDERS the fragments define. */
    safePlaceholders?: Iterable<string>;
    clock?: () => number;
}

export interface MergeReport {
    fragmentsMerged: string[];
    keyCount: number;
    immediateSubstitutions: number;
    deferredSubstitutions: number;
    safePlaceholders: string[];
}

export type PlaceholderScope = 'fragment' | 'configuration' | 'template';

export interface PlaceholderContext {
    scope: PlaceholderScope;
    /** Fragment identifier, or template/job name. */
    name: string;
    keyPath?: string;
}
