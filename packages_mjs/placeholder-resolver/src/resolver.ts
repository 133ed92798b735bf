import { PATTERNS } from './patterns.js';
import { coerceToString } from './coercion.js';
import type { PlaceholderKind } from './extractor.js';

/** Returns `undefined` when the key is absent. */
export type Lookup = (key: string) => unknown;

export interface SubstituteOptions {
    /** Placeholder forms this pass replaces; the other form is left as written. */
    kinds: readonly PlaceholderKind[];
    /** Names never substituted, in either form. */
    safe?: ReadonlySet<string>;
    /** Turn `%%` into `%`. Only the script render pass does this. */
    unescape?: boolean;
}

export interface UnresolvedToken {
    raw: string;
    key: string;
    kind: PlaceholderKind;
}

export interface SubstitutionResult {
    text: string;
    substituted: number;
    unresolved: UnresolvedToken[];
}

/**
 * Single left-to-right pass. Replacement text is never scanned again, so a
 * value that itself holds a placeholder is inserted verbatim. Unresolved
 * tokens stay in the text and are reported to the caller.
 */
export function substitute(text: string, lookup: Lookup, options: SubstituteOptions): SubstitutionResult {
    const unresolved: UnresolvedToken[] = [];
    let substituted = 0;

    if (!text) {
        return { text: '', substituted, unresolved };
    }

    const result = text.replace(PATTERNS.TOKEN, (match: string, marker: string | undefined, key: string | undefined) => {
        if (key === undefined) {
            return options.unescape ? '%' : match;
        }

        const kind: PlaceholderKind = marker === PATTERNS.DEFERRED_MARKER ? 'deferred' : 'immediate';
        if (!options.kinds.includes(kind)) return match;
        if (options.safe?.has(key)) return match;

        const value = lookup(key);
        if (value === undefined) {
            unresolved.push({ raw: match, key, kind });
            return match;
        }

        substituted++;
        return coerceToString(value);
    });

    return { text: result, substituted, unresolved };
}
