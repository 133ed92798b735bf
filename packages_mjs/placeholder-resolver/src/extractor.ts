import { PATTERNS } from './patterns.js';

export type PlaceholderKind = 'immediate' | 'deferred';

export interface Placeholder {
    raw: string;
    key: string;
    kind: PlaceholderKind;
    start: number;
    end: number;
}

export function extractPlaceholders(text: string): Placeholder[] {
    const placeholders: Placeholder[] = [];

    // TOKEN is shared and global; start every scan from the beginning
    PATTERNS.TOKEN.lastIndex = 0;

    let match;
    while ((match = PATTERNS.TOKEN.exec(text)) !== null) {
        const key = match[2];
        if (key === undefined) continue; // %% escape
        placeholders.push({
            raw: match[0],
            key,
            kind: match[1] === PATTERNS.DEFERRED_MARKER ? 'deferred' : 'immediate',
            start: match.index,
            end: match.index + match[0].length
        });
    }

    return placeholders;
}

/** True when `text` holds at least one placeholder; `%%` escapes do not count. */
export function hasPlaceholders(text: string): boolean {
    if (!text) return false;
    return extractPlaceholders(text).length > 0;
}
