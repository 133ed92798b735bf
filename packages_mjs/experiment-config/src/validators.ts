/**
 * Validation schemas and custom errors.
 */

import { z } from 'zod';
import type { PlaceholderKind } from '@expflow/placeholder-resolver';
import type { PlaceholderContext } from './domain.js';

export const ResolutionKindSchema = z.enum(['direct', 'immediate-placeholder', 'deferred-placeholder']);

export const ProvenanceEntrySchema = z.object({
    source: z.string().min(1),
    kind: ResolutionKindSchema,
    line: z.number().int().positive().optional(),
    col: z.number().int().positive().optional(),
    timestamp: z.number()
});

const emptyToUndefined = (value: unknown): unknown => (value === '' || value === null ? undefined : value);

export const NameListSchema = z.preprocess(
    emptyToUndefined,
    z.union([
        z.array(z.string().min(1)),
        z.string().transform(value => value.split(/[\s,]+/).filter(name => name.length > 0))
    ]).default([])
);

export const CoreSettingsSchema = z.object({
    SAFE_PLACEHOLDERS: NameListSchema,
    EXTENDED_HEADER_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
    EXTENDED_TAILER_PATH: z.preprocess(emptyToUndefined, z.string().optional())
});

export function formatIssues(error: z.ZodError): string {
    return error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
}

export class ExpConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ExpConfigError';
    }
}

export class FragmentFormatError extends ExpConfigError {
    constructor(
        public readonly fragmentId: string,
        public readonly reason: string
    ) {
        super(`Fragment '${fragmentId}' is not a valid mapping: ${reason}`);
        this.name = 'FragmentFormatError';
    }
}

export class FragmentNotFoundError extends ExpConfigError {
    constructor(public readonly path: string) {
        super(`Fragment file not found: ${path}`);
        this.name = 'FragmentNotFoundError';
    }
}

export interface UnresolvedReference {
    key: string;
    kind: PlaceholderKind;
    context: PlaceholderContext;
}

function describeReference(ref: UnresolvedReference): string {
    const where = ref.context.keyPath ? `${ref.context.name} (${ref.context.keyPath})` : ref.context.name;
    return `'${ref.key}' in ${ref.context.scope} ${where}`;
}

export class UnresolvedPlaceholderError extends ExpConfigError {
    public readonly keys: string[];

    constructor(public readonly references: UnresolvedReference[]) {
        super(`Unresolved placeholder(s): ${references.map(describeReference).join('; ')}`);
        this.name = 'UnresolvedPlaceholderError';
        this.keys = [...new Set(references.map(ref => ref.key))];
    }
}

export class ProvenanceInconsistencyError extends ExpConfigError {
    constructor(
        public readonly missingProvenance: string[],
        public readonly orphanProvenance: string[]
    ) {
        const parts: string[] = [];
        if (missingProvenance.length > 0) {
            parts.push(`keys without provenance: ${missingProvenance.join(', ')}`);
        }
        if (orphanProvenance.length > 0) {
            parts.push(`provenance without keys: ${orphanProvenance.join(', ')}`);
        }
        super(`Provenance inconsistency (${parts.join('; ')})`);
        this.name = 'ProvenanceInconsistencyError';
    }
}

export class SettingsValidationError extends ExpConfigError {
    constructor(message: string) {
        super(message);
        this.name = 'SettingsValidationError';
    }
}

export class DocumentFormatError extends ExpConfigError {
    constructor(message: string) {
        super(message);
        this.name = 'DocumentFormatError';
    }
}
