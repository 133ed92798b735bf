/**
 * Merge engine: folds fragments in load order into one configuration.
 *
 * Immediate placeholders (%KEY%) are substituted once per fragment, right
 * after its keys are written, against the state merged so far. Deferred
 * placeholders (%^KEY%) are substituted in one pass after the last
 * fragment, against the fully merged state.
 */

import { substitute, type Lookup, type PlaceholderKind, type UnresolvedToken } from '@expflow/placeholder-resolver';
import type { Fragment, FragmentMapping, FragmentValue, MergeOptions, MergeReport, PlaceholderContext } from './domain.js';
import { flatten, isMapping, toFragmentValue } from './flatten.js';
import { ConfigurationBuilder } from './builder.js';
import { ResolvedConfiguration } from './configuration.js';
import {
    FragmentFormatError,
    NameListSchema,
    SettingsValidationError,
    UnresolvedPlaceholderError,
    formatIssues,
    type UnresolvedReference
} from './validators.js';
import { getLogger } from './logger.js';

const logger = getLogger('merge');

export const SAFE_PLACEHOLDERS_KEY = 'SAFE_PLACEHOLDERS';

interface ValidFragment {
    id: string;
    content: FragmentMapping;
    positions?: Fragment['positions'];
}

export interface ValueSubstitution {
    value: FragmentValue;
    substituted: number;
    unresolved: UnresolvedToken[];
}

export interface MergeResult {
    configuration: ResolvedConfiguration;
    report: MergeReport;
}

/**
 * Substitute placeholders in every string of a value, including strings in
 * lists and in mappings nested inside lists. Non-string scalars pass through.
 */
export function substituteValue(
    value: FragmentValue,
    lookup: Lookup,
    kinds: readonly PlaceholderKind[],
    safe: ReadonlySet<string>
): ValueSubstitution {
    if (typeof value === 'string') {
        const result = substitute(value, lookup, { kinds, safe });
        return { value: result.text, substituted: result.substituted, unresolved: result.unresolved };
    }

    if (Array.isArray(value)) {
        const items: FragmentValue[] = [];
        let substituted = 0;
        const unresolved: UnresolvedToken[] = [];
        for (const item of value) {
            const result = substituteValue(item, lookup, kinds, safe);
            items.push(result.value);
            substituted += result.substituted;
            unresolved.push(...result.unresolved);
        }
        return { value: items, substituted, unresolved };
    }

    if (value !== null && typeof value === 'object') {
        const mapping: FragmentMapping = {};
        let substituted = 0;
        const unresolved: UnresolvedToken[] = [];
        for (const [key, item] of Object.entries(value)) {
            const result = substituteValue(item, lookup, kinds, safe);
            mapping[key] = result.value;
            substituted += result.substituted;
            unresolved.push(...result.unresolved);
        }
        return { value: mapping, substituted, unresolved };
    }

    return { value, substituted: 0, unresolved: [] };
}

function validateFragment(fragment: Fragment): ValidFragment {
    if (!isMapping(fragment.content)) {
        const found = fragment.content === null ? 'null' : Array.isArray(fragment.content) ? 'list' : typeof fragment.content;
        throw new FragmentFormatError(fragment.id, `expected a mapping at the top level, found ${found}`);
    }

    const content = toFragmentValue(fragment.content);
    if (content === undefined || !isMapping(content) || Array.isArray(content)) {
        throw new FragmentFormatError(fragment.id, 'contains a value that is not a scalar, list or mapping');
    }

    return { id: fragment.id, content, positions: fragment.positions };
}

function toReferences(tokens: UnresolvedToken[], context: PlaceholderContext): UnresolvedReference[] {
    return tokens.map(token => ({ key: token.key, kind: token.kind, context }));
}

export class MergeEngine {
    private readonly clock: () => number;
    private readonly extraSafe: string[];

    constructor(options: MergeOptions = {}) {
        this.clock = options.clock ?? Date.now;
        this.extraSafe = [...(options.safePlaceholders ?? [])];
    }

    merge(fragments: readonly Fragment[]): MergeResult {
        try {
            const validated = fragments.map(validateFragment);
            const safe = this.collectSafePlaceholders(validated);

            const report: MergeReport = {
                fragmentsMerged: [],
                keyCount: 0,
                immediateSubstitutions: 0,
                deferredSubstitutions: 0,
                safePlaceholders: [...safe].sort()
            };

            const builder = new ConfigurationBuilder(this.clock);
            for (const fragment of validated) {
                report.immediateSubstitutions += this.mergeFragment(builder, fragment, safe);
                report.fragmentsMerged.push(fragment.id);
            }
            report.deferredSubstitutions = this.resolveDeferred(builder, safe);

            const configuration = builder.build(safe);
            report.keyCount = configuration.size;

            logger.info(
                `Merged ${report.fragmentsMerged.length} fragments into ${report.keyCount} keys ` +
                `(${report.immediateSubstitutions} immediate, ${report.deferredSubstitutions} deferred substitutions)`
            );
            return { configuration, report };
        } catch (error) {
            logger.error('Configuration assembly failed', error);
            throw error;
        }
    }

    /**
     * Fixed for the whole run: names given in the options plus the
     * SAFE_PLACEHOLDERS list of the last fragment that defines one.
     */
    private collectSafePlaceholders(fragments: ValidFragment[]): ReadonlySet<string> {
        const safe = new Set(this.extraSafe);
        let declared: unknown = undefined;
        let declaredBy = '';
        for (const fragment of fragments) {
            if (SAFE_PLACEHOLDERS_KEY in fragment.content) {
                declared = fragment.content[SAFE_PLACEHOLDERS_KEY];
                declaredBy = fragment.id;
            }
        }

        const parsed = NameListSchema.safeParse(declared);
        if (!parsed.success) {
            throw new SettingsValidationError(
                `Invalid ${SAFE_PLACEHOLDERS_KEY} in '${declaredBy}': ${formatIssues(parsed.error)}`
            );
        }
        for (const name of parsed.data) {
            safe.add(name);
        }
        return safe;
    }

    /** Write one fragment, then run its immediate pass. Returns the substitution count. */
    private mergeFragment(builder: ConfigurationBuilder, fragment: ValidFragment, safe: ReadonlySet<string>): number {
        const index = builder.beginFragment();

        const written = new Set<string>();
        for (const [path, value] of flatten(fragment.content)) {
            builder.write(path, value, { fragmentId: fragment.id, position: fragment.positions?.get(path) });
            written.add(path);
        }

        // Lookups see this fragment's writes; results are applied after the scan
        // so the outcome does not depend on key order within the fragment.
        const pending: Array<[string, FragmentValue]> = [];
        const unresolved: UnresolvedReference[] = [];
        let substituted = 0;

        for (const path of written) {
            const value = builder.get(path);
            if (value === undefined) continue; // replaced by a later key of the same fragment

            const result = substituteValue(value, key => builder.lookup(key), ['immediate'], safe);
            unresolved.push(...toReferences(result.unresolved, { scope: 'fragment', name: fragment.id, keyPath: path }));
            if (result.substituted > 0) {
                pending.push([path, result.value]);
                substituted += result.substituted;
            }
        }

        if (unresolved.length > 0) {
            throw new UnresolvedPlaceholderError(unresolved);
        }

        for (const [path, value] of pending) {
            builder.resolve(path, value, 'immediate-placeholder');
        }

        logger.debug(
            `Fragment #${index} '${fragment.id}': ${written.size} keys written, ${substituted} immediate substitutions`
        );
        return substituted;
    }

    /** Deferred pass over the whole configuration. Returns the substitution count. */
    private resolveDeferred(builder: ConfigurationBuilder, safe: ReadonlySet<string>): number {
        const pending: Array<[string, FragmentValue]> = [];
        const unresolved: UnresolvedReference[] = [];
        let substituted = 0;

        for (const path of builder.paths()) {
            const value = builder.get(path);
            if (value === undefined) continue;

            const result = substituteValue(value, key => builder.lookup(key), ['deferred'], safe);
            const writer = builder.sourceOf(path) ?? '<unknown>';
            unresolved.push(...toReferences(result.unresolved, { scope: 'configuration', name: writer, keyPath: path }));
            if (result.substituted > 0) {
                pending.push([path, result.value]);
                substituted += result.substituted;
            }
        }

        if (unresolved.length > 0) {
            throw new UnresolvedPlaceholderError(unresolved);
        }

        for (const [path, value] of pending) {
            builder.resolve(path, value, 'deferred-placeholder');
        }

        logger.debug(`Deferred pass: ${substituted} substitutions in ${pending.length} keys`);
        return substituted;
    }
}

export function mergeFragments(fragments: readonly Fragment[], options: MergeOptions = {}): ResolvedConfiguration {
    return new MergeEngine(options).merge(fragments).configuration;
}
