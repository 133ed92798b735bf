/**
 * Serialized form of a resolved configuration: the nested configuration
 * plus a PROVENANCE section and, when the merge had any, the safe
 * placeholder names, as YAML or JSON.
 */

import * as fs from 'fs';
import * as jsYaml from 'js-yaml';
import type { FragmentValue } from './domain.js';
import { flatten, isMapping, toFragmentValue } from './flatten.js';
import { ProvenanceTracker } from './provenance.js';
import { ResolvedConfiguration } from './configuration.js';
import { DocumentFormatError, NameListSchema, formatIssues } from './validators.js';
import { getLogger } from './logger.js';

const logger = getLogger('document');

export const PROVENANCE_SECTION = 'PROVENANCE';
export const SAFE_PLACEHOLDERS_SECTION = 'RESOLVED_SAFE_PLACEHOLDERS';

export type DocumentFormat = 'yaml' | 'json';

export interface SerializeOptions {
    format?: DocumentFormat;
}

export function serializeConfiguration(config: ResolvedConfiguration, options: SerializeOptions = {}): string {
    const format = options.format ?? 'yaml';
    const nested = config.toNested();
    for (const reserved of [PROVENANCE_SECTION, SAFE_PLACEHOLDERS_SECTION]) {
        if (reserved in nested) {
            throw new DocumentFormatError(`Configuration defines a top-level '${reserved}' key`);
        }
    }

    const document: Record<string, unknown> = { ...nested, [PROVENANCE_SECTION]: config.exportProvenance() };
    if (config.safePlaceholders.length > 0) {
        document[SAFE_PLACEHOLDERS_SECTION] = [...config.safePlaceholders];
    }

    if (format === 'json') {
        return JSON.stringify(document, null, 2) + '\n';
    }
    return jsYaml.dump(document, { sortKeys: true, lineWidth: -1, noRefs: true });
}

export function parseConfigurationDocument(text: string, source = '<document>'): ResolvedConfiguration {
    let raw: unknown;
    try {
        raw = jsYaml.load(text, { filename: source, schema: jsYaml.CORE_SCHEMA });
    } catch (error) {
        if (error instanceof jsYaml.YAMLException) {
            throw new DocumentFormatError(`Cannot parse ${source}: ${error.message}`);
        }
        throw error;
    }

    if (!isMapping(raw)) {
        throw new DocumentFormatError(`${source} is not a mapping`);
    }
    if (!(PROVENANCE_SECTION in raw)) {
        throw new DocumentFormatError(`${source} has no ${PROVENANCE_SECTION} section`);
    }

    const { [PROVENANCE_SECTION]: provenanceSection, [SAFE_PLACEHOLDERS_SECTION]: safeSection, ...rest } = raw;
    const safe = NameListSchema.safeParse(safeSection);
    if (!safe.success) {
        throw new DocumentFormatError(`Invalid ${SAFE_PLACEHOLDERS_SECTION} in ${source}: ${formatIssues(safe.error)}`);
    }

    const content = toFragmentValue(rest);
    if (content === undefined || !isMapping(content) || Array.isArray(content)) {
        throw new DocumentFormatError(`${source} holds values that are not scalars, lists or mappings`);
    }

    const values = new Map<string, FragmentValue>(flatten(content));
    const provenance = new ProvenanceTracker();
    provenance.importFromDict(provenanceSection);

    return new ResolvedConfiguration(values, provenance, safe.data);
}

/** Write the nested provenance as pretty JSON. */
export function exportProvenance(config: ResolvedConfiguration, filePath: string): void {
    fs.writeFileSync(filePath, JSON.stringify(config.exportProvenance(), null, 2) + '\n', 'utf8');
    logger.info(`Provenance exported to ${filePath} (${config.describeProvenance()})`);
}
