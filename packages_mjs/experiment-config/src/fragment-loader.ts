/**
 * Reads configuration fragments from YAML text and files.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as jsYaml from 'js-yaml';
import { glob } from 'glob';
import { LineCounter, isMap, isScalar, parseDocument, type Node as YamlNode } from 'yaml';
import type { Fragment, SourcePosition } from './domain.js';
import { isMapping, joinPath } from './flatten.js';
import { FragmentFormatError, FragmentNotFoundError } from './validators.js';
import { getLogger } from './logger.js';

const logger = getLogger('loader');

export const DEFAULT_FRAGMENT_PATTERN = '*.{yml,yaml}';

function collectPositions(
    node: YamlNode | null | undefined,
    lineCounter: LineCounter,
    prefix: string,
    positions: Map<string, SourcePosition>
): void {
    if (!isMap(node)) return;

    for (const pair of node.items) {
        if (!isScalar(pair.key)) continue;
        const keyPath = joinPath(prefix, String(pair.key.value));
        const offset = pair.key.range?.[0];
        if (offset !== undefined) {
            const { line, col } = lineCounter.linePos(offset);
            positions.set(keyPath, { line, col });
        }
        if (isMap(pair.value)) {
            collectPositions(pair.value, lineCounter, keyPath, positions);
        }
    }
}

/**
 * Key path → 1-based line/column of the key. Positions are best effort:
 * keys that are not plain scalars (complex keys, aliases) are skipped.
 */
export function locateKeys(text: string): Map<string, SourcePosition> {
    const lineCounter = new LineCounter();
    const document = parseDocument(text, { lineCounter });
    const positions = new Map<string, SourcePosition>();
    collectPositions(document.contents, lineCounter, '', positions);
    return positions;
}

/**
 * Parse one fragment. An empty document is an empty mapping; anything else
 * that is not a mapping is a FragmentFormatError.
 */
export function parseFragment(id: string, text: string): Fragment {
    let content: unknown;
    try {
        content = jsYaml.load(text, { filename: id, schema: jsYaml.CORE_SCHEMA });
    } catch (error) {
        if (error instanceof jsYaml.YAMLException) {
            throw new FragmentFormatError(id, error.message);
        }
        throw error;
    }

    if (content === undefined || content === null) {
        content = {};
    }
    if (!isMapping(content)) {
        const found = Array.isArray(content) ? 'list' : typeof content;
        throw new FragmentFormatError(id, `expected a mapping at the top level, found ${found}`);
    }

    return { id, content, positions: locateKeys(text) };
}

/** Load files in the given order; each fragment is identified by its absolute path. */
export function loadFragmentFiles(files: readonly string[]): Fragment[] {
    return files.map(file => {
        const absolute = path.resolve(file);
        if (!fs.existsSync(absolute)) {
            throw new FragmentNotFoundError(absolute);
        }
        logger.debug(`Loading fragment ${absolute}`);
        return parseFragment(absolute, fs.readFileSync(absolute, 'utf8'));
    });
}

/**
 * Load every fragment in `directory` matching `pattern`, sorted by path so
 * the merge order never depends on the filesystem.
 */
export function loadFragmentDirectory(directory: string, pattern: string = DEFAULT_FRAGMENT_PATTERN): Fragment[] {
    const root = path.resolve(directory);
    if (!fs.existsSync(root)) {
        throw new FragmentNotFoundError(root);
    }

    const files = glob.sync(pattern, { cwd: root, absolute: true, nodir: true })
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    logger.debug(`Discovered ${files.length} fragments in ${root}`);
    return loadFragmentFiles(files);
}
