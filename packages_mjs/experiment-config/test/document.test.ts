import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeAll } from '@jest/globals';
import { exportProvenance, parseConfigurationDocument, serializeConfiguration } from '../src/document.js';
import { MergeEngine, mergeFragments } from '../src/merge-engine.js';
import { DocumentFormatError, ProvenanceInconsistencyError } from '../src/validators.js';
import { setLogLevel } from '../src/logger.js';

const config = mergeFragments(
    [{ id: 'base', content: { run: { name: 'demo', steps: [1, 2] }, label: '%run.name%' } }],
    { clock: () => 5 }
);

describe('configuration documents', () => {
    beforeAll(() => {
        setLogLevel('silent');
    });

    it('should write the configuration with a PROVENANCE section', () => {
        const document: unknown = JSON.parse(serializeConfiguration(config, { format: 'json' }));

        expect(document).toEqual({
            label: 'demo',
            run: { name: 'demo', steps: [1, 2] },
            PROVENANCE: {
                label: { source: 'base', kind: 'immediate-placeholder', timestamp: 5 },
                run: {
                    name: { source: 'base', kind: 'direct', timestamp: 5 },
                    steps: { source: 'base', kind: 'direct', timestamp: 5 }
                }
            }
        });
    });

    it('should read back what it wrote', () => {
        for (const format of ['yaml', 'json'] as const) {
            const restored = parseConfigurationDocument(serializeConfiguration(config, { format }));

            expect(restored.keys()).toEqual(config.keys());
            expect(restored.get('run.steps')).toEqual([1, 2]);
            expect(restored.getParameterSource('label'))
                .toStrictEqual({ source: 'base', kind: 'immediate-placeholder', timestamp: 5 });
        }
    });

    it('should carry the safe placeholder names through the document', () => {
        const { configuration } = new MergeEngine({ safePlaceholders: ['CURRENT_PROJECT'], clock: () => 5 })
            .merge([{ id: 'base', content: { dir: '%CURRENT_PROJECT%/run' } }]);

        const text = serializeConfiguration(configuration, { format: 'json' });
        const document: unknown = JSON.parse(text);
        expect(document).toEqual({
            dir: '%CURRENT_PROJECT%/run',
            PROVENANCE: { dir: { source: 'base', kind: 'direct', timestamp: 5 } },
            RESOLVED_SAFE_PLACEHOLDERS: ['CURRENT_PROJECT']
        });
        expect(parseConfigurationDocument(text).safePlaceholders).toEqual(['CURRENT_PROJECT']);
    });

    it('should refuse a configuration that uses a reserved section name', () => {
        const clashing = mergeFragments([{ id: 'f', content: { RESOLVED_SAFE_PLACEHOLDERS: ['x'] } }]);
        expect(() => serializeConfiguration(clashing))
            .toThrow("Configuration defines a top-level 'RESOLVED_SAFE_PLACEHOLDERS' key");
    });

    it('should refuse a configuration that already has a PROVENANCE key', () => {
        const clashing = mergeFragments([{ id: 'f', content: { PROVENANCE: { a: 1 } } }]);
        expect(() => serializeConfiguration(clashing)).toThrow(DocumentFormatError);
    });

    it('should refuse a document without provenance', () => {
        expect(() => parseConfigurationDocument('a: 1\n', 'doc.yml'))
            .toThrow('doc.yml has no PROVENANCE section');
    });

    it('should refuse a document whose provenance does not match its keys', () => {
        expect(() => parseConfigurationDocument('a: 1\nPROVENANCE: {}\n', 'doc.yml'))
            .toThrow(ProvenanceInconsistencyError);
    });

    it('should export provenance as JSON', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'expflow-doc-'));
        try {
            const file = path.join(dir, 'provenance.json');
            exportProvenance(config, file);

            const exported: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
            expect(exported).toEqual(config.exportProvenance());
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
