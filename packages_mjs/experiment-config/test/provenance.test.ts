import { describe, it, expect, beforeAll } from '@jest/globals';
import { ProvenanceTracker } from '../src/provenance.js';
import { DocumentFormatError, ProvenanceInconsistencyError } from '../src/validators.js';
import { setLogLevel } from '../src/logger.js';

describe('ProvenanceTracker', () => {
    beforeAll(() => {
        setLogLevel('silent');
    });

    it('should keep only the last writer', () => {
        const tracker = new ProvenanceTracker();
        tracker.track('model.version', { source: 'a.yml', kind: 'direct', line: 1, col: 1, timestamp: 1 });
        tracker.track('model.version', { source: 'c.yml', kind: 'direct', timestamp: 2 });

        expect(tracker.size).toBe(1);
        expect(tracker.get('model.version')).toStrictEqual({ source: 'c.yml', kind: 'direct', timestamp: 2 });
    });

    it('should hand out copies', () => {
        const tracker = new ProvenanceTracker();
        tracker.track('x', { source: 'a.yml', kind: 'direct', timestamp: 1 });

        const entry = tracker.get('x');
        if (entry) entry.source = 'changed';

        expect(tracker.get('x')?.source).toBe('a.yml');
    });

    it('should update the resolution kind in place', () => {
        const tracker = new ProvenanceTracker();
        tracker.track('x', { source: 'a.yml', kind: 'direct', timestamp: 1 });
        tracker.setKind('x', 'deferred-placeholder');

        expect(tracker.get('x')?.kind).toBe('deferred-placeholder');
        expect(() => tracker.setKind('y', 'direct')).toThrow(ProvenanceInconsistencyError);
    });

    it('should delete descendants only', () => {
        const tracker = new ProvenanceTracker();
        for (const path of ['a.b', 'a.c', 'ab', 'a']) {
            tracker.track(path, { source: 'f', kind: 'direct', timestamp: 0 });
        }

        expect(tracker.deleteUnder('a')).toEqual(['a.b', 'a.c']);
        expect(tracker.paths()).toEqual(['a', 'ab']);
    });

    it('should export a nested mapping and import it back', () => {
        const tracker = new ProvenanceTracker();
        tracker.track('run.name', { source: 'base.yml', kind: 'direct', line: 2, col: 3, timestamp: 7 });
        tracker.track('label', { source: 'job.yml', kind: 'immediate-placeholder', timestamp: 8 });

        const nested = tracker.exportToDict();
        expect(nested).toEqual({
            label: { source: 'job.yml', kind: 'immediate-placeholder', timestamp: 8 },
            run: { name: { source: 'base.yml', kind: 'direct', line: 2, col: 3, timestamp: 7 } }
        });

        const imported = new ProvenanceTracker();
        imported.importFromDict(nested);
        expect(imported.entries()).toEqual(tracker.entries());
    });

    it('should skip entries hidden below another entry on export', () => {
        const tracker = new ProvenanceTracker();
        tracker.track('a', { source: 'f', kind: 'direct', timestamp: 0 });
        tracker.track('a.b', { source: 'f', kind: 'direct', timestamp: 0 });

        expect(tracker.exportToDict()).toEqual({ a: { source: 'f', kind: 'direct', timestamp: 0 } });
    });

    it('should reject malformed provenance on import', () => {
        const tracker = new ProvenanceTracker();
        expect(() => tracker.importFromDict({ a: { source: 'x', kind: 'bogus', timestamp: 1 } }))
            .toThrow(DocumentFormatError);
        expect(() => tracker.importFromDict({ a: 5 }))
            .toThrow("Provenance section at 'a' is not a mapping");
    });

    it('should describe itself', () => {
        const tracker = new ProvenanceTracker();
        expect(tracker.toString()).toBe('ProvenanceTracker(0 parameters tracked)');
        tracker.track('x', { source: 'f', kind: 'direct', timestamp: 0 });
        expect(tracker.toString()).toBe('ProvenanceTracker(1 parameter tracked)');
    });
});
