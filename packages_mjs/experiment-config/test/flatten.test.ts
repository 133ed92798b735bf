import { describe, it, expect } from '@jest/globals';
import { PathIndex, ancestorPaths, flatten, isUnder, lookupPath, toFragmentValue, unflatten } from '../src/flatten.js';
import type { FragmentValue } from '../src/domain.js';

describe('flatten', () => {
    it('should produce dotted paths with lists as leaves', () => {
        const entries = flatten({ a: { b: 1, c: [1, { x: 2 }] }, d: {}, e: null });
        expect(entries).toEqual([
            ['a.b', 1],
            ['a.c', [1, { x: 2 }]],
            ['e', null]
        ]);
    });

    it('should honour a prefix', () => {
        expect(flatten({ version: 'v1' }, 'model')).toEqual([['model.version', 'v1']]);
    });
});

describe('unflatten', () => {
    const values = new Map<string, FragmentValue>([
        ['z', true],
        ['a.c', 'x'],
        ['a.b', 1]
    ]);

    it('should rebuild the nested form', () => {
        expect(unflatten(values)).toEqual({ a: { b: 1, c: 'x' }, z: true });
    });

    it('should rebuild only what lies under a prefix', () => {
        expect(unflatten(values, 'a')).toEqual({ b: 1, c: 'x' });
    });

    it('should skip a path whose ancestor holds a leaf', () => {
        const clashing = new Map<string, FragmentValue>([['a', 1], ['a.b', 2]]);
        expect(unflatten(clashing)).toEqual({ a: 1 });
    });
});

describe('lookupPath', () => {
    const values = new Map<string, FragmentValue>([
        ['model.version', 'first'],
        ['model.name', 'm'],
        ['modelling.x', 1]
    ]);

    it('should return a leaf', () => {
        expect(lookupPath(values, 'model.version')).toBe('first');
    });

    it('should return the subtree below a key', () => {
        expect(lookupPath(values, 'model')).toEqual({ name: 'm', version: 'first' });
    });

    it('should not match on a shared name prefix', () => {
        expect(lookupPath(values, 'mod')).toBeUndefined();
        expect(lookupPath(values, 'missing')).toBeUndefined();
    });
});

describe('PathIndex', () => {
    it('should list the leaves below each interior prefix', () => {
        const index = PathIndex.from(['a.b.c', 'a.d', 'e']);

        expect(index.descendants('a').sort()).toEqual(['a.b.c', 'a.d']);
        expect(index.descendants('a.b')).toEqual(['a.b.c']);
        expect(index.descendants('e')).toEqual([]);
    });

    it('should forget removed leaves and empty prefixes', () => {
        const index = PathIndex.from(['a.b.c', 'a.d']);
        index.remove('a.b.c');

        expect(index.descendants('a.b')).toEqual([]);
        expect(index.descendants('a')).toEqual(['a.d']);
    });

    it('should give lookupPath the same answers as a full scan', () => {
        const values = new Map<string, FragmentValue>([
            ['model.version', 'first'],
            ['model.name', 'm'],
            ['modelling.x', 1]
        ]);
        const index = PathIndex.from(values.keys());

        for (const key of ['model', 'model.name', 'mod', 'modelling', 'missing']) {
            expect(lookupPath(values, key, index)).toEqual(lookupPath(values, key));
        }
    });
});

describe('path helpers', () => {
    it('should list ancestors from the root down', () => {
        expect(ancestorPaths('a.b.c')).toEqual(['a', 'a.b']);
        expect(ancestorPaths('a')).toEqual([]);
    });

    it('should test strict descendants', () => {
        expect(isUnder('a.b', 'a')).toBe(true);
        expect(isUnder('ab', 'a')).toBe(false);
        expect(isUnder('a', 'a')).toBe(false);
    });
});

describe('toFragmentValue', () => {
    it('should turn dates into ISO strings', () => {
        expect(toFragmentValue(new Date('2024-01-02T03:04:05Z'))).toBe('2024-01-02T03:04:05.000Z');
    });

    it('should stringify non-finite numbers', () => {
        expect(toFragmentValue(Infinity)).toBe('Infinity');
    });

    it('should reject values outside the model', () => {
        expect(toFragmentValue(() => 1)).toBeUndefined();
        expect(toFragmentValue({ a: undefined })).toBeUndefined();
        expect(toFragmentValue([1, Symbol('x')])).toBeUndefined();
    });
});
