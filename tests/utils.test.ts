import { describe, expect, it } from 'vitest';
import {
    compareKeys,
    errorMessage,
    flattenRecord,
    groupBy,
    groupOf,
    joinKey,
    localName,
    matchesAny,
    sortKeys,
    uniquePreserveOrder,
} from '../src/utils.js';

describe('key utilities', () => {
    it('splits keys at the last separator', () => {
        expect(groupOf('snap00010/phi')).toBe('snap00010');
        expect(groupOf('a/b/c')).toBe('a/b');
        expect(groupOf('description')).toBe('');
        expect(localName('a/b/c')).toBe('c');
        expect(localName('description')).toBe('description');
    });

    it('joins non-empty segments', () => {
        expect(joinKey('', 'gtc', 'tstep')).toBe('gtc/tstep');
    });

    it('sorts by code unit regardless of locale', () => {
        expect(sortKeys(['s0/p', 'S0/p', 's0/a', 's0-x'])).toEqual(['S0/p', 's0-x', 's0/a', 's0/p']);
        expect(compareKeys('a', 'a')).toBe(0);
    });
});

describe('matchesAny', () => {
    it('matches exact keys, groups and regexes', () => {
        expect(matchesAny('snap00010/phi', ['snap00010'])).toBe(true);
        expect(matchesAny('snap00010/phi', ['snap00010/phi'])).toBe(true);
        expect(matchesAny('snap00010/phi', [/phi$/])).toBe(true);
        expect(matchesAny('snap00010/phi', ['snap0001'])).toBe(false);
        expect(matchesAny('snap00010/phi', [])).toBe(false);
    });
});

describe('collections', () => {
    it('deduplicates in first-seen order', () => {
        expect(uniquePreserveOrder(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
    });

    it('groups in first-seen order', () => {
        const groups = groupBy(['s2/p', 's0/p', 's2/x'], groupOf);

        expect([...groups.entries()]).toEqual([
            ['s2', ['s2/p', 's2/x']],
            ['s0', ['s0/p']],
        ]);
    });

    it('flattens nested plain objects only', () => {
        expect(flattenRecord({ snap: { phi: [1, 2], inner: { n: 1 } }, nspecies: 2, none: null })).toEqual({
            'snap/phi': [1, 2],
            'snap/inner/n': 1,
            nspecies: 2,
            none: null,
        });
    });

    it('keeps keys named like Object.prototype members', () => {
        const flat = flattenRecord(JSON.parse('{"__proto__": 1, "gtc": {"__proto__": 2, "constructor": 3}}'));

        expect(Object.entries(flat)).toEqual([
            ['__proto__', 1],
            ['gtc/__proto__', 2],
            ['gtc/constructor', 3],
        ]);
        expect(Object.getPrototypeOf(flat)).toBe(Object.prototype);
    });

    it('describes thrown values', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
    });
});
