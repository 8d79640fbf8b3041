import { describe, expect, it } from 'vitest';
import {
    captureNames,
    compilePattern,
    fillTemplate,
    namedCaptures,
    placeholders,
    positionalCaptures,
} from '../src/pattern.js';

describe('compilePattern', () => {
    it('compiles string sources', () => {
        expect(compilePattern('^his/(?<spc>i|e)$').test('his/i')).toBe(true);
    });

    it('keeps flags other than global and sticky', () => {
        const compiled = compilePattern(/^HIS$/gimy);

        expect(compiled.flags).toBe('im');
        expect(compiled.test('his')).toBe(true);
        expect(compiled.test('his')).toBe(true);
    });

    it('throws on an invalid source', () => {
        expect(() => compilePattern('(unclosed')).toThrow(SyntaxError);
    });
});

describe('captureNames', () => {
    it('lists named captures in declaration order', () => {
        expect(captureNames(/^(?<sect>s\d)\/(?<fld>p|a)$/)).toEqual(['sect', 'fld']);
    });

    it('finds captures inside alternatives that cannot match the empty string', () => {
        expect(captureNames(/^(?:(?<a>x)|(?<b>y))z+$/)).toEqual(['a', 'b']);
    });

    it('returns nothing for a pattern without named captures', () => {
        expect(captureNames(/^g\/(c)$/)).toEqual([]);
    });
});

describe('captures', () => {
    it('omits named groups that did not participate', () => {
        const match = /^(?<spc>i|e)(?:-(?<fld>p|m))?$/.exec('i');

        expect(match && namedCaptures(match)).toEqual({ spc: 'i' });
    });

    it('lists positional captures that participated', () => {
        const match = /^(i|e)(?:-(p|m))?-(f)$/.exec('e-f');

        expect(match && positionalCaptures(match)).toEqual(['e', 'f']);
    });
});

describe('templates', () => {
    it('lists placeholders', () => {
        expect(placeholders('{sect}/mpsi+1')).toEqual(['sect']);
        expect(placeholders('{group}/{case}_x')).toEqual(['group', 'case']);
        expect(placeholders('gtc/tstep')).toEqual([]);
    });

    it('fills placeholders and blanks unknown ones', () => {
        expect(fillTemplate('{spc}_{fld}_f', { spc: 'i', fld: 'p' })).toBe('i_p_f');
        expect(fillTemplate('{sect}/{other}', { sect: 's0' })).toBe('s0/');
    });
});
