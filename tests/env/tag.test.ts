import { describe, it, expect } from 'vitest';
import { isSkipped, parseTag } from '../../src/env/tag';

describe('parseTag', () => {
    it('returns no directives for an empty tag', () => {
        expect(parseTag('')).toEqual({ required: false });
    });

    it('reads the explicit name', () => {
        expect(parseTag('AUTH')).toEqual({ explicitName: 'AUTH', required: false });
    });

    it('trims the explicit name', () => {
        expect(parseTag('  JWT_TTL  ,required')).toEqual({ explicitName: 'JWT_TTL', required: true });
    });

    it('treats a blank name as no override', () => {
        const directives = parseTag('   ,required');
        expect(directives.explicitName).toBeUndefined();
        expect(directives.required).toBe(true);
    });

    it('replaces \\s in defaults with a space', () => {
        expect(parseTag(',default=John\\sDoe')).toEqual({ defaultValue: 'John Doe', required: false });
    });

    it('reads required and default together', () => {
        expect(parseTag(',required default=John\\sDoe')).toEqual({
            defaultValue: 'John Doe',
            required: true,
        });
    });

    it('matches directive keys case-insensitively', () => {
        expect(parseTag(',REQUIRED Default=blue')).toEqual({ defaultValue: 'blue', required: true });
    });

    it('keeps everything after the first = in a default', () => {
        expect(parseTag(',default=a=b').defaultValue).toBe('a=b');
    });

    it('keeps commas after the first one in a default', () => {
        expect(parseTag(',default=a,b').defaultValue).toBe('a,b');
    });

    it('accepts an empty default', () => {
        expect(parseTag(',default=').defaultValue).toBe('');
    });

    it('uses the last default when repeated', () => {
        expect(parseTag(',default=one default=two').defaultValue).toBe('two');
    });

    it('ignores malformed and unknown tokens', () => {
        expect(parseTag(',requiredx foo bar=baz')).toEqual({ required: false });
    });

    it('only accepts required as a bare token', () => {
        expect(parseTag(',required=true').required).toBe(false);
    });

    it('ignores repeated spaces', () => {
        expect(parseTag(',required  default=x')).toEqual({ defaultValue: 'x', required: true });
    });
});

describe('isSkipped', () => {
    it('skips fields named -', () => {
        expect(isSkipped(parseTag('-'))).toBe(true);
        expect(isSkipped(parseTag(' - ,required'))).toBe(true);
    });

    it('does not skip other fields', () => {
        expect(isSkipped(parseTag(''))).toBe(false);
        expect(isSkipped(parseTag('AUTH'))).toBe(false);
        expect(isSkipped(parseTag(',default=-'))).toBe(false);
    });
});
