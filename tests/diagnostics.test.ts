import { describe, expect, it } from 'vitest';
import { Diagnostics, formatError } from '../src/core/diagnostics.js';

describe('Diagnostics', () => {
    it('starts empty', () => {
        const diagnostics = new Diagnostics();
        expect(diagnostics.hasErrors()).toBe(false);
        expect(diagnostics.errors).toEqual([]);
        expect(diagnostics.diagnostics).toEqual([]);
    });

    it('formats messages with file, line and column', () => {
        expect(formatError('main.sn', 4, 12, 'Expected expression.')).toBe(
            'Parse error at main.sn:4,12 - Expected expression.'
        );
    });

    it('keeps reports in order with their codes', () => {
        const diagnostics = new Diagnostics();
        diagnostics.report('a.sn', 1, 2, 'Unexpected character "@".', 'UNEXPECTED_CHARACTER');
        diagnostics.report('a.sn', 3, 1, 'Expected ";" after expression.');

        expect(diagnostics.hasErrors()).toBe(true);
        expect(diagnostics.errors).toEqual([
            'Parse error at a.sn:1,2 - Unexpected character "@".',
            'Parse error at a.sn:3,1 - Expected ";" after expression.'
        ]);
        expect(diagnostics.diagnostics[0]).toEqual({
            code: 'UNEXPECTED_CHARACTER',
            message: 'Unexpected character "@".',
            severity: 'error',
            file: 'a.sn',
            range: { start: { line: 1, col: 2 }, end: { line: 1, col: 2 } }
        });
        expect(diagnostics.diagnostics[1].code).toBe('SYNTAX_ERROR');
    });

    it('hands out copies that do not affect the collected entries', () => {
        const diagnostics = new Diagnostics();
        diagnostics.report('a.sn', 1, 1, 'first');
        diagnostics.report('a.sn', 2, 1, 'second');

        const errors = diagnostics.errors;
        const entries = diagnostics.diagnostics;
        Array.prototype.reverse.call(errors);
        Array.prototype.pop.call(entries);

        expect(diagnostics.errors).toEqual([
            'Parse error at a.sn:1,1 - first',
            'Parse error at a.sn:2,1 - second'
        ]);
        expect(diagnostics.diagnostics.map(d => d.message)).toEqual(['first', 'second']);
    });
});
