import { afterEach, describe, expect, it, vi } from 'vitest';
import { FileReport, Reporter } from '../src/core/reporter.js';
import { Diagnostic } from '../src/types/diagnostic.js';

const diagnostic: Diagnostic = {
    code: 'SYNTAX_ERROR',
    message: 'Expected expression.',
    severity: 'error',
    file: 'main.sn',
    range: { start: { line: 2, col: 5 }, end: { line: 2, col: 5 } }
};

const report: FileReport = {
    path: 'main.sn',
    diagnostics: [diagnostic],
    messages: ['Parse error at main.sn:2,5 - Expected expression.']
};

describe('Reporter', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('formatDiagnostic', () => {
        it('formats compact lines', () => {
            const reporter = new Reporter({ format: 'compact', color: 'never' });
            expect(reporter.formatDiagnostic(diagnostic)).toBe('main.sn:2:5 [SYNTAX_ERROR] E: Expected expression.');
        });

        it('formats pretty lines without color', () => {
            const reporter = new Reporter({ format: 'pretty', color: 'never' });
            expect(reporter.formatDiagnostic(diagnostic)).toBe(
                '  ✖ ERROR  [SYNTAX_ERROR]  main.sn:2:5  Expected expression.'
            );
        });

        it('serializes diagnostics as JSON', () => {
            const reporter = new Reporter({ format: 'json', color: 'never' });
            expect(JSON.parse(reporter.formatDiagnostic(diagnostic))).toEqual(diagnostic);
        });

        it('falls back to the file name without a range', () => {
            const reporter = new Reporter({ format: 'compact', color: 'never' });
            expect(reporter.formatDiagnostic({ ...diagnostic, range: undefined })).toBe(
                'main.sn [SYNTAX_ERROR] E: Expected expression.'
            );
        });
    });

    describe('printDiagnostics', () => {
        it('writes the collected messages to stderr in plain mode', () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});

            new Reporter({ format: 'plain', color: 'never' }).printDiagnostics(report);

            expect(error).toHaveBeenCalledTimes(1);
            expect(error).toHaveBeenCalledWith('Parse error at main.sn:2,5 - Expected expression.');
            expect(log).not.toHaveBeenCalled();
        });

        it('prints one line per diagnostic in compact mode', () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});

            new Reporter({ format: 'compact', color: 'never' }).printDiagnostics(report);

            expect(log.mock.calls).toEqual([['main.sn:2:5 [SYNTAX_ERROR] E: Expected expression.']]);
        });

        it('says so when a file has no issues', () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});

            new Reporter({ format: 'pretty', color: 'never' }).printDiagnostics({ path: 'ok.sn', diagnostics: [], messages: [] });

            expect(log).toHaveBeenCalledWith('  ✓ No issues found');
        });
    });

    describe('messages', () => {
        it('prefixes errors and warnings', () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
            const reporter = new Reporter({ format: 'pretty', color: 'never' });

            reporter.printError('boom');
            reporter.printWarning('careful');

            expect(error).toHaveBeenCalledWith('Error: boom');
            expect(warn).toHaveBeenCalledWith('Warning: careful');
        });

        it('wraps errors and warnings in JSON objects', () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
            const reporter = new Reporter({ format: 'json', color: 'never' });

            reporter.printError('boom');
            reporter.printWarning('careful');

            expect(error).toHaveBeenCalledWith('{"error":"boom"}');
            expect(warn).toHaveBeenCalledWith('{"warning":"careful"}');
        });

        it('prints nothing but diagnostics in plain mode', () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});
            const reporter = new Reporter({ format: 'plain', color: 'never' });

            reporter.printBanner('1.0.0', 2);
            reporter.printFileHeader(report);
            reporter.printSummary({ files: { total: 1, passed: 0, failed: 1 } }, 1);
            reporter.printSuccess();

            expect(log).not.toHaveBeenCalled();
        });

        it('counts checked files in the pretty summary', () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});

            new Reporter({ format: 'pretty', color: 'never' }).printSummary({ files: { total: 2, passed: 0, failed: 2 } }, 2);

            const lines = log.mock.calls.map(call => String(call[0] ?? ''));
            expect(lines).toContain('  Passed: 0  Failed: 2');
            expect(lines.filter(line => /^Checked 2 files in \d+\.\d{2}s$/.test(line))).toHaveLength(1);
            expect(lines).toContain('Exit code: 1');
        });

        it('prints a one-line summary in compact mode', () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});

            new Reporter({ format: 'compact', color: 'never' }).printSummary({ files: { total: 2, passed: 1, failed: 1 } }, 3);

            expect(log).toHaveBeenCalledTimes(1);
            expect(log.mock.calls[0][0]).toMatch(/^Summary: 3 errors \(\d+\.\d{2}s\)$/);
        });
    });
});
