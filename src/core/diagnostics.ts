import { Diagnostic, DiagnosticCode } from '../types/diagnostic.js';

/**
 * Collects the errors reported while scanning and parsing one compilation unit.
 * Entries keep the order they were reported in.
 */
export class Diagnostics {
    private entries: Diagnostic[] = [];
    private formatted: string[] = [];

    report(file: string, line: number, column: number, message: string, code: DiagnosticCode = 'SYNTAX_ERROR'): void {
        this.entries.push({
            code,
            message,
            severity: 'error',
            file,
            range: {
                start: { line, col: column },
                end: { line, col: column }
            }
        });
        this.formatted.push(formatError(file, line, column, message));
    }

    hasErrors(): boolean {
        return this.entries.length > 0;
    }

    /** Formatted messages, one per reported error. Each read returns a copy. */
    get errors(): readonly string[] {
        return [...this.formatted];
    }

    get diagnostics(): readonly Diagnostic[] {
        return [...this.entries];
    }
}

export function formatError(file: string, line: number, column: number, message: string): string {
    return `Parse error at ${file}:${line},${column} - ${message}`;
}
