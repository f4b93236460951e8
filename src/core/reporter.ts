import { Diagnostic, FileStats, Severity } from '../types/diagnostic.js';
import ansis from 'ansis';

export type OutputFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'plain', 'json', 'compact'];
export const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export function isOutputFormat(value: unknown): value is OutputFormat {
    return OUTPUT_FORMATS.some(f => f === value);
}

export function isColorMode(value: unknown): value is ColorMode {
    return COLOR_MODES.some(c => c === value);
}

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
}

export interface FileReport {
    path: string;
    diagnostics: readonly Diagnostic[];
    /** The diagnostics as formatted by the collector, printed verbatim in plain mode. */
    messages: readonly string[];
}

export interface SummaryStats {
    files: FileStats;
}

export class Reporter {
    private options: ReporterOptions;
    private shouldColor: boolean;
    private startTime: number;

    constructor(options: ReporterOptions) {
        this.options = options;
        this.shouldColor = this.shouldUseColor();
        this.startTime = Date.now();
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'plain') return false;

        const hasNoColor = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = process.stdout.isTTY === true;

        return !hasNoColor && (hasForceColor || isTTY);
    }

    private getElapsedTime(): string {
        const elapsed = Date.now() - this.startTime;
        return (elapsed / 1000).toFixed(2);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    private getSeverityIcon(severity: Severity): string {
        return severity === 'error' ? '✖' : '⚠';
    }

    private getSeverityColor(severity: Severity): (text: string) => string {
        return severity === 'error' ? ansis.red : ansis.yellow;
    }

    private formatLocation(diagnostic: Diagnostic): string {
        const { file, range } = diagnostic;
        return range ? `${file}:${range.start.line}:${range.start.col}` : file;
    }

    formatDiagnostic(diagnostic: Diagnostic): string {
        if (this.options.format === 'json') {
            return JSON.stringify(diagnostic);
        }

        const { code, message, severity } = diagnostic;
        if (this.options.format === 'compact') {
            const severityChar = severity === 'error' ? 'E' : 'W';
            return `${this.formatLocation(diagnostic)} [${code}] ${severityChar}: ${message}`;
        }

        const color = this.getSeverityColor(severity);
        const coloredIcon = this.colorize(this.getSeverityIcon(severity), color);
        const coloredSeverity = this.colorize(severity.toUpperCase(), color);
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        const coloredLocation = this.colorize(this.formatLocation(diagnostic), ansis.bold);

        return `  ${coloredIcon} ${coloredSeverity}  ${coloredCode}  ${coloredLocation}  ${message}`;
    }

    printBanner(version: string, fileCount: number): void {
        if (this.options.format !== 'pretty') {
            return;
        }

        const date = new Date().toLocaleString('en-US', {
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit'
        });

        const header = this.colorize(`┌ snc ${version}  •  Compiling ${fileCount} file${fileCount === 1 ? '' : 's'}  •  ${date}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        console.log(header);
        console.log(divider);
        console.log();
    }

    printFileHeader(report: FileReport): void {
        if (this.options.format !== 'pretty') {
            return;
        }

        console.log(this.colorize(`File: ${report.path}`, ansis.bold));
    }

    printDiagnostics(report: FileReport): void {
        if (this.options.format === 'plain') {
            report.messages.forEach(m => console.error(m));
            return;
        }

        if (this.options.format !== 'pretty') {
            report.diagnostics.forEach(d => console.log(this.formatDiagnostic(d)));
            return;
        }

        if (report.diagnostics.length === 0) {
            const successIcon = this.colorize('✓', ansis.green);
            const successMsg = this.colorize('No issues found', ansis.green);
            console.log(`  ${successIcon} ${successMsg}`);
            return;
        }

        report.diagnostics.forEach(d => console.log(this.formatDiagnostic(d)));
    }

    printSummary(stats: SummaryStats, totalErrors: number): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                summary: stats,
                totals: { errors: totalErrors },
                timing: { elapsedSeconds: this.getElapsedTime() }
            }, null, 2));
            return;
        }

        if (this.options.format === 'plain') {
            return;
        }

        if (this.options.format === 'compact') {
            console.log(`Summary: ${totalErrors} errors (${this.getElapsedTime()}s)`);
            return;
        }

        const divider = this.colorize('────────────────────────────────────────────────────────', ansis.dim);
        console.log();
        console.log(divider);
        console.log(this.colorize('Summary', ansis.bold));
        console.log();

        console.log(this.colorize('Files:', ansis.cyan) + ` ${stats.files.total}`);
        const passedStr = this.colorize(`Passed: ${stats.files.passed}`, ansis.green);
        const failedStr = this.colorize(`Failed: ${stats.files.failed}`, stats.files.failed > 0 ? ansis.red : ansis.dim);
        console.log(`  ${passedStr}  ${failedStr}`);
        console.log();

        console.log(this.colorize(`Checked ${stats.files.total} files in ${this.getElapsedTime()}s`, ansis.dim));

        const exitCode = totalErrors > 0 ? 1 : 0;
        console.log(this.colorize(`Exit code: ${exitCode}`, exitCode === 0 ? ansis.green : ansis.red));
    }

    printSuccess(): void {
        if (this.options.format !== 'pretty') {
            return;
        }

        console.log();
        const successIcon = this.colorize('✓', ansis.green);
        const successMsg = this.colorize('All files compiled!', ansis.green.bold);
        console.log(`${successIcon} ${successMsg}`);
    }

    printError(message: string): void {
        if (this.options.format === 'json') {
            console.error(JSON.stringify({ error: message }));
            return;
        }

        console.error(this.colorize(`Error: ${message}`, ansis.red));
    }

    printWarning(message: string): void {
        if (this.options.format === 'json') {
            console.warn(JSON.stringify({ warning: message }));
            return;
        }

        console.warn(this.colorize(`Warning: ${message}`, ansis.yellow));
    }

    printInfo(message: string): void {
        if (this.options.format === 'json') return;

        console.log(this.colorize(message, ansis.dim));
    }
}
