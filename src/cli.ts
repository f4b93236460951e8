import { Command, Option } from 'commander';
import { existsSync, readFileSync, statSync } from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { CONFIG_FILE_NAME, loadConfig } from './config.js';
import { CompilationUnit, compileFile, CompileFileOptions, FileAccessError } from './core/compiler.js';
import { printStmt } from './core/parser/printer.js';
import {
    COLOR_MODES,
    FileReport,
    isColorMode,
    isOutputFormat,
    OUTPUT_FORMATS,
    Reporter
} from './core/reporter.js';
import { lexeme } from './core/scanner/token.js';

export interface CliOptions {
    inputFile: string;
    outputFile?: string;
    library?: boolean;
    format?: string;
    color?: string;
    config?: string;
    emit?: string;
    workspace?: boolean;
}

function readVersion(): string {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
    }
    return '0.0.0';
}

function toReport(unit: CompilationUnit): FileReport {
    return {
        path: unit.source.name,
        diagnostics: unit.diagnostics.diagnostics,
        messages: unit.diagnostics.errors
    };
}

function emit(unit: CompilationUnit, what: string): void {
    if (what === 'tokens') {
        for (const token of unit.tokens) {
            console.log(`${token.line}:${token.column} ${token.kind} ${JSON.stringify(lexeme(token))}`);
        }
        return;
    }

    for (const declaration of unit.program.declarations) {
        console.log(printStmt(declaration));
    }
}

function compileOrReport(reporter: Reporter, inputPath: string, options?: CompileFileOptions): CompilationUnit | undefined {
    try {
        return compileFile(inputPath, options);
    } catch (error) {
        if (!(error instanceof FileAccessError)) throw error;
        reporter.printError(error.message);
        return undefined;
    }
}

async function findWorkspaceFiles(root: string, include: string[], ignore: string[]): Promise<string[]> {
    const matches = await fg(include, { cwd: root, absolute: true, ignore: ['**/node_modules/**', ...ignore] });
    return matches.sort();
}

/** Runs one invocation of the compiler and returns its exit code. */
export async function runCompiler(options: CliOptions, version = '0.0.0'): Promise<number> {
    const configPath = options.config ?? path.join(process.cwd(), CONFIG_FILE_NAME);
    const { config, warnings } = loadConfig(configPath);

    const format = options.format ?? config.format;
    const color = options.color ?? config.color;
    const reporter = new Reporter({
        format: isOutputFormat(format) ? format : 'pretty',
        color: isColorMode(color) ? color : 'auto'
    });

    for (const warning of warnings) {
        reporter.printWarning(`Failed to read config: ${warning}`);
    }
    if (options.config && !existsSync(options.config)) {
        reporter.printWarning(`Config file not found: ${options.config}`);
    }

    const inputPath = options.inputFile;
    if (!existsSync(inputPath)) {
        reporter.printError(`Input not found: ${inputPath}`);
        return 1;
    }

    let units: CompilationUnit[];
    let unreadable = 0;
    if (options.workspace) {
        if (!statSync(inputPath).isDirectory()) {
            reporter.printError(`--workspace expects a directory, got ${inputPath}`);
            return 1;
        }
        reporter.printInfo(`Scanning workspace for sources: ${inputPath}`);
        const files = await findWorkspaceFiles(inputPath, config.include, config.ignore);
        reporter.printInfo(`Found ${files.length} source files.`);
        units = [];
        for (const file of files) {
            const unit = compileOrReport(reporter, file);
            if (unit) units.push(unit);
            else unreadable++;
        }
    } else if (options.emit) {
        const unit = compileOrReport(reporter, inputPath);
        if (!unit) return 1;
        emit(unit, options.emit);
        units = [unit];
    } else {
        if (!options.outputFile) {
            reporter.printError('An output file is required (-o, --output-file).');
            return 1;
        }
        const library = options.library ?? config.library;
        const unit = compileOrReport(reporter, inputPath, { outputPath: options.outputFile, kind: library ? 'library' : 'executable' });
        if (!unit) return 1;
        units = [unit];
    }

    reporter.printBanner(version, units.length + unreadable);

    let totalErrors = 0;
    let failed = 0;
    for (const unit of units) {
        const report = toReport(unit);
        totalErrors += report.diagnostics.length;
        if (report.diagnostics.length > 0) failed++;

        reporter.printFileHeader(report);
        reporter.printDiagnostics(report);
    }

    failed += unreadable;
    const total = units.length + unreadable;
    reporter.printSummary({ files: { total, passed: total - failed, failed } }, totalErrors);

    if (totalErrors > 0 || unreadable > 0) return 1;
    reporter.printSuccess();
    return 0;
}

export function createProgram(): Command {
    const version = readVersion();
    const program = new Command();

    program
        .name('snc')
        .description('The Seanet compiler.')
        .version(version, '-v, --version')
        .requiredOption('-i, --input-file <path>', 'The file to compile (a directory with --workspace).')
        .option('-o, --output-file <path>', 'Path to the output file.')
        .option('-l, --library', 'Compile as a library. By default, an executable is created.')
        .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS))
        .addOption(new Option('--color <mode>', 'Color output').choices(COLOR_MODES))
        .option('--config <path>', `Path to a config file (defaults to ${CONFIG_FILE_NAME} in the working directory)`)
        .addOption(new Option('--emit <what>', 'Print the tokens or the syntax tree instead of generating code').choices(['tokens', 'ast']))
        .option('--workspace', 'Check every source file below the input directory without generating code', false)
        .action(async (options: CliOptions) => {
            process.exitCode = await runCompiler(options, version);
        });

    return program;
}
