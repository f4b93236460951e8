import { readFileSync } from 'fs';
import path from 'path';
import { CodeGenerator, OutputKind, PlaceholderGenerator } from './codegen.js';
import { Diagnostics } from './diagnostics.js';
import { ProgramStmt } from './parser/ast.js';
import { Parser } from './parser/parser.js';
import { Scanner } from './scanner/scanner.js';
import { SourceFile, Token } from './scanner/token.js';

export interface CompilationUnit {
    source: SourceFile;
    tokens: Token[];
    program: ProgramStmt;
    diagnostics: Diagnostics;
    /** Set when an artifact was written. */
    outputPath?: string;
}

export interface CompileFileOptions {
    outputPath?: string;
    kind?: OutputKind;
    generator?: CodeGenerator;
}

/** A source file could not be read or an artifact could not be written. */
export class FileAccessError extends Error {
    constructor(
        public readonly operation: 'read' | 'write',
        public readonly filePath: string,
        cause: unknown
    ) {
        super(`Cannot ${operation} ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'FileAccessError';
    }
}

function readSource(inputPath: string): string {
    try {
        return stripBom(readFileSync(inputPath, 'utf8'));
    } catch (error) {
        throw new FileAccessError('read', inputPath, error);
    }
}

export function stripBom(s: string): string {
    return s.charCodeAt(0) === 0xFEFF ? s.slice(1) : s;
}

/** Scans and parses one source text with its own diagnostics. */
export function compileSource(file: string, text: string): CompilationUnit {
    const diagnostics = new Diagnostics();
    const source: SourceFile = { name: file, text };
    const tokens = new Scanner(diagnostics).scan(source);
    const program = new Parser(diagnostics).parse(file, tokens);
    return { source, tokens, program, diagnostics };
}

/**
 * Reads and compiles a file. The program reaches the code generator only when
 * an output path is given and nothing was reported. I/O failures surface as
 * {@link FileAccessError}.
 */
export function compileFile(inputPath: string, options: CompileFileOptions = {}): CompilationUnit {
    const unit = compileSource(inputPath, readSource(inputPath));

    if (!options.outputPath || unit.diagnostics.hasErrors()) {
        return unit;
    }

    const generator = options.generator ?? new PlaceholderGenerator();
    try {
        generator.generate(unit.program, {
            outputPath: options.outputPath,
            kind: options.kind ?? 'executable',
            name: path.basename(inputPath, path.extname(inputPath))
        });
    } catch (error) {
        throw new FileAccessError('write', options.outputPath, error);
    }
    return { ...unit, outputPath: options.outputPath };
}
