import { mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import { ProgramStmt } from './parser/ast.js';

export type OutputKind = 'executable' | 'library';

export interface GenerateOptions {
    outputPath: string;
    kind: OutputKind;
    /** Artifact name, usually the input file name without its extension. */
    name: string;
}

export interface CodeGenerator {
    generate(program: ProgramStmt, options: GenerateOptions): void;
}

export interface ArtifactMethod {
    name: string;
    returns: string;
    parameters: string[];
    instructions: string[];
}

export interface Artifact {
    format: 'seanet-artifact';
    version: 1;
    name: string;
    kind: OutputKind;
    type: string;
    methods: ArtifactMethod[];
}

export function buildPlaceholderArtifact(options: GenerateOptions): Artifact {
    const method: ArtifactMethod = options.kind === 'executable'
        ? { name: 'Main', returns: 'int', parameters: [], instructions: ['ldc.i4.0', 'ret'] }
        : { name: 'Add', returns: 'int', parameters: ['int', 'int'], instructions: ['ldarg.0', 'ldarg.1', 'add', 'ret'] };

    return {
        format: 'seanet-artifact',
        version: 1,
        name: options.name,
        kind: options.kind,
        type: `${options.name}.${options.name}`,
        methods: [method]
    };
}

/**
 * Stands in for the real back end: the program is accepted but not read, and
 * the artifact always holds the same fixed method.
 */
export class PlaceholderGenerator implements CodeGenerator {
    generate(_program: ProgramStmt, options: GenerateOptions): void {
        const artifact = buildPlaceholderArtifact(options);
        mkdirSync(path.dirname(path.resolve(options.outputPath)), { recursive: true });
        writeFileSync(options.outputPath, JSON.stringify(artifact, null, 2) + '\n', 'utf8');
    }
}
