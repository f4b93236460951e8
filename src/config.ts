import { existsSync, readFileSync } from 'fs';
import { LineCounter, parseDocument } from 'yaml';
import { stripBom } from './core/compiler.js';
import { ColorMode, isColorMode, isOutputFormat, OutputFormat } from './core/reporter.js';

export const CONFIG_FILE_NAME = 'seanet.yml';

export interface CompilerConfig {
    format: OutputFormat;
    color: ColorMode;
    library: boolean;
    /** Glob patterns checked in workspace mode. */
    include: string[];
    ignore: string[];
}

export const DEFAULT_CONFIG: CompilerConfig = {
    format: 'pretty',
    color: 'auto',
    library: false,
    include: ['**/*.sn'],
    ignore: []
};

export interface ConfigResult {
    config: CompilerConfig;
    warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown): string[] | undefined {
    if (typeof value === 'string') return [value];
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
    return undefined;
}

/** Problems with the file become warnings and the affected keys keep their defaults. */
export function parseConfig(text: string, filePath: string): ConfigResult {
    const lineCounter = new LineCounter();
    const doc = parseDocument(stripBom(text), { lineCounter });
    const config: CompilerConfig = { ...DEFAULT_CONFIG, include: [...DEFAULT_CONFIG.include], ignore: [] };
    const warnings: string[] = [];

    if (doc.errors.length > 0) {
        for (const error of doc.errors) {
            const { line, col } = lineCounter.linePos(error.pos[0]);
            warnings.push(`${filePath}:${line}:${col} ${error.message}`);
        }
        return { config, warnings };
    }

    const contents: unknown = doc.toJS();
    if (contents === null || contents === undefined) {
        return { config, warnings };
    }
    if (!isRecord(contents)) {
        warnings.push(`${filePath}: expected a mapping of options at the top level`);
        return { config, warnings };
    }

    if (contents.format !== undefined) {
        if (isOutputFormat(contents.format)) config.format = contents.format;
        else warnings.push(`${filePath}: "format" must be one of pretty, plain, json, compact`);
    }
    if (contents.color !== undefined) {
        if (isColorMode(contents.color)) config.color = contents.color;
        else warnings.push(`${filePath}: "color" must be one of auto, always, never`);
    }
    if (contents.library !== undefined) {
        if (typeof contents.library === 'boolean') config.library = contents.library;
        else warnings.push(`${filePath}: "library" must be true or false`);
    }
    for (const key of ['include', 'ignore'] as const) {
        if (contents[key] === undefined) continue;
        const patterns = toStringList(contents[key]);
        if (patterns) config[key] = patterns;
        else warnings.push(`${filePath}: "${key}" must be a string or a list of strings`);
    }

    return { config, warnings };
}

export function loadConfig(filePath: string): ConfigResult {
    if (!existsSync(filePath)) {
        return { config: { ...DEFAULT_CONFIG }, warnings: [] };
    }
    return parseConfig(readFileSync(filePath, 'utf8'), filePath);
}
