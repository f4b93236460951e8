export { Diagnostics, formatError } from './core/diagnostics.js';
export { Scanner, scan } from './core/scanner/scanner.js';
export { KEYWORDS, keywordKind } from './core/scanner/keywords.js';
export { lexeme, LITERAL_KINDS, BUILTIN_TYPE_KINDS } from './core/scanner/token.js';
export type { LiteralValue, SourceFile, Token, TokenKind } from './core/scanner/token.js';
export { Parser, parse } from './core/parser/parser.js';
export { MAX_NESTING_DEPTH } from './core/parser/cursor.js';
export { emptyProgram } from './core/parser/ast.js';
export type * from './core/parser/ast.js';
export type { ArrayType, FunctionPointerType, NamedType, TypeInfo } from './core/parser/type-info.js';
export { printExpr, printStmt, printType } from './core/parser/printer.js';
export { compileFile, compileSource, FileAccessError } from './core/compiler.js';
export type { CompilationUnit, CompileFileOptions } from './core/compiler.js';
export { PlaceholderGenerator, buildPlaceholderArtifact } from './core/codegen.js';
export type { Artifact, CodeGenerator, GenerateOptions, OutputKind } from './core/codegen.js';
export type { Diagnostic, DiagnosticCode, Severity } from './types/diagnostic.js';
