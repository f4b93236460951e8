import { describe, expect, it } from 'vitest';
import { compileSource } from '../src/core/compiler.js';
import { MAX_NESTING_DEPTH } from '../src/core/parser/cursor.js';
import { FunctionDeclaration, Stmt } from '../src/core/parser/ast.js';
import { printStmt } from '../src/core/parser/printer.js';
import { FILE } from './helpers.js';

function print(text: string): string {
    const { program, diagnostics } = compileSource(FILE, text);
    expect(diagnostics.errors).toEqual([]);
    return printStmt(program);
}

function firstFunction(text: string): FunctionDeclaration {
    const { program, diagnostics } = compileSource(FILE, text);
    expect(diagnostics.errors).toEqual([]);
    const declaration = program.declarations[0];
    if (declaration?.kind !== 'FunctionDeclaration') throw new Error('Expected a function declaration');
    return declaration;
}

function bodyOf(text: string): readonly Stmt[] {
    return firstFunction(`void f() { ${text} }`).body.statements;
}

describe('Parser statements', () => {
    describe('Declarations', () => {
        it('parses structs and functions at the top level', () => {
            const source = [
                'struct Point { int x; int y; }',
                'int add(int a, int b) { return a + b; }'
            ].join('\n');
            expect(print(source)).toBe(
                '(program (struct Point ((int x) (int y))) (function int add ((int a) (int b)) (block (return (+ a b)))))'
            );
        });

        it('accepts an empty program', () => {
            expect(print('')).toBe('(program)');
        });

        it('accepts struct and array return types', () => {
            expect(print('Point origin() { return new Point(); }')).toBe(
                '(program (function Point origin () (block (return (new Point)))))'
            );
            expect(print('int[] empty() { return new int[0]; }')).toBe(
                '(program (function (array int) empty () (block (return (new (array int) 0)))))'
            );
        });

        it('parses ref and function-pointer parameters', () => {
            expect(print('void apply(ref int x, fun<int, int> f) { x = f(x); }')).toBe(
                '(program (function void apply (((ref int) x) ((fun (int) int) f)) (block (expr (= x (call f x))))))'
            );
        });

        it('tells type names from identifiers inside blocks', () => {
            const statements = bodyOf('var n = 1; int[] xs = new int[n]; Point p; Point[] ps; ref int r; fun<int> g; p = q;');
            expect(statements.map(printStmt)).toEqual([
                '(declare var n 1)',
                '(declare (array int) xs (new (array int) n))',
                '(declare Point p)',
                '(declare (array Point) ps)',
                '(declare (ref int) r)',
                '(declare (fun () int) g)',
                '(expr (= p q))'
            ]);
        });

        it('keeps the var keyword as a named type', () => {
            const [declaration] = bodyOf('var total = 0;');
            expect(declaration).toMatchObject({
                kind: 'VariableDeclarationWithAssignment',
                type: { kind: 'Named', name: { kind: 'Var' }, isRef: false }
            });
        });

        it('separates declarations with and without initializers', () => {
            const [plain, assigned] = bodyOf('int a; int b = 2;');
            expect(plain.kind).toBe('VariableDeclaration');
            expect(assigned.kind).toBe('VariableDeclarationWithAssignment');
        });
    });

    describe('Control flow', () => {
        it('nests else-if chains as If nodes in the else branch', () => {
            const [statement] = bodyOf('if (a) { x(); } else if (b) { y(); } else { z(); }');
            expect(statement.kind).toBe('If');
            if (statement.kind !== 'If') return;
            expect(statement.elseBranch?.kind).toBe('If');
            if (statement.elseBranch?.kind !== 'If') return;
            expect(statement.elseBranch.elseBranch?.kind).toBe('Block');
            expect(printStmt(statement)).toBe(
                '(if a (block (expr (call x))) (if b (block (expr (call y))) (block (expr (call z)))))'
            );
        });

        it('leaves the else branch empty without else', () => {
            const [statement] = bodyOf('if (a == 1) { }');
            expect(statement).toEqual(expect.objectContaining({ kind: 'If' }));
            expect(printStmt(statement)).toBe('(if (== a 1) (block))');
            expect(statement.kind === 'If' && statement.elseBranch).toBeUndefined();
        });

        it('parses while loops and both return forms', () => {
            expect(bodyOf('while (i < 10) { i++; } return;').map(printStmt)).toEqual([
                '(while (< i 10) (block (expr (postfix++ i))))',
                '(return)'
            ]);
            expect(bodyOf('return 1;').map(printStmt)).toEqual(['(return 1)']);
        });

        it('parses nested blocks', () => {
            expect(bodyOf('{ { x(); } }').map(printStmt)).toEqual(['(block (block (expr (call x))))']);
        });

        it('ignores comments between statements', () => {
            expect(print('void f() { // hi\n return; /* x */ }')).toBe('(program (function void f () (block (return))))');
        });
    });

    describe('For loop desugaring', () => {
        it('wraps the initializer and a while loop in a block', () => {
            const [statement] = bodyOf('for (int i = 0; i < 3; i++) { g(i); }');
            expect(statement.kind).toBe('Block');
            if (statement.kind !== 'Block') return;
            const block = statement;
            expect(block.statements.map(s => s.kind)).toEqual(['VariableDeclarationWithAssignment', 'While']);
            expect(printStmt(block)).toBe(
                '(block (declare int i 0) (while (< i 3) (block (expr (call g i)) (expr (postfix++ i)))))'
            );
        });

        it('synthesizes a true condition where the condition is missing', () => {
            const { program } = compileSource(FILE, 'void f() { for (;;) { } }');
            expect(printStmt(program)).toBe('(program (function void f () (block (block (while true (block))))))');

            const loop = program.declarations[0];
            if (loop.kind !== 'FunctionDeclaration') throw new Error('Expected a function declaration');
            const outer = loop.body.statements[0];
            if (outer.kind !== 'Block') throw new Error('Expected a block');
            const whileStmt = outer.statements[0];
            if (whileStmt.kind !== 'While') throw new Error('Expected a while loop');
            expect(whileStmt.condition).toMatchObject({
                kind: 'Literal',
                value: { kind: 'True', value: true, start: 17, length: 0, line: 1, column: 18 }
            });
        });

        it('accepts var initializers and a missing increment', () => {
            expect(bodyOf('for (var i = 0; i < 2;) { }').map(printStmt)).toEqual([
                '(block (declare var i 0) (while (< i 2) (block)))'
            ]);
        });

        it('accepts an expression initializer', () => {
            expect(bodyOf('for (i = 0; i < 2; i += 1) { }').map(printStmt)).toEqual([
                '(block (expr (= i 0)) (while (< i 2) (block (expr (+= i 1)))))'
            ]);
        });
    });

    describe('Errors', () => {
        it('returns an empty program when a closing brace is missing', () => {
            const { program, diagnostics } = compileSource(FILE, 'void main() {\n  int x = 1;\n');
            expect(program.declarations).toEqual([]);
            expect(diagnostics.errors).toEqual([
                'Parse error at test.sn:3,1 - Expected "}" after block. Reached end of file.'
            ]);
        });

        it('rejects statements at the top level', () => {
            expect(compileSource(FILE, 'x = 1;').diagnostics.errors).toEqual([
                'Parse error at test.sn:1,3 - Expected function name. Found "=".'
            ]);
            expect(compileSource(FILE, '42;').diagnostics.errors).toEqual([
                'Parse error at test.sn:1,1 - Expected a struct or function declaration. Found "42".'
            ]);
        });

        it('requires an initializer for var', () => {
            expect(compileSource(FILE, 'void f() { var x; }').diagnostics.errors).toEqual([
                'Parse error at test.sn:1,17 - Expected "=" after variable name. A "var" declaration needs an initializer. Found ";".'
            ]);
        });

        it('rejects ref on a function-pointer declaration', () => {
            expect(compileSource(FILE, 'void f() { ref fun<int> g; }').diagnostics.errors).toEqual([
                'Parse error at test.sn:1,12 - ref cannot apply to a function-pointer type.'
            ]);
        });

        it('rejects initializers on struct fields', () => {
            expect(compileSource(FILE, 'struct P { int x = 1; }').diagnostics.errors).toEqual([
                'Parse error at test.sn:1,18 - Expected ";" after field declaration. Found "=".'
            ]);
        });

        it('requires a block after if', () => {
            expect(compileSource(FILE, 'void f() { if (a) return; }').diagnostics.errors).toEqual([
                'Parse error at test.sn:1,19 - Expected "{" before block. Found "return".'
            ]);
        });

        it('reports only the first syntax error', () => {
            const { program, diagnostics } = compileSource(FILE, 'void f() { int = ; x y z }\nstruct {');
            expect(program.declarations).toEqual([]);
            expect(diagnostics.errors).toEqual([
                'Parse error at test.sn:1,16 - Expected variable name. Found "=".'
            ]);
        });

        it('stops at deeply nested parentheses with one error', () => {
            const depth = 500;
            const text = `int f() { return ${'('.repeat(depth)}1${')'.repeat(depth)}; }`;
            const { program, diagnostics } = compileSource(FILE, text);
            expect(program.declarations).toEqual([]);
            // The body block and the return value take the first two levels.
            expect(diagnostics.errors).toEqual([
                `Parse error at test.sn:1,${17 + MAX_NESTING_DEPTH} - Code nests too deeply. Found "(".`
            ]);
        });

        it('stops at deeply nested blocks with one error', () => {
            const text = `void f() ${'{'.repeat(300)}${'}'.repeat(300)}`;
            const { program, diagnostics } = compileSource(FILE, text);
            expect(program.declarations).toEqual([]);
            expect(diagnostics.errors).toEqual([
                `Parse error at test.sn:1,${10 + MAX_NESTING_DEPTH} - Code nests too deeply. Found "{".`
            ]);
        });

        it('stops at long else-if chains with one error', () => {
            // Each else-if is one level deeper; the limit is reached at a condition.
            const text = `void f() { if (a) { }${' else if (a) { }'.repeat(1000)} }`;
            const { program, diagnostics } = compileSource(FILE, text);
            expect(program.declarations).toEqual([]);
            expect(diagnostics.errors).toHaveLength(1);
            expect(diagnostics.errors[0]).toMatch(/ - Code nests too deeply\. Found "a"\.$/);
        });

        it('accepts nesting below the limit', () => {
            const depth = 100;
            const text = `int f() { return ${'('.repeat(depth)}1${')'.repeat(depth)}; }`;
            expect(compileSource(FILE, text).diagnostics.errors).toEqual([]);
        });

        it('reports lexical errors independently of the parse', () => {
            const { program, diagnostics } = compileSource(FILE, 'void f() { @ }');
            expect(program.declarations).toHaveLength(1);
            expect(diagnostics.errors).toEqual(['Parse error at test.sn:1,12 - Unexpected character "@".']);
        });
    });
});
