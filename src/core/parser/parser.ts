import { Diagnostics } from '../diagnostics.js';
import { Token } from '../scanner/token.js';
import {
    BlockStmt,
    emptyProgram,
    Expr,
    FunctionDeclaration,
    IfStmt,
    ProgramStmt,
    Stmt,
    StructDeclaration,
    VariableDeclaration
} from './ast.js';
import { ABORT, Parsed } from './cursor.js';
import { ExpressionParser } from './expressions.js';
import { namedType, TypeInfo } from './type-info.js';

/**
 * Recursive-descent parser for Seanet. Parsing stops at the first syntax
 * error: it is reported once and the caller gets an empty program.
 */
export class Parser extends ExpressionParser {
    public parse(file: string, tokens: readonly Token[]): ProgramStmt {
        this.reset(file, tokens);
        const program = this.program();
        return program === ABORT ? emptyProgram() : program;
    }

    /** Parses a single expression that must span the whole token stream. */
    public parseExpression(file: string, tokens: readonly Token[]): Expr | undefined {
        this.reset(file, tokens);
        return this.whole(this.expression());
    }

    /** Parses a single type that must span the whole token stream. */
    public parseType(file: string, tokens: readonly Token[]): TypeInfo | undefined {
        this.reset(file, tokens);
        return this.whole(this.typeInfo(true));
    }

    private whole<T>(result: Parsed<T>): T | undefined {
        if (result === ABORT) return undefined;
        if (!this.isAtEnd()) {
            this.errorAtCurrent('Unexpected tokens after the end of input.');
            return undefined;
        }
        return result;
    }

    // Declarations

    private program(): Parsed<ProgramStmt> {
        const declarations: (FunctionDeclaration | StructDeclaration)[] = [];

        while (this.check('Struct') || this.isReturnTypeStart()) {
            const declaration = this.check('Struct') ? this.structDeclaration() : this.functionDeclaration();
            if (declaration === ABORT) return ABORT;
            declarations.push(declaration);
        }

        if (!this.isAtEnd()) {
            return this.errorAtCurrent('Expected a struct or function declaration.');
        }
        return { kind: 'Program', declarations };
    }

    private isReturnTypeStart(): boolean {
        return this.check('Void', 'Ref', 'Fun', 'Identifier') || this.isBuiltinType(this.peek().kind);
    }

    private structDeclaration(): Parsed<StructDeclaration> {
        this.advance();
        const name = this.consume('Identifier', 'Expected struct name.');
        if (name === ABORT) return ABORT;
        if (this.consume('LeftBrace', 'Expected "{" after struct name.') === ABORT) return ABORT;

        const fields: VariableDeclaration[] = [];
        while (!this.check('RightBrace') && !this.isAtEnd()) {
            const type = this.typeInfo();
            if (type === ABORT) return ABORT;
            const field = this.consume('Identifier', 'Expected field name.');
            if (field === ABORT) return ABORT;
            if (this.consume('Semicolon', 'Expected ";" after field declaration.') === ABORT) return ABORT;
            fields.push({ kind: 'VariableDeclaration', type, name: field });
        }

        if (this.consume('RightBrace', 'Expected "}" after struct fields.') === ABORT) return ABORT;
        return { kind: 'StructDeclaration', name, fields };
    }

    private functionDeclaration(): Parsed<FunctionDeclaration> {
        const returnType = this.typeInfo(true);
        if (returnType === ABORT) return ABORT;
        const name = this.consume('Identifier', 'Expected function name.');
        if (name === ABORT) return ABORT;
        if (this.consume('LeftParen', 'Expected "(" after function name.') === ABORT) return ABORT;

        const parameters: VariableDeclaration[] = [];
        if (!this.check('RightParen')) {
            do {
                const type = this.typeInfo();
                if (type === ABORT) return ABORT;
                const parameter = this.consume('Identifier', 'Expected parameter name.');
                if (parameter === ABORT) return ABORT;
                parameters.push({ kind: 'VariableDeclaration', type, name: parameter });
            } while (this.match('Comma'));
        }

        if (this.consume('RightParen', 'Expected ")" after parameters.') === ABORT) return ABORT;
        const body = this.block();
        if (body === ABORT) return ABORT;
        return { kind: 'FunctionDeclaration', returnType, name, parameters, body };
    }

    // Statements

    private statement(): Parsed<Stmt> {
        if (this.check('Var')) return this.varDeclaration();
        if (this.isDeclarationStart()) return this.declaration();

        switch (this.peek().kind) {
            case 'LeftBrace':
                return this.block();
            case 'If':
                return this.ifStatement();
            case 'While':
                return this.whileStatement();
            case 'For':
                return this.forStatement();
            case 'Return':
                return this.returnStatement();
            default:
                return this.expressionStatement();
        }
    }

    /**
     * A builtin type, `ref` or `fun` always starts a declaration. An identifier
     * does when another identifier or an empty `[]` follows it.
     */
    private isDeclarationStart(): boolean {
        if (this.isBuiltinType(this.peek().kind) || this.check('Ref', 'Fun')) return true;
        if (!this.check('Identifier')) return false;
        return this.checkAt(1, 'Identifier') || (this.checkAt(1, 'LeftBracket') && this.checkAt(2, 'RightBracket'));
    }

    private varDeclaration(): Parsed<Stmt> {
        const keyword = this.advance();
        const name = this.consume('Identifier', 'Expected variable name after "var".');
        if (name === ABORT) return ABORT;
        if (this.consume('Equal', 'Expected "=" after variable name. A "var" declaration needs an initializer.') === ABORT) return ABORT;

        const initializer = this.expression();
        if (initializer === ABORT) return ABORT;
        if (this.consume('Semicolon', 'Expected ";" after variable declaration.') === ABORT) return ABORT;
        return { kind: 'VariableDeclarationWithAssignment', type: namedType(keyword), name, initializer };
    }

    private declaration(): Parsed<Stmt> {
        const type = this.typeInfo();
        if (type === ABORT) return ABORT;
        const name = this.consume('Identifier', 'Expected variable name.');
        if (name === ABORT) return ABORT;

        if (!this.match('Equal')) {
            if (this.consume('Semicolon', 'Expected ";" after variable declaration.') === ABORT) return ABORT;
            return { kind: 'VariableDeclaration', type, name };
        }

        const initializer = this.expression();
        if (initializer === ABORT) return ABORT;
        if (this.consume('Semicolon', 'Expected ";" after variable declaration.') === ABORT) return ABORT;
        return { kind: 'VariableDeclarationWithAssignment', type, name, initializer };
    }

    private block(): Parsed<BlockStmt> {
        return this.nested(() => this.blockBody());
    }

    private blockBody(): Parsed<BlockStmt> {
        if (this.consume('LeftBrace', 'Expected "{" before block.') === ABORT) return ABORT;

        const statements: Stmt[] = [];
        while (!this.check('RightBrace') && !this.isAtEnd()) {
            const statement = this.statement();
            if (statement === ABORT) return ABORT;
            statements.push(statement);
        }

        if (this.consume('RightBrace', 'Expected "}" after block.') === ABORT) return ABORT;
        return { kind: 'Block', statements };
    }

    private ifStatement(): Parsed<IfStmt> {
        this.advance();
        const condition = this.parenthesizedCondition('if');
        if (condition === ABORT) return ABORT;
        const thenBranch = this.block();
        if (thenBranch === ABORT) return ABORT;

        if (!this.match('Else')) {
            return { kind: 'If', condition, thenBranch };
        }

        const elseBranch = this.check('If') ? this.nested(() => this.ifStatement()) : this.block();
        if (elseBranch === ABORT) return ABORT;
        return { kind: 'If', condition, thenBranch, elseBranch };
    }

    private whileStatement(): Parsed<Stmt> {
        this.advance();
        const condition = this.parenthesizedCondition('while');
        if (condition === ABORT) return ABORT;
        const body = this.block();
        if (body === ABORT) return ABORT;
        return { kind: 'While', condition, body };
    }

    private parenthesizedCondition(keyword: string): Parsed<Expr> {
        if (this.consume('LeftParen', `Expected "(" after "${keyword}".`) === ABORT) return ABORT;
        const condition = this.expression();
        if (condition === ABORT) return ABORT;
        if (this.consume('RightParen', `Expected ")" after ${keyword} condition.`) === ABORT) return ABORT;
        return condition;
    }

    /**
     * `for (init; cond; incr) body` becomes
     * `{ init; while (cond) { body...; incr; } }`. A missing condition is a
     * zero-length `true` placed where the condition would have started.
     */
    private forStatement(): Parsed<Stmt> {
        this.advance();
        if (this.consume('LeftParen', 'Expected "(" after "for".') === ABORT) return ABORT;

        let initializer: Stmt | undefined;
        if (!this.match('Semicolon')) {
            const init = this.check('Var')
                ? this.varDeclaration()
                : this.isDeclarationStart() ? this.declaration() : this.expressionStatement();
            if (init === ABORT) return ABORT;
            initializer = init;
        }

        const conditionStart = this.peek();
        let condition: Expr = {
            kind: 'Literal',
            value: { ...conditionStart, kind: 'True', length: 0, value: true }
        };
        if (!this.check('Semicolon')) {
            const cond = this.expression();
            if (cond === ABORT) return ABORT;
            condition = cond;
        }
        if (this.consume('Semicolon', 'Expected ";" after loop condition.') === ABORT) return ABORT;

        let increment: Expr | undefined;
        if (!this.check('RightParen')) {
            const incr = this.expression();
            if (incr === ABORT) return ABORT;
            increment = incr;
        }
        if (this.consume('RightParen', 'Expected ")" after for clauses.') === ABORT) return ABORT;

        const body = this.block();
        if (body === ABORT) return ABORT;

        const loopBody: BlockStmt = {
            kind: 'Block',
            statements: increment ? [...body.statements, { kind: 'ExpressionStatement', expr: increment }] : body.statements
        };
        const loop: Stmt = { kind: 'While', condition, body: loopBody };
        return { kind: 'Block', statements: initializer ? [initializer, loop] : [loop] };
    }

    private returnStatement(): Parsed<Stmt> {
        const keyword = this.advance();
        if (this.match('Semicolon')) {
            return { kind: 'ReturnEmpty', keyword };
        }

        const value = this.expression();
        if (value === ABORT) return ABORT;
        if (this.consume('Semicolon', 'Expected ";" after return value.') === ABORT) return ABORT;
        return { kind: 'Return', keyword, value };
    }

    private expressionStatement(): Parsed<Stmt> {
        const expr = this.expression();
        if (expr === ABORT) return ABORT;
        if (this.consume('Semicolon', 'Expected ";" after expression.') === ABORT) return ABORT;
        return { kind: 'ExpressionStatement', expr };
    }
}

export function parse(file: string, tokens: readonly Token[], diagnostics: Diagnostics): ProgramStmt {
    return new Parser(diagnostics).parse(file, tokens);
}
