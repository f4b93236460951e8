import { BUILTIN_TYPE_KINDS, LITERAL_KINDS, Token, TokenKind } from '../scanner/token.js';
import { Expr } from './ast.js';
import { ABORT, Parsed, TokenCursor } from './cursor.js';
import {
    ArrayType,
    arrayOf,
    arrayOfDimensions,
    FunctionPointerType,
    functionPointer,
    namedType,
    TypeInfo
} from './type-info.js';

type BinaryLevel = { operators: readonly TokenKind[]; node: 'Binary' | 'Logical' };

// Lowest binding first. Every level is left-associative.
const BINARY_LEVELS: readonly BinaryLevel[] = [
    { operators: ['PipePipe'], node: 'Logical' },
    { operators: ['AmpAmp'], node: 'Logical' },
    { operators: ['Pipe'], node: 'Binary' },
    { operators: ['Caret'], node: 'Binary' },
    { operators: ['Amp'], node: 'Binary' },
    { operators: ['EqualEqual', 'BangEqual'], node: 'Binary' },
    { operators: ['Less', 'LessEqual', 'Greater', 'GreaterEqual'], node: 'Binary' },
    { operators: ['LessLess', 'GreaterGreater'], node: 'Binary' },
    { operators: ['Plus', 'Minus'], node: 'Binary' },
    { operators: ['Star', 'Slash', 'Percent'], node: 'Binary' }
];

const ASSIGNMENT_OPERATORS: readonly TokenKind[] = ['Equal', 'PlusEqual', 'MinusEqual', 'StarEqual', 'SlashEqual'];
const PREFIX_OPERATORS: readonly TokenKind[] = ['Bang', 'Minus', 'Tilde', 'PlusPlus', 'MinusMinus'];

/** Expression and type grammar shared by the statement parser. */
export abstract class ExpressionParser extends TokenCursor {
    protected expression(): Parsed<Expr> {
        return this.nested(() => this.assignment());
    }

    private assignment(): Parsed<Expr> {
        const target = this.binary(0);
        if (target === ABORT) return ABORT;

        const operator = this.match(...ASSIGNMENT_OPERATORS);
        if (!operator) return target;

        // Right-associative: `a = b = c` assigns `b = c` first.
        const value = this.expression();
        if (value === ABORT) return ABORT;

        if (target.kind === 'Variable') {
            return { kind: 'Assignment', name: target.name, operator, value };
        }
        if (target.kind === 'PropertyAccess') {
            return { kind: 'PropertyAssignment', object: target.object, property: target.property, operator, value };
        }
        return this.fail(operator, 'Invalid assignment target.', 'INVALID_ASSIGNMENT_TARGET');
    }

    private binary(level: number): Parsed<Expr> {
        if (level >= BINARY_LEVELS.length) return this.unary();

        const { operators, node } = BINARY_LEVELS[level];
        const first = this.binary(level + 1);
        if (first === ABORT) return ABORT;

        let left: Expr = first;
        for (let operator = this.match(...operators); operator; operator = this.match(...operators)) {
            const right = this.binary(level + 1);
            if (right === ABORT) return ABORT;
            left = node === 'Logical'
                ? { kind: 'Logical', operator, left, right }
                : { kind: 'Binary', operator, left, right };
        }
        return left;
    }

    private unary(): Parsed<Expr> {
        const operator = this.match(...PREFIX_OPERATORS);
        if (!operator) return this.postfix();

        const operand = this.nested(() => this.unary());
        if (operand === ABORT) return ABORT;
        return { kind: 'PrefixUnary', operator, operand };
    }

    private postfix(): Parsed<Expr> {
        const primary = this.primary();
        if (primary === ABORT) return ABORT;

        let expr: Expr = primary;
        for (;;) {
            if (this.match('LeftParen')) {
                const call = this.finishCall(expr);
                if (call === ABORT) return ABORT;
                expr = call;
            } else if (this.match('Dot')) {
                const property = this.consume('Identifier', 'Expected property name after ".".');
                if (property === ABORT) return ABORT;
                expr = { kind: 'PropertyAccess', object: expr, property };
            } else if (this.match('LeftBracket')) {
                const index = this.expression();
                if (index === ABORT) return ABORT;
                if (this.consume('RightBracket', 'Expected "]" after index.') === ABORT) return ABORT;
                expr = { kind: 'ArrayIndex', array: expr, index };
            } else {
                return expr;
            }
        }
    }

    private finishCall(callee: Expr): Parsed<Expr> {
        const args: Expr[] = [];
        if (!this.check('RightParen')) {
            do {
                const arg = this.argument();
                if (arg === ABORT) return ABORT;
                args.push(arg);
            } while (this.match('Comma'));
        }

        const paren = this.consume('RightParen', 'Expected ")" after arguments.');
        if (paren === ABORT) return ABORT;
        return { kind: 'Call', callee, args, paren };
    }

    private argument(): Parsed<Expr> {
        if (!this.match('Ref')) return this.expression();

        const name = this.consume('Identifier', 'Expected a variable name after "ref".');
        if (name === ABORT) return ABORT;
        return { kind: 'Variable', name, isRef: true };
    }

    private primary(): Parsed<Expr> {
        const token = this.peek();

        if (LITERAL_KINDS.has(token.kind)) {
            this.advance();
            return { kind: 'Literal', value: token };
        }

        switch (token.kind) {
            case 'LeftParen': {
                this.advance();
                const expr = this.expression();
                if (expr === ABORT) return ABORT;
                if (this.consume('RightParen', 'Expected ")" after expression.') === ABORT) return ABORT;
                return { kind: 'Grouped', expr };
            }
            case 'Identifier': {
                this.advance();
                const operator = this.match('PlusPlus', 'MinusMinus');
                if (operator?.kind === 'PlusPlus') return { kind: 'PostfixIncrement', name: token, operator };
                if (operator?.kind === 'MinusMinus') return { kind: 'PostfixDecrement', name: token, operator };
                return { kind: 'Variable', name: token, isRef: false };
            }
            case 'New':
                this.advance();
                return this.newExpression();
            case 'Fun': {
                const type = this.functionType();
                if (type === ABORT) return ABORT;
                return { kind: 'FunctionTypeLiteral', type };
            }
            default:
                return this.errorAtCurrent('Expected expression.');
        }
    }

    /** After `new`: `T[size]...` builds an array, `T()` a struct. */
    private newExpression(): Parsed<Expr> {
        const element = this.check('Fun') ? this.functionType() : this.namedTypeOnly();
        if (element === ABORT) return ABORT;

        if (this.check('LeftBracket')) {
            const sizes: Expr[] = [];
            while (this.match('LeftBracket')) {
                const size = this.expression();
                if (size === ABORT) return ABORT;
                if (this.consume('RightBracket', 'Expected "]" after array size.') === ABORT) return ABORT;
                sizes.push(size);
            }

            let type: ArrayType = arrayOf(element);
            for (let i = 1; i < sizes.length; i++) {
                type = arrayOf(type);
            }
            return { kind: 'NewSizedArray', type, sizes };
        }

        if (element.kind !== 'Named') {
            return this.errorAtCurrent('Expected "[" after function-pointer type in new expression.');
        }
        if (this.consume('LeftParen', 'Expected "(" or "[" after type in new expression.') === ABORT) return ABORT;
        if (this.consume('RightParen', 'Expected ")" in new expression. Constructors take no arguments.') === ABORT) return ABORT;
        return { kind: 'NewStruct', type: element };
    }

    // Types

    protected isBuiltinType(kind: TokenKind): boolean {
        return BUILTIN_TYPE_KINDS.has(kind);
    }

    /**
     * `[ref] name []...` or `fun[<...>] []...`. `void` is accepted where
     * `allowVoid` is set (return types and function-pointer entries).
     */
    protected typeInfo(allowVoid = false): Parsed<TypeInfo> {
        const ref = this.match('Ref');

        if (this.check('Fun')) {
            if (ref) return this.fail(ref, 'ref cannot apply to a function-pointer type.', 'INVALID_TYPE');
            const fn = this.functionType();
            if (fn === ABORT) return ABORT;
            return arrayOfDimensions(fn, this.arraySuffix(), false);
        }

        const name = allowVoid && this.check('Void') ? this.advance() : this.typeName();
        if (name === ABORT) return ABORT;

        const isRef = ref !== undefined;
        const dimensions = this.arraySuffix();
        return dimensions === 0 ? namedType(name, isRef) : arrayOfDimensions(namedType(name), dimensions, isRef);
    }

    protected functionType(): Parsed<FunctionPointerType> {
        const keyword = this.consume('Fun', 'Expected "fun".');
        if (keyword === ABORT) return ABORT;

        if (!this.match('Less')) {
            const voidToken: Token = { ...keyword, kind: 'Void', length: 0, value: undefined };
            return functionPointer([], namedType(voidToken));
        }

        const entries: TypeInfo[] = [];
        do {
            const entry = this.nested(() => this.typeInfo(true));
            if (entry === ABORT) return ABORT;
            entries.push(entry);
        } while (this.match('Comma'));

        if (this.consumeClosingAngle('Expected ">" after function type arguments.') === ABORT) return ABORT;

        // The last entry is the return type.
        return functionPointer(entries.slice(0, -1), entries[entries.length - 1]);
    }

    private namedTypeOnly(): Parsed<TypeInfo> {
        const name = this.typeName();
        if (name === ABORT) return ABORT;
        return namedType(name);
    }

    private typeName(): Parsed<Token> {
        if (this.isBuiltinType(this.peek().kind) || this.check('Identifier')) return this.advance();
        return this.errorAtCurrent('Expected type name.', 'INVALID_TYPE');
    }

    private arraySuffix(): number {
        let dimensions = 0;
        while (this.check('LeftBracket') && this.checkAt(1, 'RightBracket')) {
            this.advance();
            this.advance();
            dimensions++;
        }
        return dimensions;
    }
}
