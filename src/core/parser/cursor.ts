import { Diagnostics } from '../diagnostics.js';
import { DiagnosticCode } from '../../types/diagnostic.js';
import { lexeme, Token, TokenKind } from '../scanner/token.js';

/**
 * Returned by every parsing method once a syntax error has been reported.
 * Callers hand it straight back up, so the first error ends the parse.
 */
export const ABORT: unique symbol = Symbol('abort');
export type Abort = typeof ABORT;
export type Parsed<T> = T | Abort;

function describeFound(token: Token): string {
    return token.kind === 'Eof' ? 'Reached end of file.' : `Found "${lexeme(token)}".`;
}

/** Nested expressions, blocks and types allowed before the parse gives up. */
export const MAX_NESTING_DEPTH = 256;

export abstract class TokenCursor {
    protected tokens: Token[] = [];
    protected current = 0;
    protected file = '';
    private depth = 0;

    constructor(protected readonly diagnostics: Diagnostics) {}

    /** Comments are dropped; a stream without a trailing `Eof` gets one. */
    protected reset(file: string, tokens: readonly Token[]): void {
        this.file = file;
        this.current = 0;
        this.depth = 0;
        this.tokens = tokens.filter(t => t.kind !== 'Comment');

        const last = this.tokens.at(-1);
        if (last?.kind !== 'Eof') {
            const source = last?.source ?? { name: file, text: '' };
            this.tokens.push({
                kind: 'Eof',
                start: source.text.length,
                length: 0,
                source,
                line: last?.line ?? 1,
                column: last ? last.column + last.length : 1
            });
        }
    }

    protected isAtEnd(): boolean {
        return this.peek().kind === 'Eof';
    }

    protected peek(): Token {
        return this.tokens[this.current];
    }

    protected peekAt(distance: number): Token {
        return this.tokens[Math.min(this.current + distance, this.tokens.length - 1)];
    }

    protected advance(): Token {
        const token = this.peek();
        if (!this.isAtEnd()) this.current++;
        return token;
    }

    protected check(...kinds: TokenKind[]): boolean {
        return kinds.includes(this.peek().kind);
    }

    protected checkAt(distance: number, kind: TokenKind): boolean {
        return this.peekAt(distance).kind === kind;
    }

    protected match(...kinds: TokenKind[]): Token | undefined {
        return this.check(...kinds) ? this.advance() : undefined;
    }

    protected consume(kind: TokenKind, message: string): Parsed<Token> {
        if (this.check(kind)) return this.advance();
        return this.errorAtCurrent(message);
    }

    /**
     * Consumes a `>`. A `>>` closing two nested lists is split: the first half
     * is returned and the second stays in the stream as a `>`.
     */
    protected consumeClosingAngle(message: string): Parsed<Token> {
        const token = this.peek();
        if (token.kind === 'Greater') return this.advance();
        if (token.kind !== 'GreaterGreater') return this.errorAtCurrent(message);

        this.tokens[this.current] = { ...token, kind: 'Greater', start: token.start + 1, length: 1, column: token.column + 1 };
        return { ...token, kind: 'Greater', length: 1 };
    }

    /** Runs `parse` one nesting level deeper, failing once the limit is passed. */
    protected nested<T>(parse: () => Parsed<T>): Parsed<T> {
        if (this.depth >= MAX_NESTING_DEPTH) {
            return this.errorAtCurrent('Code nests too deeply.');
        }
        this.depth++;
        const result = parse();
        this.depth--;
        return result;
    }

    protected errorAtCurrent(message: string, code: DiagnosticCode = 'SYNTAX_ERROR'): Abort {
        return this.fail(this.peek(), `${message} ${describeFound(this.peek())}`, code);
    }

    protected fail(token: Token, message: string, code: DiagnosticCode = 'SYNTAX_ERROR'): Abort {
        this.diagnostics.report(this.file, token.line, token.column, message, code);
        return ABORT;
    }
}
