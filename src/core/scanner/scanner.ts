import { Diagnostics } from '../diagnostics.js';
import { DiagnosticCode } from '../../types/diagnostic.js';
import { keywordKind } from './keywords.js';
import { LiteralValue, SourceFile, Token, TokenKind } from './token.js';

type IntegerKind = 'int' | 'uint' | 'long' | 'ulong';
type FloatKind = 'float' | 'double';

const INTEGER_FORMATS: Record<IntegerKind, { kind: TokenKind; bits: 32 | 64; signed: boolean; suffix: number }> = {
    int: { kind: 'IntLiteral', bits: 32, signed: true, suffix: 0 },
    uint: { kind: 'UIntLiteral', bits: 32, signed: false, suffix: 1 },
    long: { kind: 'LongLiteral', bits: 64, signed: true, suffix: 1 },
    ulong: { kind: 'ULongLiteral', bits: 64, signed: false, suffix: 2 }
};

function isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
}

function isHexDigit(c: string): boolean {
    return isDigit(c) || (c >= 'a' && c <= 'f') || (c >= 'A' && c <= 'F');
}

function isAlpha(c: string): boolean {
    return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

function isAlphaNumeric(c: string): boolean {
    return isAlpha(c) || isDigit(c);
}

/**
 * Converts source text into tokens. Lexical errors go to the diagnostics and
 * scanning carries on with the next character, so one pass reports every
 * problem it can find. The returned stream always ends with a single `Eof`.
 */
export class Scanner {
    private source: SourceFile = { name: '', text: '' };
    private tokens: Token[] = [];
    private current = 0;
    private line = 1;
    private column = 1;
    private tokenStart = 0;
    private tokenLine = 1;
    private tokenColumn = 1;

    constructor(private readonly diagnostics: Diagnostics) {}

    scan(file: string, text: string): Token[];
    scan(source: SourceFile): Token[];
    scan(fileOrSource: string | SourceFile, text = ''): Token[] {
        this.source = typeof fileOrSource === 'string' ? { name: fileOrSource, text } : fileOrSource;
        this.tokens = [];
        this.current = 0;
        this.line = 1;
        this.column = 1;

        while (!this.isAtEnd()) {
            this.tokenStart = this.current;
            this.tokenLine = this.line;
            this.tokenColumn = this.column;
            this.scanToken();
        }

        this.tokenStart = this.current;
        this.tokenLine = this.line;
        this.tokenColumn = this.column;
        this.addToken('Eof');
        return this.tokens;
    }

    private scanToken(): void {
        const c = this.advance();
        switch (c) {
            case ' ':
            case '\t':
            case '\r':
            case '\n':
                break;
            case '{': this.addToken('LeftBrace'); break;
            case '}': this.addToken('RightBrace'); break;
            case '(': this.addToken('LeftParen'); break;
            case ')': this.addToken('RightParen'); break;
            case '[': this.addToken('LeftBracket'); break;
            case ']': this.addToken('RightBracket'); break;
            case ',': this.addToken('Comma'); break;
            case '.': this.addToken('Dot'); break;
            case ';': this.addToken('Semicolon'); break;
            case '%': this.addToken('Percent'); break;
            case '^': this.addToken('Caret'); break;
            case '~': this.addToken('Tilde'); break;
            case '+':
                this.addToken(this.match('+') ? 'PlusPlus' : this.match('=') ? 'PlusEqual' : 'Plus');
                break;
            case '-':
                this.addToken(this.match('-') ? 'MinusMinus' : this.match('=') ? 'MinusEqual' : 'Minus');
                break;
            case '*':
                this.addToken(this.match('=') ? 'StarEqual' : 'Star');
                break;
            case '/':
                if (this.match('/')) {
                    this.scanLineComment();
                } else if (this.match('*')) {
                    this.scanBlockComment();
                } else {
                    this.addToken(this.match('=') ? 'SlashEqual' : 'Slash');
                }
                break;
            case '!':
                this.addToken(this.match('=') ? 'BangEqual' : 'Bang');
                break;
            case '=':
                this.addToken(this.match('=') ? 'EqualEqual' : 'Equal');
                break;
            case '<':
                this.addToken(this.match('=') ? 'LessEqual' : this.match('<') ? 'LessLess' : 'Less');
                break;
            case '>':
                this.addToken(this.match('=') ? 'GreaterEqual' : this.match('>') ? 'GreaterGreater' : 'Greater');
                break;
            case '&':
                this.addToken(this.match('&') ? 'AmpAmp' : 'Amp');
                break;
            case '|':
                this.addToken(this.match('|') ? 'PipePipe' : 'Pipe');
                break;
            case '"':
                this.scanString();
                break;
            default:
                if (isDigit(c)) {
                    this.scanNumber();
                } else if (isAlpha(c)) {
                    this.scanWord();
                } else {
                    this.scanUnexpected(c);
                }
                break;
        }
    }

    private scanLineComment(): void {
        while (this.peek() !== '\n' && !this.isAtEnd()) {
            this.advance();
        }
        this.addToken('Comment');
    }

    private scanBlockComment(): void {
        while (!(this.peek() === '*' && this.peekNext() === '/') && !this.isAtEnd()) {
            this.advance();
        }

        if (this.isAtEnd()) {
            this.error('Unterminated multi-line comment. Expected "*/", but reached end of file.', 'UNTERMINATED_COMMENT');
            return;
        }

        this.advance();
        this.advance();
        this.addToken('Comment');
    }

    private scanString(): void {
        while (this.peek() !== '"' && !this.isAtEnd()) {
            this.advance();
        }

        if (!this.match('"')) {
            this.error('Unterminated string. Expected \'"\', but reached end of file.', 'UNTERMINATED_STRING');
            return;
        }

        this.addToken('StringLiteral', this.source.text.slice(this.tokenStart + 1, this.current - 1));
    }

    private scanWord(): void {
        while (isAlphaNumeric(this.peek())) {
            this.advance();
        }

        const kind = keywordKind(this.text()) ?? 'Identifier';
        if (kind === 'True' || kind === 'False') {
            this.addToken(kind, kind === 'True');
        } else {
            this.addToken(kind);
        }
    }

    private scanUnexpected(c: string): void {
        let char = c;
        // Keep astral characters together in the message.
        const code = c.charCodeAt(0);
        if (code >= 0xD800 && code <= 0xDBFF && !this.isAtEnd()) {
            char += this.advance();
        }
        this.error(`Unexpected character "${char}".`, 'UNEXPECTED_CHARACTER');
    }

    private scanNumber(): void {
        while (isDigit(this.peek())) {
            this.advance();
        }

        if (this.peek() === 'x' || this.peek() === 'X') {
            this.advance();
            while (isHexDigit(this.peek())) {
                this.advance();
            }
            this.scanIntegerSuffix(true);
            return;
        }

        let isFloating = false;
        if (this.peek() === '.' && isDigit(this.peekNext())) {
            isFloating = true;
            this.advance();
            while (isDigit(this.peek())) {
                this.advance();
            }
        }

        if (this.peek() === 'e' || this.peek() === 'E') {
            const signed = this.peekNext() === '+' || this.peekNext() === '-';
            if (isDigit(this.peekAt(signed ? 2 : 1))) {
                isFloating = true;
                this.advance();
                if (signed) {
                    this.advance();
                }
                while (isDigit(this.peek())) {
                    this.advance();
                }
            }
        }

        if (isFloating) {
            if (this.match('f') || this.match('F')) {
                this.addFloat('float');
            } else {
                this.addFloat('double');
            }
            return;
        }

        this.scanIntegerSuffix(false);
    }

    private scanIntegerSuffix(isHex: boolean): void {
        if (this.match('u') || this.match('U')) {
            this.addInteger(this.match('l') || this.match('L') ? 'ulong' : 'uint', isHex);
        } else if (this.match('l') || this.match('L')) {
            this.addInteger('long', isHex);
        } else {
            this.addInteger('int', isHex);
        }
    }

    private addInteger(kind: IntegerKind, isHex: boolean): void {
        const text = this.text();
        const format = INTEGER_FORMATS[kind];
        const digits = text.slice(0, text.length - format.suffix);

        let parsed: bigint;
        if (isHex) {
            // The radix marker must come right after a single leading zero.
            if (!/^0[xX][0-9a-fA-F]+$/.test(digits)) {
                this.error(`Failed to parse ${kind} "${text}".`, 'INVALID_NUMBER');
                return;
            }
            parsed = BigInt(`0x${digits.slice(2)}`);
        } else {
            parsed = BigInt(digits);
        }

        const limit = isHex || !format.signed
            ? (1n << BigInt(format.bits)) - 1n
            : (1n << BigInt(format.bits - 1)) - 1n;
        if (parsed > limit) {
            this.error(`Failed to parse ${kind} "${text}". Value is out of range.`, 'INVALID_NUMBER');
            return;
        }

        const value = format.signed ? BigInt.asIntN(format.bits, parsed) : parsed;
        this.addToken(format.kind, format.bits === 32 ? Number(value) : value);
    }

    private addFloat(kind: FloatKind): void {
        const text = this.text();
        const digits = kind === 'float' ? text.slice(0, -1) : text;
        const parsed = Number(digits);
        const value = kind === 'float' ? Math.fround(parsed) : parsed;

        if (!Number.isFinite(value)) {
            this.error(`Failed to parse ${kind} "${text}". Value is out of range.`, 'INVALID_NUMBER');
            return;
        }

        this.addToken(kind === 'float' ? 'FloatLiteral' : 'DoubleLiteral', value);
    }

    // Helpers
    private isAtEnd(): boolean {
        return this.current >= this.source.text.length;
    }

    private advance(): string {
        const c = this.source.text[this.current++];
        if (c === '\n') {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }
        return c;
    }

    private match(expected: string): boolean {
        if (this.peek() !== expected) return false;
        this.advance();
        return true;
    }

    private peek(): string {
        return this.peekAt(0);
    }

    private peekNext(): string {
        return this.peekAt(1);
    }

    private peekAt(distance: number): string {
        const index = this.current + distance;
        return index < this.source.text.length ? this.source.text[index] : '\0';
    }

    private text(): string {
        return this.source.text.slice(this.tokenStart, this.current);
    }

    private addToken(kind: TokenKind, value?: LiteralValue): void {
        this.tokens.push({
            kind,
            start: this.tokenStart,
            length: this.current - this.tokenStart,
            source: this.source,
            line: this.tokenLine,
            column: this.tokenColumn,
            value
        });
    }

    private error(message: string, code: DiagnosticCode): void {
        this.diagnostics.report(this.source.name, this.tokenLine, this.tokenColumn, message, code);
    }
}

export function scan(file: string, text: string, diagnostics: Diagnostics): Token[] {
    return new Scanner(diagnostics).scan(file, text);
}
