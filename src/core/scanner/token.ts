export type TokenKind =
    // Punctuation
    | 'LeftBrace'
    | 'RightBrace'
    | 'LeftParen'
    | 'RightParen'
    | 'LeftBracket'
    | 'RightBracket'
    | 'Comma'
    | 'Dot'
    | 'Semicolon'
    // Operators
    | 'Plus'
    | 'PlusPlus'
    | 'PlusEqual'
    | 'Minus'
    | 'MinusMinus'
    | 'MinusEqual'
    | 'Star'
    | 'StarEqual'
    | 'Slash'
    | 'SlashEqual'
    | 'Percent'
    | 'Bang'
    | 'BangEqual'
    | 'Equal'
    | 'EqualEqual'
    | 'Less'
    | 'LessEqual'
    | 'LessLess'
    | 'Greater'
    | 'GreaterEqual'
    | 'GreaterGreater'
    | 'Amp'
    | 'AmpAmp'
    | 'Pipe'
    | 'PipePipe'
    | 'Caret'
    | 'Tilde'
    // Literals
    | 'StringLiteral'
    | 'IntLiteral'
    | 'UIntLiteral'
    | 'LongLiteral'
    | 'ULongLiteral'
    | 'FloatLiteral'
    | 'DoubleLiteral'
    // Keywords
    | 'True'
    | 'False'
    | 'If'
    | 'Else'
    | 'Return'
    | 'For'
    | 'While'
    | 'Break'
    | 'Continue'
    | 'Var'
    | 'Ref'
    | 'Fun'
    | 'New'
    | 'Struct'
    // Primitive type names
    | 'Byte'
    | 'Short'
    | 'UShort'
    | 'Int'
    | 'UInt'
    | 'Long'
    | 'ULong'
    | 'Float'
    | 'Double'
    | 'Bool'
    | 'Void'
    | 'String'
    | 'Identifier'
    | 'Comment'
    | 'Eof';

export type LiteralValue = string | number | bigint | boolean;

/** A compilation unit's source text. Tokens point into it and never copy it. */
export interface SourceFile {
    readonly name: string;
    readonly text: string;
}

export interface Token {
    readonly kind: TokenKind;
    /** Offset of the first character of the lexeme. */
    readonly start: number;
    readonly length: number;
    readonly source: SourceFile;
    readonly line: number;
    readonly column: number;
    readonly value?: LiteralValue;
}

export function lexeme(token: Token): string {
    return token.source.text.slice(token.start, token.start + token.length);
}

export const LITERAL_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
    'StringLiteral',
    'IntLiteral',
    'UIntLiteral',
    'LongLiteral',
    'ULongLiteral',
    'FloatLiteral',
    'DoubleLiteral',
    'True',
    'False'
]);

/** Primitive type names usable in declarations. `void` is only a return type. */
export const BUILTIN_TYPE_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
    'Byte',
    'Short',
    'UShort',
    'Int',
    'UInt',
    'Long',
    'ULong',
    'Float',
    'Double',
    'Bool',
    'String'
]);
