import { TokenKind } from './token.js';

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
    ['true', 'True'],
    ['false', 'False'],
    ['if', 'If'],
    ['else', 'Else'],
    ['return', 'Return'],
    ['for', 'For'],
    ['while', 'While'],
    ['break', 'Break'],
    ['continue', 'Continue'],
    ['var', 'Var'],
    ['ref', 'Ref'],
    ['fun', 'Fun'],
    ['new', 'New'],
    ['struct', 'Struct'],
    ['byte', 'Byte'],
    ['short', 'Short'],
    ['ushort', 'UShort'],
    ['int', 'Int'],
    ['uint', 'UInt'],
    ['long', 'Long'],
    ['ulong', 'ULong'],
    ['float', 'Float'],
    ['double', 'Double'],
    ['bool', 'Bool'],
    ['void', 'Void'],
    ['string', 'String']
]);

export function keywordKind(word: string): TokenKind | undefined {
    return KEYWORDS.get(word);
}
