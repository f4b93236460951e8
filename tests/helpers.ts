import { Diagnostics } from '../src/core/diagnostics.js';
import { Expr } from '../src/core/parser/ast.js';
import { Parser } from '../src/core/parser/parser.js';
import { TypeInfo } from '../src/core/parser/type-info.js';
import { Scanner } from '../src/core/scanner/scanner.js';
import { Token } from '../src/core/scanner/token.js';

export const FILE = 'test.sn';

export function scanText(text: string): { tokens: Token[]; diagnostics: Diagnostics } {
    const diagnostics = new Diagnostics();
    const tokens = new Scanner(diagnostics).scan(FILE, text);
    return { tokens, diagnostics };
}

export function parseExpr(text: string): { expr: Expr | undefined; diagnostics: Diagnostics } {
    const { tokens, diagnostics } = scanText(text);
    const expr = new Parser(diagnostics).parseExpression(FILE, tokens);
    return { expr, diagnostics };
}

export function parseTypeText(text: string): { type: TypeInfo | undefined; diagnostics: Diagnostics } {
    const { tokens, diagnostics } = scanText(text);
    const type = new Parser(diagnostics).parseType(FILE, tokens);
    return { type, diagnostics };
}
