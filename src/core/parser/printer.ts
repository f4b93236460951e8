import { lexeme, Token } from '../scanner/token.js';
import { Expr, Stmt, VariableDeclaration } from './ast.js';
import { TypeInfo } from './type-info.js';

// Synthesized tokens have no lexeme of their own.
function text(token: Token): string {
    if (token.length > 0) return lexeme(token);
    if (token.kind === 'True') return 'true';
    if (token.kind === 'Void') return 'void';
    return '';
}

function list(...parts: string[]): string {
    return `(${parts.join(' ')})`;
}

export function printType(type: TypeInfo): string {
    switch (type.kind) {
        case 'Named':
            return type.isRef ? list('ref', text(type.name)) : text(type.name);
        case 'ArrayOf': {
            const array = list('array', printType(type.element));
            return type.isRef ? list('ref', array) : array;
        }
        case 'FunctionPointer':
            return list('fun', list(...type.parameters.map(printType)), printType(type.returnType));
    }
}

export function printExpr(expr: Expr): string {
    switch (expr.kind) {
        case 'Literal':
            return text(expr.value);
        case 'Grouped':
            return list('group', printExpr(expr.expr));
        case 'PrefixUnary':
            return list(text(expr.operator), printExpr(expr.operand));
        case 'Binary':
        case 'Logical':
            return list(text(expr.operator), printExpr(expr.left), printExpr(expr.right));
        case 'Assignment':
            return list(text(expr.operator), text(expr.name), printExpr(expr.value));
        case 'PropertyAssignment':
            return list(text(expr.operator), list('.', printExpr(expr.object), text(expr.property)), printExpr(expr.value));
        case 'Call':
            return list('call', printExpr(expr.callee), ...expr.args.map(printExpr));
        case 'PropertyAccess':
            return list('.', printExpr(expr.object), text(expr.property));
        case 'Variable':
            return expr.isRef ? list('ref', text(expr.name)) : text(expr.name);
        case 'PostfixIncrement':
            return list('postfix++', text(expr.name));
        case 'PostfixDecrement':
            return list('postfix--', text(expr.name));
        case 'ArrayIndex':
            return list('index', printExpr(expr.array), printExpr(expr.index));
        case 'NewSizedArray':
            return list('new', printType(expr.type), ...expr.sizes.map(printExpr));
        case 'NewStruct':
            return list('new', printType(expr.type));
        case 'FunctionTypeLiteral':
            return printType(expr.type);
    }
}

function printDeclaration(declaration: VariableDeclaration): string {
    return list(printType(declaration.type), text(declaration.name));
}

export function printStmt(stmt: Stmt): string {
    switch (stmt.kind) {
        case 'Program':
            return list('program', ...stmt.declarations.map(printStmt));
        case 'Block':
            return list('block', ...stmt.statements.map(printStmt));
        case 'ExpressionStatement':
            return list('expr', printExpr(stmt.expr));
        case 'VariableDeclaration':
            return list('declare', printType(stmt.type), text(stmt.name));
        case 'VariableDeclarationWithAssignment':
            return list('declare', printType(stmt.type), text(stmt.name), printExpr(stmt.initializer));
        case 'If': {
            const parts = ['if', printExpr(stmt.condition), printStmt(stmt.thenBranch)];
            if (stmt.elseBranch) parts.push(printStmt(stmt.elseBranch));
            return list(...parts);
        }
        case 'While':
            return list('while', printExpr(stmt.condition), printStmt(stmt.body));
        case 'FunctionDeclaration':
            return list(
                'function',
                printType(stmt.returnType),
                text(stmt.name),
                list(...stmt.parameters.map(printDeclaration)),
                printStmt(stmt.body)
            );
        case 'StructDeclaration':
            return list('struct', text(stmt.name), list(...stmt.fields.map(printDeclaration)));
        case 'Return':
            return list('return', printExpr(stmt.value));
        case 'ReturnEmpty':
            return list('return');
    }
}
