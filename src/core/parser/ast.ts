import { Token } from '../scanner/token.js';
import { ArrayType, FunctionPointerType, NamedType, TypeInfo } from './type-info.js';

export type Expr =
    | { readonly kind: 'Literal'; readonly value: Token }
    | { readonly kind: 'Grouped'; readonly expr: Expr }
    | { readonly kind: 'PrefixUnary'; readonly operator: Token; readonly operand: Expr }
    | { readonly kind: 'Binary'; readonly operator: Token; readonly left: Expr; readonly right: Expr }
    | { readonly kind: 'Logical'; readonly operator: Token; readonly left: Expr; readonly right: Expr }
    | { readonly kind: 'Assignment'; readonly name: Token; readonly operator: Token; readonly value: Expr }
    | {
        readonly kind: 'PropertyAssignment';
        readonly object: Expr;
        readonly property: Token;
        readonly operator: Token;
        readonly value: Expr;
    }
    | { readonly kind: 'Call'; readonly callee: Expr; readonly args: readonly Expr[]; readonly paren: Token }
    | { readonly kind: 'PropertyAccess'; readonly object: Expr; readonly property: Token }
    | { readonly kind: 'Variable'; readonly name: Token; readonly isRef: boolean }
    | { readonly kind: 'PostfixIncrement'; readonly name: Token; readonly operator: Token }
    | { readonly kind: 'PostfixDecrement'; readonly name: Token; readonly operator: Token }
    | { readonly kind: 'ArrayIndex'; readonly array: Expr; readonly index: Expr }
    | { readonly kind: 'NewSizedArray'; readonly type: ArrayType; readonly sizes: readonly Expr[] }
    | { readonly kind: 'NewStruct'; readonly type: NamedType }
    | { readonly kind: 'FunctionTypeLiteral'; readonly type: FunctionPointerType };

export type VariableDeclaration = { readonly kind: 'VariableDeclaration'; readonly type: TypeInfo; readonly name: Token };

export type VariableDeclarationWithAssignment = {
    readonly kind: 'VariableDeclarationWithAssignment';
    readonly type: TypeInfo;
    readonly name: Token;
    readonly initializer: Expr;
};

export type BlockStmt = { readonly kind: 'Block'; readonly statements: readonly Stmt[] };

export type IfStmt = {
    readonly kind: 'If';
    readonly condition: Expr;
    readonly thenBranch: BlockStmt;
    /** An `else if` is a nested `If`; a plain `else` is a block. */
    readonly elseBranch?: BlockStmt | IfStmt;
};

export type FunctionDeclaration = {
    readonly kind: 'FunctionDeclaration';
    readonly returnType: TypeInfo;
    readonly name: Token;
    readonly parameters: readonly VariableDeclaration[];
    readonly body: BlockStmt;
};

export type StructDeclaration = {
    readonly kind: 'StructDeclaration';
    readonly name: Token;
    readonly fields: readonly VariableDeclaration[];
};

export type ProgramStmt = {
    readonly kind: 'Program';
    readonly declarations: readonly (FunctionDeclaration | StructDeclaration)[];
};

export type Stmt =
    | ProgramStmt
    | BlockStmt
    | { readonly kind: 'ExpressionStatement'; readonly expr: Expr }
    | VariableDeclaration
    | VariableDeclarationWithAssignment
    | IfStmt
    | { readonly kind: 'While'; readonly condition: Expr; readonly body: BlockStmt }
    | FunctionDeclaration
    | StructDeclaration
    | { readonly kind: 'Return'; readonly keyword: Token; readonly value: Expr }
    | { readonly kind: 'ReturnEmpty'; readonly keyword: Token };

export function emptyProgram(): ProgramStmt {
    return { kind: 'Program', declarations: [] };
}
