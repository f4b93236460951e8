import { Token } from '../scanner/token.js';

export type NamedType = { readonly kind: 'Named'; readonly name: Token; readonly isRef: boolean };
export type ArrayType = { readonly kind: 'ArrayOf'; readonly element: TypeInfo; readonly isRef: boolean };
export type FunctionPointerType = {
    readonly kind: 'FunctionPointer';
    readonly parameters: readonly TypeInfo[];
    readonly returnType: TypeInfo;
};

export type TypeInfo = NamedType | ArrayType | FunctionPointerType;

export function namedType(name: Token, isRef = false): NamedType {
    return { kind: 'Named', name, isRef };
}

export function arrayOf(element: TypeInfo, isRef = false): ArrayType {
    return { kind: 'ArrayOf', element, isRef };
}

export function functionPointer(parameters: readonly TypeInfo[], returnType: TypeInfo): FunctionPointerType {
    return { kind: 'FunctionPointer', parameters, returnType };
}

/** Wraps `element` in `dimensions` array types; only the outermost carries `isRef`. */
export function arrayOfDimensions(element: TypeInfo, dimensions: number, isRef: boolean): TypeInfo {
    let type = element;
    for (let i = 0; i < dimensions; i++) {
        type = arrayOf(type, isRef && i === dimensions - 1);
    }
    return type;
}
