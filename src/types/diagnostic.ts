export type Severity = 'error' | 'warning';

export type DiagnosticCode =
    | 'UNEXPECTED_CHARACTER'
    | 'UNTERMINATED_STRING'
    | 'UNTERMINATED_COMMENT'
    | 'INVALID_NUMBER'
    | 'SYNTAX_ERROR'
    | 'INVALID_ASSIGNMENT_TARGET'
    | 'INVALID_TYPE';

export interface Location {
    line: number;
    col: number;
}

export interface Range {
    start: Location;
    end: Location;
}

export interface Diagnostic {
    code: DiagnosticCode;
    message: string;
    severity: Severity;
    file: string;
    range?: Range;
}

export interface FileStats {
    total: number;
    passed: number;
    failed: number;
}
