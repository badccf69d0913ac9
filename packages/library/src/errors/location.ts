export interface SourceLocation {
    file: string;
    line: number;
    col: number;
    endLine?: number;
    endCol?: number;
}

export function formatLocation(loc: SourceLocation): string {
    return `${loc.file}:${loc.line}:${loc.col}`;
}
