import { SourceLocation } from "./location";

export interface StepsErrorInit {
    code: string;
    message: string;
    file?: string;
    line?: number;
    column?: number;
    hint?: string;
    contextLines?: string[];
    /** Line number of the first entry in `contextLines`. */
    contextStart?: number;
}

/**
 * Base class for every diagnostic the engine reports. Carries a code from
 * the error taxonomy plus optional location, hint and surrounding source.
 */
export class StepsError extends Error {
    public readonly code: string;
    public file?: string;
    public line?: number;
    public column?: number;
    public hint?: string;
    public contextLines: string[];
    public contextStart?: number;

    constructor(init: StepsErrorInit) {
        super(init.message);
        this.name = "StepsError";
        this.code = init.code;
        this.file = init.file;
        this.line = init.line;
        this.column = init.column;
        this.hint = init.hint;
        this.contextLines = init.contextLines ?? [];
        this.contextStart = init.contextStart;
    }

    public get location(): SourceLocation | undefined {
        if (this.line === undefined) return undefined;
        return {
            file: this.file ?? "<unknown>",
            line: this.line,
            col: this.column ?? 1,
        };
    }

    /** Fills in a location unless the error already has one. */
    public locate(loc: SourceLocation | undefined): this {
        if (loc && this.line === undefined) {
            this.file = loc.file;
            this.line = loc.line;
            this.column = loc.col;
        }
        return this;
    }

    /**
     * Attaches up to `radius` lines on each side of the error line.
     */
    public withContext(source: string, radius = 2): this {
        if (this.line === undefined) return this;
        const lines = source.split("\n");
        const first = Math.max(1, this.line - radius);
        const last = Math.min(lines.length, this.line + radius);
        this.contextLines = lines.slice(first - 1, last);
        this.contextStart = first;
        return this;
    }

    public format(): string {
        const output = [`Error ${this.code}: ${this.message}`];

        if (this.line !== undefined) {
            const position =
                this.column !== undefined
                    ? `${this.line}:${this.column}`
                    : `${this.line}`;
            output.push(
                this.file
                    ? `  --> ${this.file}:${position}`
                    : `  --> line ${position}`,
            );
        }

        if (this.hint) {
            const [first, ...rest] = this.hint.split("\n");
            output.push(`  Hint: ${first}`);
            for (const line of rest) output.push(`        ${line}`);
        }

        if (this.contextLines.length > 0) {
            const start = this.contextStart ?? this.line ?? 1;
            const last = start + this.contextLines.length - 1;
            const width = String(last).length;
            this.contextLines.forEach((text, i) => {
                const num = start + i;
                const marker = num === this.line ? ">>" : "  ";
                output.push(
                    `${marker} ${String(num).padStart(width)} | ${text}`,
                );
                if (num === this.line && this.column !== undefined) {
                    const pad = " ".repeat(Math.max(0, this.column - 1));
                    output.push(`   ${" ".repeat(width)} | ${pad}^`);
                }
            });
        }

        return output.join("\n");
    }

    public toString(): string {
        return this.format();
    }
}

export class StructureError extends StepsError {
    constructor(init: StepsErrorInit) {
        super(init);
        this.name = "StructureError";
    }
}

export class LexerError extends StepsError {
    constructor(init: StepsErrorInit) {
        super(init);
        this.name = "LexerError";
    }
}

export class ParseError extends StepsError {
    constructor(init: StepsErrorInit) {
        super(init);
        this.name = "ParseError";
    }
}

export class StepsTypeError extends StepsError {
    constructor(init: StepsErrorInit) {
        super(init);
        this.name = "StepsTypeError";
    }
}

export class StepsRuntimeError extends StepsError {
    constructor(init: StepsErrorInit) {
        super(init);
        this.name = "StepsRuntimeError";
    }
}
