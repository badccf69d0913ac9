import { SourceLocation, ValueType } from "@stepslang/library";
import { Statement } from "../statements";

export interface Parameter {
    name: string;
    type: ValueType | null;
    loc: SourceLocation;
}

export interface ReturnDeclaration {
    name: string;
    type: ValueType | null;
    loc: SourceLocation;
}

export interface Declaration {
    name: string;
    type: ValueType;
    fixed: boolean;
    loc: SourceLocation;
}

/**
 * A callable unit: a step file's body, or a riser nested inside a step.
 */
export interface Callable {
    name: string;
    expects: Parameter[];
    returns: ReturnDeclaration | null;
    declarations: Declaration[];
    body: Statement[];
    loc: SourceLocation;
}

/** Private helper step, callable only from within its owning step. */
export class RiserNode implements Callable {
    kind: "Riser" = "Riser";

    constructor(
        public name: string,
        public expects: Parameter[],
        public returns: ReturnDeclaration | null,
        public declarations: Declaration[],
        public body: Statement[],
        public loc: SourceLocation,
    ) {}
}

export class StepNode implements Callable {
    kind: "Step" = "Step";

    constructor(
        public name: string,
        public belongsTo: string | null,
        public expects: Parameter[],
        public returns: ReturnDeclaration | null,
        public risers: RiserNode[],
        public declarations: Declaration[],
        public body: Statement[],
        public loc: SourceLocation,
    ) {}

    public findRiser(name: string): RiserNode | undefined {
        return this.risers.find((riser) => riser.name === name);
    }
}
