import { SourceLocation } from "@stepslang/library";
import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";

export class SetStatement implements BaseStatement {
    kind: "SetStatement" = "SetStatement";

    constructor(
        public target: string,
        public value: Expression,
        public loc: SourceLocation,
    ) {}
}

/** `set target[index] to value` */
export class SetIndexStatement implements BaseStatement {
    kind: "SetIndexStatement" = "SetIndexStatement";

    constructor(
        public target: string,
        public index: Expression,
        public value: Expression,
        public loc: SourceLocation,
    ) {}
}
