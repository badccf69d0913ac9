import { SourceLocation } from "@stepslang/library";
import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Statement } from "./index";

export interface ConditionalBranch {
    condition: Expression;
    body: Statement[];
    loc: SourceLocation;
}

export class IfStatement implements BaseStatement {
    kind: "IfStatement" = "IfStatement";

    constructor(
        public branch: ConditionalBranch,
        public otherwiseIfs: ConditionalBranch[],
        public otherwise: Statement[] | null,
        public loc: SourceLocation,
    ) {}
}
