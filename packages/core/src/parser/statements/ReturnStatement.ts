import { SourceLocation } from "@stepslang/library";
import { Expression } from "../expressions";

export interface ReturnStatement {
    kind: "ReturnStatement";
    value?: Expression;
    loc: SourceLocation;
}

export interface ExitStatement {
    kind: "ExitStatement";
    loc: SourceLocation;
}
