import { SourceLocation } from "@stepslang/library";
import { Expression } from "../expressions";

export interface DisplayStatement {
    kind: "DisplayStatement";
    value: Expression;
    loc: SourceLocation;
}
