import { SourceLocation } from "@stepslang/library";
import { Expression } from "../expressions";

export interface AddToListStatement {
    kind: "AddToListStatement";
    item: Expression;
    listName: string;
    loc: SourceLocation;
}

export interface RemoveFromListStatement {
    kind: "RemoveFromListStatement";
    item: Expression;
    listName: string;
    loc: SourceLocation;
}
