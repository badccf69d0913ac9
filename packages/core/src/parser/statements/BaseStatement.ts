import { SourceLocation } from "@stepslang/library";

export interface BaseStatement {
    kind: string;
    loc: SourceLocation;
}
