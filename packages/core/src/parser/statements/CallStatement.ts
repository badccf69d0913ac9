import { SourceLocation } from "@stepslang/library";
import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";

export class CallStatement implements BaseStatement {
    kind: "CallStatement" = "CallStatement";

    constructor(
        public stepName: string,
        public args: Expression[],
        public resultTarget: string | null,
        public loc: SourceLocation,
    ) {}
}
