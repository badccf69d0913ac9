import { SourceLocation } from "@stepslang/library";
import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Statement } from "./index";

export class RepeatTimesStatement implements BaseStatement {
    kind: "RepeatTimesStatement" = "RepeatTimesStatement";

    constructor(
        public count: Expression,
        public body: Statement[],
        public loc: SourceLocation,
    ) {}
}

export class RepeatForEachStatement implements BaseStatement {
    kind: "RepeatForEachStatement" = "RepeatForEachStatement";

    constructor(
        public itemName: string,
        public collection: Expression,
        public body: Statement[],
        public loc: SourceLocation,
    ) {}
}

export class RepeatWhileStatement implements BaseStatement {
    kind: "RepeatWhileStatement" = "RepeatWhileStatement";

    constructor(
        public condition: Expression,
        public body: Statement[],
        public loc: SourceLocation,
    ) {}
}
