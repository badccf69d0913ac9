import { SourceLocation } from "@stepslang/library";
import { BaseStatement } from "./BaseStatement";
import { Statement } from "./index";

/**
 * attempt: ... if unsuccessful: ... then continue: ...
 */
export class AttemptStatement implements BaseStatement {
    kind: "AttemptStatement" = "AttemptStatement";

    constructor(
        public body: Statement[],
        public unsuccessful: Statement[] | null,
        public thenContinue: Statement[] | null,
        public loc: SourceLocation,
    ) {}
}
