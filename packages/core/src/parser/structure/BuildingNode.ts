import { SourceLocation } from "@stepslang/library";
import { Statement } from "../statements";

export class BuildingNode {
    kind: "Building" = "Building";

    constructor(
        public name: string,
        public body: Statement[],
        public loc: SourceLocation,
    ) {}
}
