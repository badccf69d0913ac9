import { SourceLocation } from "@stepslang/library";

export class FloorNode {
    kind: "Floor" = "Floor";

    constructor(
        public name: string,
        /** Step names in declaration order. */
        public steps: string[],
        public loc: SourceLocation,
    ) {}
}
