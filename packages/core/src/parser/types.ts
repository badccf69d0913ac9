import { StepsError } from "@stepslang/library";
import { Statement } from "./statements";
import { Expression } from "./expressions";
import { BuildingNode, FloorNode, RiserNode, StepNode } from "./structure";

export type { SourceLocation } from "@stepslang/library";

export type StructuralNode = BuildingNode | FloorNode | StepNode | RiserNode;

export type ASTNode = StructuralNode | Statement | Expression;

export interface ParseResult<T> {
    ast: T | null;
    errors: StepsError[];
}
