import { DisplayStatement } from "./DisplayStatement";
import { SetStatement, SetIndexStatement } from "./SetStatement";
import { CallStatement } from "./CallStatement";
import { ReturnStatement, ExitStatement } from "./ReturnStatement";
import { IfStatement } from "./IfStatement";
import {
    RepeatTimesStatement,
    RepeatForEachStatement,
    RepeatWhileStatement,
} from "./RepeatStatement";
import { AttemptStatement } from "./AttemptStatement";
import {
    AddToListStatement,
    RemoveFromListStatement,
} from "./ListStatement";

export * from "./BaseStatement";
export * from "./DisplayStatement";
export * from "./SetStatement";
export * from "./CallStatement";
export * from "./ReturnStatement";
export * from "./IfStatement";
export * from "./RepeatStatement";
export * from "./AttemptStatement";
export * from "./ListStatement";

export type Statement =
    | DisplayStatement
    | SetStatement
    | SetIndexStatement
    | CallStatement
    | ReturnStatement
    | ExitStatement
    | IfStatement
    | RepeatTimesStatement
    | RepeatForEachStatement
    | RepeatWhileStatement
    | AttemptStatement
    | AddToListStatement
    | RemoveFromListStatement;
