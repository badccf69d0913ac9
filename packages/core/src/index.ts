import { NOTHING } from "@stepslang/library";
import { parseBuilding } from "./parser/Parser";
import { Environment } from "./interpreter/Environment";
import {
    ExecutionResult,
    Interpreter,
    InterpreterOptions,
} from "./interpreter/Interpreter";

export { Lexer, tokenize } from "./lexer/Lexer";
export { TokenType } from "./lexer/TokenType";
export type { Token } from "./lexer/Token";
export {
    Parser,
    parseBuilding,
    parseFloor,
    parseStep,
    parseReplStatements,
} from "./parser/Parser";
export * from "./parser/types";
export * from "./parser/statements";
export * from "./parser/expressions";
export * from "./parser/structure";
export * from "./interpreter/Environment";
export { ReplEnvironment } from "./interpreter/ReplEnvironment";
export * from "./interpreter/Outcome";
export * from "./interpreter/Interpreter";
export * from "./debugger";
export * from "./loader/config";
export * from "./loader/ProjectLoader";
export { renderDiagnostic, stripAnsi } from "./utils/diagnostic";

/**
 * Parses and runs a standalone building. Parse errors are reported as a
 * failed result carrying the first error.
 */
export async function interpret(
    source: string,
    options: InterpreterOptions = {},
    file: string = "<string>",
): Promise<ExecutionResult> {
    const { ast, errors } = parseBuilding(source, file);
    if (!ast || errors.length > 0) {
        return {
            success: false,
            returnValue: NOTHING,
            error: errors[0],
            output: [],
        };
    }

    const { natives, ...environmentOptions } = options;
    const environment = new Environment({ ...environmentOptions, file });
    const interpreter = new Interpreter(environment, natives);
    return interpreter.runBuilding(ast);
}
