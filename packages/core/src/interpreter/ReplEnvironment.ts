import {
    ErrorCode,
    SourceLocation,
    makeError,
} from "@stepslang/library";
import { StepNode } from "../parser/structure";
import { Environment, EnvironmentOptions } from "./Environment";

/**
 * Environment for interactive sessions: one long-lived main scope, no
 * steps, and `fixed` is not enforced so lines can be retyped.
 */
export class ReplEnvironment extends Environment {
    constructor(options: EnvironmentOptions = {}) {
        super({ file: "<repl>", ...options });
    }

    protected enforcesFixed(): boolean {
        return false;
    }

    public resolveStep(name: string, loc?: SourceLocation): StepNode {
        throw makeError(ErrorCode.StepInRepl, { name }, loc);
    }
}
