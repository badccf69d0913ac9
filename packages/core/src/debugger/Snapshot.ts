import { StepsValue, ValueType, describeValue } from "@stepslang/library";
import { Environment } from "../interpreter/Environment";

export interface VariableInfo {
    name: string;
    valueType: ValueType;
    valueRepr: string;
    /** New or different since the previous snapshot. */
    isChanged: boolean;
}

export interface StackFrame {
    name: string;
    file: string;
    line: number;
    localVariables: VariableInfo[];
}

export interface DebugSnapshot {
    currentFile: string;
    currentLine: number;
    /** Outermost frame first. */
    callStack: StackFrame[];
    globalVariables: VariableInfo[];
}

/**
 * Builds snapshots and remembers the last one so that changed
 * variables can be flagged.
 */
export class SnapshotBuilder {
    private previous: Map<string, string> = new Map();

    public build(
        environment: Environment,
        currentFile: string,
        currentLine: number,
    ): DebugSnapshot {
        const seen = new Map<string, string>();

        const describe = (
            prefix: string,
            variables: Map<string, StepsValue>,
        ): VariableInfo[] =>
            [...variables].map(([name, value]) => {
                const key = `${prefix}/${name}`;
                const valueRepr = describeValue(value);
                seen.set(key, valueRepr);
                return {
                    name,
                    valueType: value.type,
                    valueRepr,
                    isChanged: this.previous.get(key) !== valueRepr,
                };
            });

        const frames = environment.frames;
        const globalVariables = describe("global", frames[0].visible());
        const callStack = frames.map((frame, depth) => ({
            name: frame.name,
            file: frame.file,
            line: frame.line,
            localVariables:
                depth === 0
                    ? globalVariables
                    : describe(`${depth}:${frame.name}`, frame.visible()),
        }));

        this.previous = seen;
        return { currentFile, currentLine, callStack, globalVariables };
    }

    public reset(): void {
        this.previous.clear();
    }
}
