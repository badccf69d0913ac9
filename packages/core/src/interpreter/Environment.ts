import {
    ErrorCode,
    SourceLocation,
    StepsValue,
    ValueType,
    defaultValue,
    makeError,
    typeMismatchError,
    undefinedStepError,
    undefinedVariableError,
} from "@stepslang/library";
import { FloorNode, StepNode } from "../parser/structure";

export interface Variable {
    value: StepsValue;
    /** Set by `declare:`; assignments of another type are rejected. */
    declaredType?: ValueType;
    fixed: boolean;
    /** Whether a fixed variable has received its one assignment. */
    assigned: boolean;
}

export class Scope {
    public readonly variables: Map<string, Variable> = new Map();

    public get(name: string): Variable | undefined {
        return this.variables.get(name);
    }

    public define(name: string, variable: Variable): void {
        this.variables.set(name, variable);
    }

    public has(name: string): boolean {
        return this.variables.has(name);
    }
}

/**
 * One activation of a building or step: a main scope plus the temporary
 * scopes pushed by the blocks currently running in it.
 */
export class Frame {
    public readonly main: Scope = new Scope();
    public readonly temps: Scope[] = [];
    public line: number;

    constructor(
        public readonly name: string,
        public readonly file: string,
        line: number,
        public readonly owner?: StepNode,
    ) {
        this.line = line;
    }

    /** Scopes from innermost to outermost. */
    public *scopes(): IterableIterator<Scope> {
        for (let i = this.temps.length - 1; i >= 0; i--) yield this.temps[i];
        yield this.main;
    }

    public lookup(name: string): Variable | undefined {
        for (const scope of this.scopes()) {
            const variable = scope.get(name);
            if (variable) return variable;
        }
        return undefined;
    }

    public innermost(): Scope {
        return this.temps[this.temps.length - 1] ?? this.main;
    }

    /** Every visible name, innermost binding winning. */
    public visible(): Map<string, StepsValue> {
        const result = new Map<string, StepsValue>();
        for (const scope of this.scopes()) {
            for (const [name, variable] of scope.variables) {
                if (!result.has(name)) result.set(name, variable.value);
            }
        }
        return result;
    }
}

export type OutputHandler = (text: string) => void;
export type InputHandler = (prompt: string) => Promise<string>;

export interface EnvironmentOptions {
    outputHandler?: OutputHandler;
    inputHandler?: InputHandler;
    recursionLimit?: number;
    iterationLimit?: number;
    file?: string;
}

export const DEFAULT_RECURSION_LIMIT = 100;
export const DEFAULT_ITERATION_LIMIT = 10000;

export class Environment {
    public outputHandler: OutputHandler;
    public inputHandler: InputHandler;
    public recursionLimit: number;
    public iterationLimit: number;

    protected readonly frameStack: Frame[];
    private readonly steps: Map<string, StepNode> = new Map();
    private readonly floors: Map<string, FloorNode> = new Map();

    constructor(options: EnvironmentOptions = {}) {
        this.outputHandler = options.outputHandler ?? ((text) => console.log(text));
        this.inputHandler =
            options.inputHandler ??
            (() => Promise.resolve(""));
        this.recursionLimit = options.recursionLimit ?? DEFAULT_RECURSION_LIMIT;
        this.iterationLimit = options.iterationLimit ?? DEFAULT_ITERATION_LIMIT;
        this.frameStack = [new Frame("building", options.file ?? "<string>", 0)];
    }

    // Variables

    public getVariable(name: string, loc?: SourceLocation): StepsValue {
        const variable = this.currentFrame.lookup(name);
        if (!variable) {
            throw undefinedVariableError(
                name,
                loc,
                this.currentFrame.visible().keys(),
            );
        }
        return variable.value;
    }

    public hasVariable(name: string): boolean {
        return this.currentFrame.lookup(name) !== undefined;
    }

    public setVariable(
        name: string,
        value: StepsValue,
        loc?: SourceLocation,
    ): void {
        const existing = this.currentFrame.lookup(name);
        if (!existing) {
            this.currentFrame
                .innermost()
                .define(name, { value, fixed: false, assigned: true });
            return;
        }

        if (existing.fixed && existing.assigned && this.enforcesFixed()) {
            throw makeError(ErrorCode.FixedReassignment, { name }, loc);
        }
        if (existing.declaredType && existing.declaredType !== value.type) {
            throw typeMismatchError(name, existing.declaredType, value.type, loc);
        }
        existing.value = value;
        existing.assigned = true;
    }

    /** Binds `name` to the default of `type` in the current main scope. */
    public declareVariable(name: string, type: ValueType, fixed = false): void {
        this.currentFrame.main.define(name, {
            value: defaultValue(type),
            declaredType: type,
            fixed,
            assigned: false,
        });
    }

    /** Binds a name in the innermost scope, shadowing any outer binding. */
    public defineLocal(name: string, value: StepsValue): void {
        this.currentFrame
            .innermost()
            .define(name, { value, fixed: false, assigned: true });
    }

    protected enforcesFixed(): boolean {
        return true;
    }

    // Scopes and frames

    public pushScope(): void {
        this.currentFrame.temps.push(new Scope());
    }

    public popScope(): void {
        if (this.currentFrame.temps.length === 0) {
            throw makeError(ErrorCode.Internal, {
                details: "popScope called with no temporary scope",
            });
        }
        this.currentFrame.temps.pop();
    }

    public pushFrame(
        name: string,
        file: string,
        line: number,
        owner?: StepNode,
    ): Frame {
        const frame = new Frame(name, file, line, owner);
        this.frameStack.push(frame);
        return frame;
    }

    public popFrame(): void {
        if (this.frameStack.length <= 1) {
            throw makeError(ErrorCode.Internal, {
                details: "popFrame called on the building frame",
            });
        }
        this.frameStack.pop();
    }

    public get currentFrame(): Frame {
        return this.frameStack[this.frameStack.length - 1];
    }

    public get globalFrame(): Frame {
        return this.frameStack[0];
    }

    public get frames(): readonly Frame[] {
        return this.frameStack;
    }

    /** Number of step calls currently active. */
    public get callDepth(): number {
        return this.frameStack.length - 1;
    }

    public get callStack(): string[] {
        return this.frameStack.map((frame) => frame.name);
    }

    // Registries

    public registerStep(step: StepNode): void {
        this.steps.set(step.name, step);
    }

    public resolveStep(name: string, loc?: SourceLocation): StepNode {
        const step = this.steps.get(name);
        if (!step) throw undefinedStepError(name, loc, this.stepNames());
        return step;
    }

    public hasStep(name: string): boolean {
        return this.steps.has(name);
    }

    public stepNames(): string[] {
        return [...this.steps.keys()].sort();
    }

    public registerFloor(floor: FloorNode): void {
        this.floors.set(floor.name, floor);
    }

    public getFloor(name: string): FloorNode | undefined {
        return this.floors.get(name);
    }

    public floorNames(): string[] {
        return [...this.floors.keys()];
    }
}
