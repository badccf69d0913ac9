import {
    NOTHING,
    NativeFunction,
    SourceLocation,
    StepsError,
    natives as builtinNatives,
} from "@stepslang/library";
import { BuildingNode } from "../parser/structure";
import { Statement } from "../parser/statements";
import { Environment } from "../interpreter/Environment";
import { ExecutionResult, Interpreter } from "../interpreter/Interpreter";
import { BreakpointSet } from "./BreakpointSet";
import { DebugMode, DebugState, shouldPause } from "./DebugState";
import { DebugSnapshot, SnapshotBuilder } from "./Snapshot";

export type DebugEvent =
    | { type: "paused"; snapshot: DebugSnapshot }
    | { type: "call"; name: string; depth: number }
    | { type: "return"; name: string; depth: number }
    | { type: "finished"; result: ExecutionResult }
    | { type: "error"; error: StepsError };

export type DebugListener = (event: DebugEvent) => void;

/**
 * Interpreter that stops before statements according to the current
 * mode and breakpoints. A pause holds the run on a promise that the next
 * command resolves.
 */
export class Debugger extends Interpreter {
    public readonly breakpoints: BreakpointSet = new BreakpointSet();

    private state: DebugState = { mode: DebugMode.PAUSED, entryDepth: 0 };
    private resume: (() => void) | null = null;
    private listeners: DebugListener[] = [];
    private snapshots = new SnapshotBuilder();
    private lastSnapshot: DebugSnapshot | null = null;

    constructor(
        environment: Environment = new Environment(),
        natives: Record<string, NativeFunction> = builtinNatives,
    ) {
        super(environment, natives);
    }

    public on(listener: DebugListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter((l) => l !== listener);
        };
    }

    public get mode(): DebugMode {
        return this.state.mode;
    }

    public get isPaused(): boolean {
        return this.resume !== null;
    }

    /** Snapshot taken at the most recent pause. */
    public get snapshot(): DebugSnapshot | null {
        return this.lastSnapshot;
    }

    public async start(building: BuildingNode): Promise<ExecutionResult> {
        if (this.state.mode === DebugMode.STOPPED) {
            const result: ExecutionResult = {
                success: false,
                returnValue: NOTHING,
                output: [],
            };
            this.notify({ type: "finished", result });
            return result;
        }

        this.snapshots.reset();
        const result = await this.runBuilding(building);
        if (result.error) this.notify({ type: "error", error: result.error });
        this.notify({ type: "finished", result });
        return result;
    }

    // Commands

    public continue(): void {
        this.enter(DebugMode.RUN_TO_BREAKPOINT);
    }

    public stepInto(): void {
        this.enter(DebugMode.STEP_INTO);
    }

    public stepOver(): void {
        this.enter(DebugMode.STEP_OVER);
    }

    public stepOut(): void {
        this.enter(DebugMode.STEP_OUT);
    }

    /** Pauses before the next statement. */
    public pause(): void {
        if (this.state.mode === DebugMode.STOPPED) return;
        this.state = {
            mode: DebugMode.PAUSED,
            entryDepth: this.environment.callDepth,
        };
    }

    public stop(): void {
        this.state = {
            mode: DebugMode.STOPPED,
            entryDepth: this.environment.callDepth,
        };
        this.halted = true;
        this.release();
    }

    private enter(mode: DebugMode) {
        if (this.state.mode === DebugMode.STOPPED) return;
        this.state = { mode, entryDepth: this.environment.callDepth };
        this.release();
    }

    private release() {
        const resume = this.resume;
        this.resume = null;
        if (resume) resume();
    }

    // Interpreter hooks

    protected async beforeStatement(statement: Statement): Promise<void> {
        if (this.state.mode === DebugMode.STOPPED) {
            this.halted = true;
            return;
        }

        const { file, line } = statement.loc;
        const depth = this.environment.callDepth;
        const atBreakpoint = this.breakpoints.has(file, line);
        if (!shouldPause(this.state, depth, atBreakpoint)) return;

        this.state = { mode: DebugMode.PAUSED, entryDepth: depth };
        const snapshot = this.snapshots.build(this.environment, file, line);
        this.lastSnapshot = snapshot;

        await new Promise<void>((resolve) => {
            this.resume = resolve;
            this.notify({ type: "paused", snapshot });
        });
    }

    protected onStepEnter(name: string, _loc: SourceLocation): void {
        this.notify({ type: "call", name, depth: this.environment.callDepth });
    }

    protected onStepExit(name: string): void {
        this.notify({ type: "return", name, depth: this.environment.callDepth });
    }

    private notify(event: DebugEvent) {
        for (const listener of this.listeners) listener(event);
    }
}
