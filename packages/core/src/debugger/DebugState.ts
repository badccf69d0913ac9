export enum DebugMode {
    PAUSED = "PAUSED",
    RUN_TO_BREAKPOINT = "RUN_TO_BREAKPOINT",
    STEP_INTO = "STEP_INTO",
    STEP_OVER = "STEP_OVER",
    STEP_OUT = "STEP_OUT",
    STOPPED = "STOPPED",
}

export interface DebugState {
    mode: DebugMode;
    /** Call depth when the current mode was entered. */
    entryDepth: number;
}

/**
 * Decides whether the statement about to run at `depth` should pause.
 */
export function shouldPause(
    state: DebugState,
    depth: number,
    atBreakpoint: boolean,
): boolean {
    if (state.mode === DebugMode.STOPPED) return false;
    if (atBreakpoint) return true;

    switch (state.mode) {
        case DebugMode.PAUSED:
        case DebugMode.STEP_INTO:
            return true;
        case DebugMode.STEP_OVER:
            return depth <= state.entryDepth;
        case DebugMode.STEP_OUT:
            return depth < state.entryDepth;
        case DebugMode.RUN_TO_BREAKPOINT:
            return false;
    }
}
