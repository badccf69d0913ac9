import { StepsError, StepsValue } from "@stepslang/library";

/**
 * How a statement finished. Anything other than `normal` stops the
 * enclosing block and travels outward until something consumes it.
 */
export type Outcome =
    | { kind: "normal" }
    | { kind: "return"; value: StepsValue }
    | { kind: "exit" }
    | { kind: "error"; error: StepsError }
    | { kind: "halt" };

export const NORMAL: Outcome = { kind: "normal" };
export const EXIT: Outcome = { kind: "exit" };
export const HALT: Outcome = { kind: "halt" };

export function returned(value: StepsValue): Outcome {
    return { kind: "return", value };
}

export function failed(error: StepsError): Outcome {
    return { kind: "error", error };
}
